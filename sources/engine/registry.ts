/**
 * Registry of live per-document subscriptions
 *
 * Owns the id → handle map for one view. At most one subscription is open per
 * document id; the map is only ever changed through open/close/closeAll.
 */

import type { Logger } from '@logtape/logtape';
import { idOf } from './helpers';
import { getLogger } from './logger';
import type { DocumentEvent, DocumentStore, Unsubscribe } from './store';
import type { DocumentId, DocumentPath } from './types';

export interface SubscriptionHandle {
    readonly id: DocumentId;
    readonly path: DocumentPath;
}

type OpenHandle = SubscriptionHandle & {
    unsubscribe: Unsubscribe;
};

export type SubscriptionListener = (id: DocumentId, event: DocumentEvent) => void;

export class SubscriptionRegistry {
    private handles = new Map<DocumentId, OpenHandle>();
    private readonly store: DocumentStore;
    private readonly onEvent: SubscriptionListener;
    private readonly logger: Logger;

    constructor(store: DocumentStore, onEvent: SubscriptionListener, logger: Logger = getLogger(['registry'])) {
        this.store = store;
        this.onEvent = onEvent;
        this.logger = logger;
    }

    /**
     * Number of open subscriptions
     */
    get size(): number {
        return this.handles.size;
    }

    /**
     * Ids with an open subscription, in opening order
     */
    ids(): DocumentId[] {
        return Array.from(this.handles.keys());
    }

    has(id: DocumentId): boolean {
        return this.handles.has(id);
    }

    /**
     * Open a subscription for the document, or return the one already open
     */
    open(path: DocumentPath): SubscriptionHandle {
        const id = idOf(path);
        const existing = this.handles.get(id);
        if (existing) return existing;

        // Registered before listen() so an event delivered synchronously is forwarded
        const handle: OpenHandle = { id, path, unsubscribe: () => {} };
        this.handles.set(id, handle);
        try {
            handle.unsubscribe = this.store.listen(path, {
                next: event => {
                    if (this.handles.get(id) !== handle) return;
                    this.onEvent(id, event);
                },
                error: error => {
                    if (this.handles.get(id) !== handle) return;
                    this.logger.warn('Subscription stream for {path} failed, keeping it open', { path, error });
                },
            });
        } catch (error) {
            this.handles.delete(id);
            throw error;
        }
        return handle;
    }

    /**
     * Close the subscription of one document
     * Returns false when none was open
     */
    close(id: DocumentId): boolean {
        const handle = this.handles.get(id);
        if (!handle) return false;
        this.handles.delete(id);
        handle.unsubscribe();
        return true;
    }

    /**
     * Close every subscription
     * No event of a closed subscription is forwarded after this returns
     */
    closeAll(): void {
        const handles = Array.from(this.handles.values());
        this.handles.clear();
        for (const handle of handles) {
            handle.unsubscribe();
        }
    }
}
