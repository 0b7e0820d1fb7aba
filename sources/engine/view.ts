/**
 * Materialized view of a remote collection
 *
 * Keeps an ordered, deduplicated projection of a collection up to date from two
 * sources at once: cursor pagination (extends the view at the tail) and one live
 * subscription per paginated document (updates and removes entries in place).
 */

import type { z } from 'zod';
import { resolveConfig, type EngineConfigInput } from './config';
import { SyncError } from './errors';
import { cursorOf, fetchPage } from './fetcher';
import { documentPath } from './helpers';
import { getLogger } from './logger';
import {
    applyRemoval,
    applyUpdate,
    emptyViewState,
    ingestPage,
    type IncomingDocument,
    type IngestedPage,
    type MergeResult,
    type ViewEntry,
    type ViewState,
} from './merge';
import { SubscriptionRegistry } from './registry';
import type { DocumentStore } from './store';
import type { CollectionPath, DocumentId, DocumentSnapshot, SortDirection } from './types';

/**
 * Listener receiving the full ordered snapshot after every state transition
 */
export type SnapshotListener<T> = (snapshot: ReadonlyArray<ViewEntry<T>>) => void;

export interface MaterializedViewOptions<T> {
    store: DocumentStore;
    collection: CollectionPath;
    /** Sort field used for pagination (DOCUMENT_ID for id order) */
    orderBy: string;
    /** Default: 'asc' */
    direction?: SortDirection;
    /** Projection of a document's fields; documents it rejects are left out */
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    config?: EngineConfigInput;
    /** Runs at every startSession() before the first page is requested */
    onStart?: () => Promise<unknown>;
    /** Logger category suffix (default: the collection path) */
    name?: string;
}

export interface MaterializedView<T> {
    readonly collection: CollectionPath;
    /** True once an empty page came back */
    readonly reachedEnd: boolean;
    readonly isLoading: boolean;
    /** Between startSession() and endSession() */
    readonly isActive: boolean;
    /** Number of open per-document subscriptions */
    readonly subscriptionCount: number;

    /**
     * Current ordered entries; frozen, never modified after being returned
     */
    currentSnapshot(): ReadonlyArray<ViewEntry<T>>;

    /**
     * Receive every new snapshot; returns a function that stops delivery
     */
    subscribe(listener: SnapshotListener<T>): () => void;

    /**
     * Run the onStart hook and load the first page
     * Calling it again on an active view reloads from scratch
     *
     * @throws SyncError `disposed` after endSession()
     * @throws FetchError when the first page cannot be loaded
     */
    startSession(): Promise<void>;

    /**
     * Load the next page unless the end was reached
     * Joins the load already in flight, if any
     *
     * @throws FetchError when the page cannot be loaded; the cursor stays put
     */
    onNextPageNeeded(): Promise<void>;

    /**
     * Whether a row at this index is close enough to the tail to request more
     */
    shouldLoadMore(lastVisibleIndex: number): boolean;

    /**
     * Drop every entry and subscription, then load the first page again
     */
    reset(): Promise<void>;

    /**
     * Close every subscription; results arriving afterwards are discarded
     */
    endSession(): void;
}

type ViewEvent<T> =
    | { readonly type: 'page'; readonly page: IngestedPage<T> }
    | { readonly type: 'update'; readonly id: DocumentId; readonly fields: T }
    | { readonly type: 'remove'; readonly id: DocumentId };

/**
 * Create a materialized view over one collection
 *
 * @example
 * const view = materializedView({
 *   store,
 *   collection: 'groups/g1/items',
 *   orderBy: 'name',
 *   schema: itemSchema,
 * });
 * view.subscribe(entries => render(entries));
 * await view.startSession();
 * // when the list is scrolled near the end
 * if (view.shouldLoadMore(lastVisible)) await view.onNextPageNeeded();
 * // when the screen goes away
 * view.endSession();
 */
export function materializedView<T>(options: MaterializedViewOptions<T>): MaterializedView<T> {
    const { store, collection, orderBy, schema } = options;
    const direction = options.direction ?? 'asc';
    const config = resolveConfig(options.config);
    const logger = getLogger(['view', options.name ?? collection]);

    let state: ViewState<T> = emptyViewState<T>();
    let status: 'idle' | 'active' | 'disposed' = 'idle';
    // Bumped by reset() and endSession(); fetches started under an older value are discarded
    let generation = 0;
    let inflight: Promise<void> | null = null;
    const listeners = new Set<SnapshotListener<T>>();

    // Single serial queue: no two merges interleave, including events a store
    // delivers re-entrantly while a merge is being applied
    const queue: ViewEvent<T>[] = [];
    let draining = false;

    const decode = (snapshot: DocumentSnapshot): IncomingDocument<T> | null => {
        const parsed = schema.safeParse(snapshot.fields);
        if (!parsed.success) {
            logger.warn('Skipping document {path} that does not match the view schema', {
                path: snapshot.path,
                issues: parsed.error.issues,
            });
            return null;
        }
        return { id: snapshot.id, fields: parsed.data };
    };

    const registry = new SubscriptionRegistry(
        store,
        (id, event) => {
            if (!event.exists) {
                dispatch({ type: 'remove', id });
                return;
            }
            const decoded = decode(event.snapshot);
            if (decoded) {
                dispatch({ type: 'update', id, fields: decoded.fields });
            }
        },
        logger
    );

    const step = (event: ViewEvent<T>): MergeResult<T> => {
        switch (event.type) {
            case 'page':
                return ingestPage(state, event.page, id => registry.has(id));
            case 'update':
                return applyUpdate(state, event.id, event.fields);
            case 'remove':
                // The subscription goes away even if the entry was already gone
                registry.close(event.id);
                return applyRemoval(state, event.id);
        }
    };

    const publish = (): void => {
        const snapshot = state.entries;
        for (const listener of listeners) {
            // A listener changed the state; the newer snapshot was already published
            if (state.entries !== snapshot) return;
            listener(snapshot);
        }
    };

    const dispatch = (event: ViewEvent<T>): void => {
        if (status === 'disposed') return;
        queue.push(event);
        if (draining) return;

        draining = true;
        try {
            let next: ViewEvent<T> | undefined;
            while ((next = queue.shift()) !== undefined) {
                const previous = state;
                const result = step(next);
                state = result.state;
                for (const id of result.removed) {
                    registry.close(id);
                }
                for (const id of result.added) {
                    registry.open(documentPath(collection, id));
                }
                if (state !== previous) publish();
            }
        } finally {
            draining = false;
        }
    };

    const loadNextPage = (): Promise<void> => {
        if (status !== 'active' || state.reachedEnd) return Promise.resolve();
        if (inflight) return inflight;

        const token = generation;
        const after = state.cursor;
        const load = fetchPage(store, { collection, orderBy, direction, after, limit: config.pageSize })
            .then(
                page => {
                    if (token !== generation) {
                        logger.debug('Discarding page of {collection} fetched before a reset', { collection });
                        return;
                    }
                    const documents = page.flatMap(document => {
                        const decoded = decode(document);
                        return decoded ? [decoded] : [];
                    });
                    const cursor = page.length > 0 ? cursorOf(page[page.length - 1], orderBy) : null;
                    dispatch({ type: 'page', page: { documents, cursor } });
                    logger.debug('Loaded {count} documents of {collection}', { count: page.length, collection });
                },
                error => {
                    if (token !== generation) {
                        logger.debug('Discarding failed page of {collection} fetched before a reset', { collection, error });
                        return;
                    }
                    throw error;
                }
            )
            .finally(() => {
                if (inflight === load) inflight = null;
            });

        inflight = load;
        return load;
    };

    const reset = (): Promise<void> => {
        if (status !== 'active') return Promise.resolve();
        generation++;
        inflight = null;
        queue.length = 0;
        registry.closeAll();
        // Cleared in place, not queued: reset() may run from a listener while
        // the queue drains, and the first page is requested from this state
        const previous = state;
        state = emptyViewState<T>();
        if (state !== previous) publish();
        return loadNextPage();
    };

    return {
        collection,

        get reachedEnd() {
            return state.reachedEnd;
        },

        get isLoading() {
            return inflight !== null;
        },

        get isActive() {
            return status === 'active';
        },

        get subscriptionCount() {
            return registry.size;
        },

        currentSnapshot() {
            return state.entries;
        },

        subscribe(listener) {
            listeners.add(listener);
            return () => {
                listeners.delete(listener);
            };
        },

        async startSession() {
            if (status === 'disposed') {
                throw new SyncError('disposed', `View of ${collection} was already ended`);
            }
            status = 'active';
            if (options.onStart) {
                await options.onStart();
            }
            await reset();
        },

        onNextPageNeeded() {
            return loadNextPage();
        },

        shouldLoadMore(lastVisibleIndex) {
            return status === 'active'
                && inflight === null
                && !state.reachedEnd
                && lastVisibleIndex >= state.entries.length - config.prefetchThreshold;
        },

        reset,

        endSession() {
            if (status === 'disposed') return;
            status = 'disposed';
            generation++;
            inflight = null;
            queue.length = 0;
            registry.closeAll();
            listeners.clear();
        },
    };
}
