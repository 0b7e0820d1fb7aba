/**
 * In-process DocumentStore
 *
 * Keeps documents in a path keyed map and mimics the backend behaviour the
 * engine relies on: value ordering, cursor continuation, merge writes, bounded
 * atomic batches and asynchronous delivery of live subscription events.
 * Used by the test suite and for running call sites without a backend.
 */

import { MAX_BATCH_OPERATIONS } from './config';
import { StoreError, type StoreErrorCode } from './errors';
import { compareIds, compareValues, idOf, isServerTimestamp, parentOf } from './helpers';
import type {
    DocumentObserver,
    DocumentStore,
    SetOptions,
    StoreQuery,
    Unsubscribe,
    WriteBatch,
} from './store';
import {
    DOCUMENT_ID,
    type Cursor,
    type DocumentData,
    type DocumentPath,
    type DocumentSnapshot,
    type FieldValue,
    type SortDirection,
    type WriteData,
} from './types';

/**
 * Store operations that can be made to fail on demand
 */
export type StoreOperation = 'query' | 'get' | 'set' | 'commit';

type Listener = {
    readonly observer: DocumentObserver;
    active: boolean;
};

type BatchOperation =
    | { readonly type: 'set'; readonly path: DocumentPath; readonly data: WriteData; readonly merge: boolean }
    | { readonly type: 'delete'; readonly path: DocumentPath };

export interface MemoryStoreOptions {
    /** Clock used to resolve server timestamps (default: Date.now) */
    clock?: () => number;
}

export class MemoryStore implements DocumentStore {
    private documents = new Map<DocumentPath, DocumentData>();
    private listeners = new Map<DocumentPath, Set<Listener>>();
    private failures = new Map<StoreOperation, StoreError[]>();
    private committedBatches: number[] = [];
    private queryCount = 0;
    private readonly clock: () => number;

    constructor(options: MemoryStoreOptions = {}) {
        this.clock = options.clock ?? Date.now;
    }

    // ========================================================================
    // Inspection and test controls
    // ========================================================================

    /**
     * Sizes of every committed batch, in commit order
     */
    get commits(): readonly number[] {
        return this.committedBatches;
    }

    /**
     * Number of queries that reached the store
     */
    get queries(): number {
        return this.queryCount;
    }

    /**
     * Write a document synchronously, notifying listeners
     */
    seed(path: DocumentPath, data: WriteData): void {
        assertDocumentPath(path);
        this.write(path, this.resolve(data));
    }

    /**
     * Current fields of a document, read synchronously
     */
    peek(path: DocumentPath): DocumentData | undefined {
        return this.documents.get(path);
    }

    /**
     * Paths of the documents directly inside a collection, sorted
     */
    list(collection: string): DocumentPath[] {
        return Array.from(this.documents.keys())
            .filter(path => parentOf(path) === collection)
            .sort(compareIds);
    }

    /**
     * Number of open live subscriptions, for one path or in total
     */
    listenerCount(path?: DocumentPath): number {
        if (path !== undefined) {
            return this.listeners.get(path)?.size ?? 0;
        }
        let count = 0;
        for (const set of this.listeners.values()) count += set.size;
        return count;
    }

    /**
     * Make the next `times` calls of an operation fail with the given code
     */
    failNext(operation: StoreOperation, code: StoreErrorCode = 'unavailable', times = 1): void {
        const queue = this.failures.get(operation) ?? [];
        for (let i = 0; i < times; i++) {
            queue.push(new StoreError(code, `Injected ${operation} failure (${code})`));
        }
        this.failures.set(operation, queue);
    }

    /**
     * Report a stream failure to every listener of a path
     */
    breakStream(path: DocumentPath, error: unknown = new StoreError('unavailable', 'Stream interrupted')): void {
        for (const listener of this.listeners.get(path) ?? []) {
            queueMicrotask(() => {
                if (listener.active) listener.observer.error(error);
            });
        }
    }

    // ========================================================================
    // DocumentStore
    // ========================================================================

    async query(query: StoreQuery): Promise<DocumentSnapshot[]> {
        this.takeFailure('query');
        this.queryCount++;

        if (!Number.isInteger(query.limit) || query.limit < 1) {
            throw new StoreError('invalid-argument', `Invalid limit: ${query.limit}`);
        }

        const compare = comparator(query.orderBy, query.direction);
        const after = query.startAfter;

        return this.list(query.collection)
            .map(path => this.snapshot(path))
            .filter((snapshot): snapshot is DocumentSnapshot => snapshot !== null)
            .map(snapshot => ({ snapshot, key: keyOf(snapshot, query.orderBy) }))
            .filter(({ key }) => !after || compare(key, after) > 0)
            .sort((a, b) => compare(a.key, b.key))
            .slice(0, query.limit)
            .map(({ snapshot }) => snapshot);
    }

    async get(path: DocumentPath): Promise<DocumentSnapshot | null> {
        this.takeFailure('get');
        assertDocumentPath(path);
        return this.snapshot(path);
    }

    listen(path: DocumentPath, observer: DocumentObserver): Unsubscribe {
        assertDocumentPath(path);
        const listener: Listener = { observer, active: true };
        const set = this.listeners.get(path) ?? new Set<Listener>();
        set.add(listener);
        this.listeners.set(path, set);

        const initial = this.snapshot(path);
        queueMicrotask(() => {
            if (!listener.active) return;
            listener.observer.next(
                initial ? { exists: true, snapshot: initial } : { exists: false, id: idOf(path), path }
            );
        });

        return () => {
            listener.active = false;
            const current = this.listeners.get(path);
            if (!current) return;
            current.delete(listener);
            if (current.size === 0) this.listeners.delete(path);
        };
    }

    async set(path: DocumentPath, data: WriteData, options: SetOptions = {}): Promise<void> {
        this.takeFailure('set');
        assertDocumentPath(path);
        this.apply({ type: 'set', path, data, merge: options.merge ?? false });
    }

    batch(): WriteBatch {
        const operations: BatchOperation[] = [];
        let committed = false;

        const batch: WriteBatch = {
            get size() {
                return operations.length;
            },
            set(path, data, options = {}) {
                assertDocumentPath(path);
                operations.push({ type: 'set', path, data, merge: options.merge ?? false });
                return batch;
            },
            delete(path) {
                assertDocumentPath(path);
                operations.push({ type: 'delete', path });
                return batch;
            },
            commit: async () => {
                if (committed) {
                    throw new StoreError('invalid-argument', 'Batch was already committed');
                }
                this.takeFailure('commit');
                if (operations.length > MAX_BATCH_OPERATIONS) {
                    throw new StoreError(
                        'invalid-argument',
                        `Batch of ${operations.length} operations exceeds the limit of ${MAX_BATCH_OPERATIONS}`
                    );
                }
                committed = true;
                for (const operation of operations) this.apply(operation);
                this.committedBatches.push(operations.length);
            },
        };

        return batch;
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private takeFailure(operation: StoreOperation): void {
        const failure = this.failures.get(operation)?.shift();
        if (failure) throw failure;
    }

    private apply(operation: BatchOperation): void {
        if (operation.type === 'delete') {
            if (!this.documents.has(operation.path)) return;
            this.documents.delete(operation.path);
            this.notify(operation.path);
            return;
        }

        const resolved = this.resolve(operation.data);
        const existing = this.documents.get(operation.path);
        this.write(operation.path, operation.merge && existing ? { ...existing, ...resolved } : resolved);
    }

    private write(path: DocumentPath, data: DocumentData): void {
        this.documents.set(path, Object.freeze({ ...data }));
        this.notify(path);
    }

    private resolve(data: WriteData): DocumentData {
        const now = new Date(this.clock());
        const resolved: Record<string, FieldValue> = {};
        for (const [key, value] of Object.entries(data)) {
            resolved[key] = isServerTimestamp(value) ? now : value;
        }
        return resolved;
    }

    private snapshot(path: DocumentPath): DocumentSnapshot | null {
        const fields = this.documents.get(path);
        if (!fields) return null;
        return { id: idOf(path), path, fields };
    }

    private notify(path: DocumentPath): void {
        const set = this.listeners.get(path);
        if (!set) return;

        const snapshot = this.snapshot(path);
        for (const listener of set) {
            queueMicrotask(() => {
                if (!listener.active) return;
                listener.observer.next(
                    snapshot ? { exists: true, snapshot } : { exists: false, id: idOf(path), path }
                );
            });
        }
    }
}

function assertDocumentPath(path: DocumentPath): void {
    const segments = path.split('/');
    if (segments.length % 2 !== 0 || segments.some(segment => segment.length === 0)) {
        throw new StoreError('invalid-argument', `Not a document path: ${path}`);
    }
}

function keyOf(snapshot: DocumentSnapshot, orderBy: string): Cursor {
    return {
        id: snapshot.id,
        value: orderBy === DOCUMENT_ID ? snapshot.id : snapshot.fields[orderBy] ?? null,
    };
}

/**
 * Sort field first (reversed for desc), id ascending as tiebreaker
 */
function comparator(orderBy: string, direction: SortDirection): (a: Cursor, b: Cursor) => number {
    const sign = direction === 'desc' ? -1 : 1;
    if (orderBy === DOCUMENT_ID) {
        return (a, b) => compareIds(a.id, b.id) * sign;
    }
    return (a, b) => {
        const byValue = compareValues(a.value, b.value) * sign;
        if (byValue !== 0) return byValue;
        return compareIds(a.id, b.id);
    };
}
