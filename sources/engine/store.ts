/**
 * Contract of the remote document store the engine runs against
 *
 * The engine never talks to a backend SDK directly. A thin adapter over the
 * real client (or MemoryStore in tests) implements this interface.
 */

import type {
    CollectionPath,
    Cursor,
    DocumentId,
    DocumentPath,
    DocumentSnapshot,
    SortDirection,
    WriteData,
} from './types';

/**
 * Ordered, limited query against one collection
 */
export interface StoreQuery {
    readonly collection: CollectionPath;
    /** Sort field, or DOCUMENT_ID to order by id alone */
    readonly orderBy: string;
    readonly direction: SortDirection;
    /** Return only documents strictly after this cursor */
    readonly startAfter?: Cursor | null;
    readonly limit: number;
}

/**
 * Event delivered by a live document subscription
 */
export type DocumentEvent =
    | { readonly exists: true; readonly snapshot: DocumentSnapshot }
    | { readonly exists: false; readonly id: DocumentId; readonly path: DocumentPath };

export interface DocumentObserver {
    next(event: DocumentEvent): void;
    /** Stream failure; the backend keeps the listener and re-delivers on recovery */
    error(error: unknown): void;
}

export type Unsubscribe = () => void;

export interface SetOptions {
    /** Merge the given fields into the existing document instead of replacing it */
    readonly merge?: boolean;
}

/**
 * Atomic group of writes, bounded to MAX_BATCH_OPERATIONS by the backend
 */
export interface WriteBatch {
    readonly size: number;
    set(path: DocumentPath, data: WriteData, options?: SetOptions): WriteBatch;
    delete(path: DocumentPath): WriteBatch;
    commit(): Promise<void>;
}

export interface DocumentStore {
    query(query: StoreQuery): Promise<DocumentSnapshot[]>;
    get(path: DocumentPath): Promise<DocumentSnapshot | null>;
    /**
     * Open a live subscription to one document
     * The first event reports the document's current state
     */
    listen(path: DocumentPath, observer: DocumentObserver): Unsubscribe;
    set(path: DocumentPath, data: WriteData, options?: SetOptions): Promise<void>;
    batch(): WriteBatch;
}
