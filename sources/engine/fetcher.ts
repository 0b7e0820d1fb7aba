/**
 * Remote page fetcher
 *
 * Issues one ordered, limited query per call. Pagination state lives with the
 * caller: the cursor only moves once a page has been returned, so a failed
 * request can be retried as often as needed.
 */

import { MAX_PAGE_SIZE } from './config';
import { FetchError, SyncError } from './errors';
import type { DocumentStore } from './store';
import {
    DOCUMENT_ID,
    type CollectionPath,
    type Cursor,
    type DocumentSnapshot,
    type SortDirection,
} from './types';

export interface PageRequest {
    readonly collection: CollectionPath;
    readonly orderBy: string;
    /** Default: 'asc' */
    readonly direction?: SortDirection;
    /** Cursor of the previous page; absent for the first page */
    readonly after?: Cursor | null;
    readonly limit: number;
}

/**
 * Fetch up to `limit` documents strictly after the cursor
 * An empty result means there is nothing more to read
 *
 * @throws SyncError with code `invalid-argument` for a limit outside 1..MAX_PAGE_SIZE
 * @throws FetchError when the store rejects the query
 */
export async function fetchPage(store: DocumentStore, request: PageRequest): Promise<DocumentSnapshot[]> {
    if (!Number.isInteger(request.limit) || request.limit < 1 || request.limit > MAX_PAGE_SIZE) {
        throw new SyncError('invalid-argument', `Page limit must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${request.limit}`);
    }

    try {
        return await store.query({
            collection: request.collection,
            orderBy: request.orderBy,
            direction: request.direction ?? 'asc',
            startAfter: request.after ?? null,
            limit: request.limit,
        });
    } catch (error) {
        throw new FetchError(request.collection, error);
    }
}

/**
 * Continuation cursor for the page that ends with `document`
 */
export function cursorOf(document: DocumentSnapshot, orderBy: string): Cursor {
    return {
        id: document.id,
        value: orderBy === DOCUMENT_ID ? document.id : document.fields[orderBy] ?? null,
    };
}

/**
 * Walk a collection page by page until an empty page comes back
 * Each page is requested only after the previous one was consumed
 */
export async function* paginate(
    store: DocumentStore,
    request: Omit<PageRequest, 'after'>
): AsyncGenerator<DocumentSnapshot[], void, undefined> {
    let after: Cursor | null = null;
    while (true) {
        const page = await fetchPage(store, { ...request, after });
        if (page.length === 0) return;
        yield page;
        after = cursorOf(page[page.length - 1], request.orderBy);
    }
}
