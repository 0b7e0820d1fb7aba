/**
 * Merge algorithm of the materialized view
 *
 * Pure functions over an Immer-produced ViewState. Every result is a new frozen
 * state (or the same reference when nothing changed), so a snapshot handed to a
 * consumer never changes under it.
 *
 * Ordering rules:
 * - Paged documents are appended in fetch order; an id never appears twice
 * - Subscription updates replace fields in place and never move an entry
 * - An update for an unknown id appends it at the tail (insertion order, no re-sort)
 * - Once a subscription is open for an id, paged data no longer overwrites it
 */

import { castDraft, freeze, produce } from 'immer';
import type { Cursor, DocumentId } from './types';

/**
 * Cached projection of one document
 */
export interface ViewEntry<T> {
    readonly id: DocumentId;
    readonly fields: T;
}

export interface ViewState<T> {
    readonly entries: ReadonlyArray<ViewEntry<T>>;
    /** Last consumed document, or null before the first page */
    readonly cursor: Cursor | null;
    readonly reachedEnd: boolean;
}

/**
 * Decoded document of a fetched page
 */
export interface IncomingDocument<T> {
    readonly id: DocumentId;
    readonly fields: T;
}

/**
 * A fetched page; `cursor` is null when the page came back empty
 */
export interface IngestedPage<T> {
    readonly documents: ReadonlyArray<IncomingDocument<T>>;
    readonly cursor: Cursor | null;
}

export interface MergeResult<T> {
    readonly state: ViewState<T>;
    /** Ids appended to the view by this step */
    readonly added: DocumentId[];
    /** Ids dropped from the view by this step */
    readonly removed: DocumentId[];
}

export function emptyViewState<T>(): ViewState<T> {
    return freeze<ViewState<T>>({ entries: [], cursor: null, reachedEnd: false }, true);
}

/**
 * Apply a fetched page
 *
 * @param isSubscribed - whether a live subscription is already open for an id;
 *   such entries keep their subscription-sourced fields
 */
export function ingestPage<T>(
    state: ViewState<T>,
    page: IngestedPage<T>,
    isSubscribed: (id: DocumentId) => boolean
): MergeResult<T> {
    const added: DocumentId[] = [];

    const next = produce(state, draft => {
        if (page.cursor === null) {
            draft.reachedEnd = true;
            return;
        }

        const positions = new Map<DocumentId, number>();
        draft.entries.forEach((entry, index) => positions.set(entry.id, index));

        for (const document of page.documents) {
            const index = positions.get(document.id);
            if (index === undefined) {
                positions.set(document.id, draft.entries.length);
                draft.entries.push({ id: document.id, fields: castDraft(document.fields) });
                added.push(document.id);
            } else if (!isSubscribed(document.id)) {
                draft.entries[index].fields = castDraft(document.fields);
            }
        }

        draft.cursor = page.cursor;
    });

    return { state: next, added, removed: [] };
}

/**
 * Apply a subscription update: replace in place, or append when unknown
 */
export function applyUpdate<T>(state: ViewState<T>, id: DocumentId, fields: T): MergeResult<T> {
    const added: DocumentId[] = [];

    const next = produce(state, draft => {
        const index = draft.entries.findIndex(entry => entry.id === id);
        if (index === -1) {
            draft.entries.push({ id, fields: castDraft(fields) });
            added.push(id);
        } else {
            draft.entries[index].fields = castDraft(fields);
        }
    });

    return { state: next, added, removed: [] };
}

/**
 * Apply a subscription deletion: drop the entry wherever it is
 */
export function applyRemoval<T>(state: ViewState<T>, id: DocumentId): MergeResult<T> {
    const index = state.entries.findIndex(entry => entry.id === id);
    if (index === -1) {
        return { state, added: [], removed: [] };
    }

    const next = produce(state, draft => {
        draft.entries.splice(index, 1);
    });

    return { state: next, added: [], removed: [id] };
}
