/**
 * Core types for the sync engine
 */

// ============================================================================
// Core Types - Document Identity and Structure
// ============================================================================

/**
 * Identifier of a document inside its collection
 * Generated ids use CUID2 format
 */
export type DocumentId = string;

/**
 * Slash separated path with an odd number of segments
 * e.g. `groups/g1/items`
 */
export type CollectionPath = string;

/**
 * Slash separated path with an even number of segments
 * e.g. `groups/g1/items/i1`
 */
export type DocumentPath = string;

/**
 * Timestamp in milliseconds since epoch
 */
export type Timestamp = number;

/**
 * Value stored in a document field: string, integer, timestamp or null
 */
export type FieldValue = string | number | Date | null;

/**
 * Field map of a document as read from the store
 */
export type DocumentData = Readonly<Record<string, FieldValue>>;

/**
 * Placeholder resolved by the store to its own clock when the write commits
 */
export interface ServerTimestamp {
    readonly kind: 'serverTimestamp';
}

/**
 * Value accepted by write operations
 */
export type WriteValue = FieldValue | ServerTimestamp;

/**
 * Field map accepted by write operations
 */
export type WriteData = Readonly<Record<string, WriteValue>>;

/**
 * A single document read from the store
 */
export interface DocumentSnapshot {
    readonly id: DocumentId;
    readonly path: DocumentPath;
    readonly fields: DocumentData;
}

// ============================================================================
// Pagination
// ============================================================================

/**
 * Sort key that orders documents by id alone
 */
export const DOCUMENT_ID = '__name__';

export type SortDirection = 'asc' | 'desc';

/**
 * Continuation marker derived from the last document of a page
 * Not a snapshot: documents written after the page was read may or may not
 * show up on the following pages
 */
export interface Cursor {
    readonly id: DocumentId;
    /** Sort field value of the document (its id when sorting by DOCUMENT_ID) */
    readonly value: FieldValue;
}
