/**
 * Helper functions for the sync engine
 */

import { createId } from '@paralleldrive/cuid2';
import type {
    CollectionPath,
    DocumentId,
    DocumentPath,
    FieldValue,
    ServerTimestamp,
    WriteValue,
} from './types';

/**
 * Create a new document ID
 */
export function createDocumentId(): DocumentId {
    return createId();
}

/**
 * Join path segments, dropping empty ones and stray slashes
 *
 * @example
 * collectionPath('groups', 'g1', 'items') // 'groups/g1/items'
 */
export function collectionPath(...segments: string[]): CollectionPath {
    return segments
        .flatMap(segment => segment.split('/'))
        .filter(segment => segment.length > 0)
        .join('/');
}

/**
 * Path of a document inside a collection
 */
export function documentPath(collection: CollectionPath, id: DocumentId): DocumentPath {
    return collectionPath(collection, id);
}

/**
 * Last segment of a document path
 */
export function idOf(path: DocumentPath): DocumentId {
    const index = path.lastIndexOf('/');
    return index === -1 ? path : path.slice(index + 1);
}

/**
 * Collection a document path belongs to
 */
export function parentOf(path: DocumentPath): CollectionPath {
    const index = path.lastIndexOf('/');
    return index === -1 ? '' : path.slice(0, index);
}

const SERVER_TIMESTAMP: ServerTimestamp = Object.freeze({ kind: 'serverTimestamp' });

/**
 * Sentinel replaced by the store's clock at commit time
 */
export function serverTimestamp(): ServerTimestamp {
    return SERVER_TIMESTAMP;
}

/**
 * Check if a write value is the server timestamp sentinel
 */
export function isServerTimestamp(value: WriteValue): value is ServerTimestamp {
    return typeof value === 'object' && value !== null && !(value instanceof Date) && value.kind === 'serverTimestamp';
}

/**
 * Rank of a value's type in the backend's cross-type ordering
 * null < numbers < timestamps < strings
 */
function typeRank(value: FieldValue): number {
    if (value === null) return 0;
    if (typeof value === 'number') return 1;
    if (value instanceof Date) return 2;
    return 3;
}

/**
 * Compare two field values the way the backend orders them
 */
export function compareValues(a: FieldValue, b: FieldValue): number {
    const rankA = typeRank(a);
    const rankB = typeRank(b);
    if (rankA !== rankB) return rankA - rankB;

    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
    if (typeof a === 'string' && typeof b === 'string') {
        return a < b ? -1 : a > b ? 1 : 0;
    }
    return 0;
}

/**
 * Compare two document ids
 */
export function compareIds(a: DocumentId, b: DocumentId): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
