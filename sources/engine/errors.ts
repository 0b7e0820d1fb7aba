/**
 * Error taxonomy for the sync and deletion engines
 */

// ============================================================================
// Store Errors
// ============================================================================

/**
 * Failure codes reported by a document store
 */
export type StoreErrorCode =
    | 'unavailable'
    | 'permission-denied'
    | 'invalid-argument'
    | 'resource-exhausted'
    | 'unknown';

/**
 * Error raised by a DocumentStore implementation
 */
export class StoreError extends Error {
    readonly code: StoreErrorCode;

    constructor(code: StoreErrorCode, message: string) {
        super(message);
        this.name = 'StoreError';
        this.code = code;
    }
}

// ============================================================================
// Engine Errors
// ============================================================================

/**
 * Failure codes surfaced to callers of the engine
 *
 * - transient: network or backend failure, safe to retry
 * - permission-denied: the backend refused the operation
 * - invalid-argument: the caller passed something the engine cannot use
 * - invalid-document: a stored document lacks a field the engine depends on
 * - disposed: the session was already ended
 */
export type SyncErrorCode =
    | 'transient'
    | 'permission-denied'
    | 'invalid-argument'
    | 'invalid-document'
    | 'disposed';

export class SyncError extends Error {
    readonly code: SyncErrorCode;

    constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SyncError';
        this.code = code;
    }
}

/**
 * A page request failed; pagination state was left untouched
 */
export class FetchError extends SyncError {
    readonly collection: string;

    constructor(collection: string, cause: unknown) {
        super(codeOf(cause), `Failed to fetch page of ${collection}: ${messageOf(cause)}`, { cause });
        this.name = 'FetchError';
        this.collection = collection;
    }
}

/**
 * A batch commit failed; batches committed before it stay committed
 */
export class CommitError extends SyncError {
    readonly operations: number;

    constructor(operations: number, cause: unknown) {
        super(codeOf(cause), `Failed to commit batch of ${operations} operations: ${messageOf(cause)}`, { cause });
        this.name = 'CommitError';
        this.operations = operations;
    }
}

/**
 * Map any failure onto the engine's error codes
 */
function codeOf(error: unknown): SyncErrorCode {
    if (error instanceof SyncError) return error.code;
    if (error instanceof StoreError) {
        switch (error.code) {
            case 'permission-denied':
                return 'permission-denied';
            case 'invalid-argument':
                return 'invalid-argument';
            default:
                return 'transient';
        }
    }
    return 'transient';
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown failure into a SyncError, keeping SyncErrors as they are
 */
export function toSyncError(error: unknown): SyncError {
    if (error instanceof SyncError) return error;
    return new SyncError(codeOf(error), messageOf(error), { cause: error });
}
