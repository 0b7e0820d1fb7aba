/**
 * Sync Engine - Export all public APIs
 */

// Types
export { DOCUMENT_ID } from './types';
export type {
    DocumentId,
    CollectionPath,
    DocumentPath,
    Timestamp,
    FieldValue,
    DocumentData,
    ServerTimestamp,
    WriteValue,
    WriteData,
    DocumentSnapshot,
    SortDirection,
    Cursor,
} from './types';

// Helpers
export {
    createDocumentId,
    collectionPath,
    documentPath,
    idOf,
    parentOf,
    serverTimestamp,
    isServerTimestamp,
    compareValues,
    compareIds,
} from './helpers';

// Configuration
export {
    MAX_BATCH_OPERATIONS,
    MAX_PAGE_SIZE,
    engineConfigSchema,
    resolveConfig,
} from './config';
export type { EngineConfig, EngineConfigInput } from './config';

// Errors
export { StoreError, SyncError, FetchError, CommitError, toSyncError } from './errors';
export type { StoreErrorCode, SyncErrorCode } from './errors';

// Logging
export { configureLogger, getLogger } from './logger';

// Store contract and in-process implementation
export type {
    StoreQuery,
    DocumentEvent,
    DocumentObserver,
    Unsubscribe,
    SetOptions,
    WriteBatch,
    DocumentStore,
} from './store';
export { MemoryStore } from './memory-store';
export type { MemoryStoreOptions, StoreOperation } from './memory-store';

// Pagination
export { fetchPage, cursorOf, paginate } from './fetcher';
export type { PageRequest } from './fetcher';

// Subscriptions
export { SubscriptionRegistry } from './registry';
export type { SubscriptionHandle, SubscriptionListener } from './registry';

// Materialized view
export { emptyViewState, ingestPage, applyUpdate, applyRemoval } from './merge';
export type { ViewEntry, ViewState, IncomingDocument, IngestedPage, MergeResult } from './merge';
export { materializedView } from './view';
export type { MaterializedView, MaterializedViewOptions, SnapshotListener } from './view';

// Deletion
export { BatchWriter } from './batch';
export { cascadingDeleter } from './deletion';
export type { CascadingDeleter, DeletionPlan, DependentCollection, DeletionResult } from './deletion';

// Fan-out index and roles
export { FanoutIndex } from './fanout';
export type { OwnerIndexStatus } from './fanout';
export {
    GROUP_ROLES,
    groupRoleSchema,
    FALLBACK_ROLE,
    decodeRole,
    canEditItems,
    canManageMembers,
} from './roles';
export type { GroupRole } from './roles';
