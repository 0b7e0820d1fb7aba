/**
 * Cascading deletion of a root document and its dependent object graph
 *
 * The backend offers no transaction spanning unbounded data, so the graph is
 * removed in size-bounded batches, children before their parent. Every step
 * treats a missing document as already handled: a run that failed halfway can
 * be started again from scratch and will finish the job.
 */

import { BatchWriter } from './batch';
import { resolveConfig, type EngineConfigInput } from './config';
import { toSyncError, type SyncError } from './errors';
import { paginate } from './fetcher';
import { getLogger } from './logger';
import type { DocumentStore } from './store';
import {
    DOCUMENT_ID,
    type CollectionPath,
    type DocumentId,
    type DocumentPath,
    type DocumentSnapshot,
} from './types';

/**
 * A collection emptied before the root is removed
 */
export interface DependentCollection {
    /** Label used in logs */
    readonly name: string;
    readonly collection: (root: DocumentSnapshot) => CollectionPath;
    /**
     * Records outside the collection that belong to one of its documents
     * (e.g. a member's reverse-index entry); deleted in the same batch as it
     */
    readonly linked?: (document: DocumentSnapshot, root: DocumentSnapshot) => DocumentPath[];
}

/**
 * What to delete for a root id, in order
 */
export interface DeletionPlan {
    readonly root: (rootId: DocumentId) => DocumentPath;
    /** Drained in declared order */
    readonly dependents: readonly DependentCollection[];
    /**
     * Root-level records located through the root's fields, deleted right
     * before the root itself
     */
    readonly auxiliary?: (root: DocumentSnapshot) => DocumentPath[];
}

export type DeletionResult =
    | {
        readonly ok: true;
        /** The root was already gone; nothing was written */
        readonly alreadyDeleted: boolean;
        /** Delete operations committed, including blind deletes of absent records */
        readonly deleted: number;
        readonly commits: number;
    }
    | {
        readonly ok: false;
        readonly error: SyncError;
        /** Operations committed before the failure; those stay deleted */
        readonly deleted: number;
        readonly commits: number;
    };

export interface CascadingDeleter {
    /**
     * Delete the root and everything the plan hangs off it
     * Never rejects; failures come back as `{ ok: false }`
     */
    deleteCascade(rootId: DocumentId): Promise<DeletionResult>;
}

// One run per root document and store at a time, shared by every deleter
const runs = new WeakMap<DocumentStore, Map<DocumentPath, Promise<DeletionResult>>>();

function runningDeletions(store: DocumentStore): Map<DocumentPath, Promise<DeletionResult>> {
    let running = runs.get(store);
    if (!running) {
        running = new Map();
        runs.set(store, running);
    }
    return running;
}

/**
 * Create a deleter for one plan
 * Concurrent calls for the same root on the same store join the run in flight,
 * even through different deleters
 *
 * @example
 * const deleter = cascadingDeleter(store, {
 *   root: id => `groups/${id}`,
 *   dependents: [{ name: 'items', collection: root => `${root.path}/items` }],
 * });
 * const result = await deleter.deleteCascade('g1');
 */
export function cascadingDeleter(
    store: DocumentStore,
    plan: DeletionPlan,
    configInput?: EngineConfigInput
): CascadingDeleter {
    const config = resolveConfig(configInput);
    const logger = getLogger(['deletion']);

    const run = async (rootId: DocumentId): Promise<DeletionResult> => {
        const writer = new BatchWriter(store, config.batchCap, logger);

        try {
            const root = await store.get(plan.root(rootId));
            if (!root) {
                logger.debug('Root {rootId} already deleted', { rootId });
                return { ok: true, alreadyDeleted: true, deleted: 0, commits: 0 };
            }

            for (const dependent of plan.dependents) {
                const pages = paginate(store, {
                    collection: dependent.collection(root),
                    orderBy: DOCUMENT_ID,
                    limit: config.deletionPageSize,
                });
                let count = 0;
                for await (const page of pages) {
                    for (const document of page) {
                        await writer.deleteAll([document.path, ...(dependent.linked?.(document, root) ?? [])]);
                    }
                    count += page.length;
                }
                logger.debug('Queued {count} documents of {name} for {rootId}', { count, name: dependent.name, rootId });
            }

            await writer.deleteAll([...(plan.auxiliary?.(root) ?? []), root.path]);
            await writer.flush();

            logger.info('Deleted {rootId} in {commits} commits', { rootId, commits: writer.commits });
            return { ok: true, alreadyDeleted: false, deleted: writer.operations, commits: writer.commits };
        } catch (cause) {
            const error = toSyncError(cause);
            logger.error('Deletion of {rootId} aborted after {commits} commits: {message}', {
                rootId,
                commits: writer.commits,
                message: error.message,
            });
            return { ok: false, error, deleted: writer.operations, commits: writer.commits };
        }
    };

    return {
        deleteCascade(rootId) {
            const path = plan.root(rootId);
            const running = runningDeletions(store);
            const existing = running.get(path);
            if (existing) return existing;

            const result = run(rootId).finally(() => {
                running.delete(path);
            });
            running.set(path, result);
            return result;
        },
    };
}
