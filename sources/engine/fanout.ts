/**
 * Fan-out index maintainer
 *
 * Keeps `users/{memberId}/groups/{rootId}` (which groups a member belongs to,
 * and with what role) in line with the canonical membership records. The index
 * is a read optimisation, so writes here are best effort: failures are logged
 * and reported as a value, never thrown. Removing entries is left to the
 * cascading deleter's plan.
 */

import type { Logger } from '@logtape/logtape';
import { collectionPath, documentPath, serverTimestamp } from './helpers';
import { getLogger } from './logger';
import type { GroupRole } from './roles';
import type { DocumentStore } from './store';
import type { DocumentId, DocumentPath } from './types';

/**
 * Outcome of ensureOwnerIndexed()
 *
 * - present: the entry already existed
 * - healed: the entry was missing and has been written
 * - missing-root: there is no root to index
 * - failed: a read or the write failed (logged)
 */
export type OwnerIndexStatus = 'present' | 'healed' | 'missing-root' | 'failed';

export class FanoutIndex {
    private readonly store: DocumentStore;
    private readonly rootCollection: string;
    private readonly logger: Logger;

    /**
     * @param rootCollection - collection holding the indexed roots (default: `groups`)
     */
    constructor(store: DocumentStore, rootCollection = 'groups', logger: Logger = getLogger(['fanout'])) {
        this.store = store;
        this.rootCollection = rootCollection;
        this.logger = logger;
    }

    /**
     * Location of a member's index entry for a root
     */
    indexPath(memberId: DocumentId, rootId: DocumentId): DocumentPath {
        return documentPath(collectionPath('users', memberId, this.rootCollection), rootId);
    }

    /**
     * Merge the member's role into their index entry
     * Returns false when the write failed
     */
    async upsert(memberId: DocumentId, rootId: DocumentId, role: GroupRole): Promise<boolean> {
        const path = this.indexPath(memberId, rootId);
        try {
            await this.store.set(path, { role }, { merge: true });
            return true;
        } catch (error) {
            this.logger.warn('Could not update index entry {path}', { path, error });
            return false;
        }
    }

    /**
     * Write the owner's index entry if the root exists but the entry does not
     * Meant to run once per session start
     */
    async ensureOwnerIndexed(ownerId: DocumentId, rootId: DocumentId): Promise<OwnerIndexStatus> {
        const path = this.indexPath(ownerId, rootId);
        try {
            if (await this.store.get(path)) {
                return 'present';
            }
            if (!(await this.store.get(documentPath(this.rootCollection, rootId)))) {
                return 'missing-root';
            }
            await this.store.set(path, { role: 'owner', createdAt: serverTimestamp() }, { merge: true });
            this.logger.info('Restored missing owner index entry {path}', { path });
            return 'healed';
        } catch (error) {
            this.logger.warn('Could not reconcile owner index entry {path}', { path, error });
            return 'failed';
        }
    }
}
