/**
 * Tests for cascading deletion
 */

import { describe, it, expect } from 'vitest';
import {
    CommitError,
    MemoryStore,
    SyncError,
    cascadingDeleter,
    type DeletionPlan,
    type WriteBatch,
} from '../index';
import { seedMany } from './test-helpers';

const plan: DeletionPlan = {
    root: id => `groups/${id}`,
    dependents: [
        { name: 'items', collection: root => `${root.path}/items` },
        {
            name: 'members',
            collection: root => `${root.path}/members`,
            linked: (member, root) => [`users/${member.id}/groups/${root.id}`],
        },
    ],
    auxiliary: root => [`users/${String(root.fields.ownerUid)}/groups/${root.id}`],
};

/**
 * Fails every commit once `failAfterCommits` batches went through
 */
class FlakyStore extends MemoryStore {
    failAfterCommits = Number.POSITIVE_INFINITY;

    override batch(): WriteBatch {
        if (this.commits.length >= this.failAfterCommits) {
            this.failNext('commit');
        }
        return super.batch();
    }
}

function seedGroup(store: MemoryStore, items: number, members: string[] = []): void {
    store.seed('groups/g1', { ownerUid: 'owner', name: 'Garage' });
    store.seed('users/owner/groups/g1', { role: 'owner' });
    seedMany(store, 'groups/g1/items', items, i => ({ name: `item ${i}` }));
    for (const member of members) {
        store.seed(`groups/g1/members/${member}`, { role: 'member', email: `${member}@example.com` });
        store.seed(`users/${member}/groups/g1`, { role: 'member' });
    }
}

describe('Cascading Deletion', () => {
    it('should stay under the batch cap on a large collection', async () => {
        const store = new MemoryStore();
        seedGroup(store, 1234);

        const result = await cascadingDeleter(store, plan).deleteCascade('g1');

        // 1234 items, then the owner index entry and the root
        expect(store.commits).toEqual([450, 450, 336]);
        expect(result).toEqual({ ok: true, alreadyDeleted: false, deleted: 1236, commits: 3 });
        expect(store.list('groups/g1/items')).toEqual([]);
        expect(store.peek('groups/g1')).toBeUndefined();
    });

    it('should delete a root without dependents in a single commit', async () => {
        const store = new MemoryStore();
        store.seed('groups/g1', { ownerUid: 'owner' });

        const result = await cascadingDeleter(store, { root: id => `groups/${id}`, dependents: [] }).deleteCascade('g1');

        expect(store.commits).toEqual([1]);
        expect(result).toEqual({ ok: true, alreadyDeleted: false, deleted: 1, commits: 1 });
    });

    it('should remove linked records together with their document', async () => {
        const store = new MemoryStore();
        seedGroup(store, 0, ['m1', 'm2']);

        const result = await cascadingDeleter(store, plan, { batchCap: 3 }).deleteCascade('g1');

        // Each member with its index entry, then the owner entry with the root
        expect(store.commits).toEqual([2, 2, 2]);
        expect(result.ok).toBe(true);
        expect(store.peek('users/m1/groups/g1')).toBeUndefined();
        expect(store.peek('users/m2/groups/g1')).toBeUndefined();
        expect(store.peek('users/owner/groups/g1')).toBeUndefined();
        expect(store.list('groups/g1/members')).toEqual([]);
    });

    it('should report success without writing when the root is already gone', async () => {
        const store = new MemoryStore();

        const result = await cascadingDeleter(store, plan).deleteCascade('missing');

        expect(result).toEqual({ ok: true, alreadyDeleted: true, deleted: 0, commits: 0 });
        expect(store.commits).toEqual([]);
    });

    it('should be a no-op the second time', async () => {
        const store = new MemoryStore();
        seedGroup(store, 3, ['m1']);
        const deleter = cascadingDeleter(store, plan);

        await deleter.deleteCascade('g1');
        const again = await deleter.deleteCascade('g1');

        expect(again).toEqual({ ok: true, alreadyDeleted: true, deleted: 0, commits: 0 });
        expect(store.commits).toEqual([7]);
    });

    it('should finish the job when run again after a failed commit', async () => {
        const store = new FlakyStore();
        seedMany(store, 'groups/g1/items', 10);
        store.seed('groups/g1', { ownerUid: 'owner' });
        const deleter = cascadingDeleter(store, { root: id => `groups/${id}`, dependents: plan.dependents }, { batchCap: 4 });

        store.failAfterCommits = 1;
        const failed = await deleter.deleteCascade('g1');

        expect(failed.ok).toBe(false);
        if (!failed.ok) {
            expect(failed.error).toBeInstanceOf(CommitError);
            expect(failed.error.code).toBe('transient');
            expect(failed.deleted).toBe(4);
            expect(failed.commits).toBe(1);
        }
        expect(store.list('groups/g1/items')).toHaveLength(6);
        expect(store.peek('groups/g1')).toEqual({ ownerUid: 'owner' });

        store.failAfterCommits = Number.POSITIVE_INFINITY;
        const retried = await deleter.deleteCascade('g1');

        expect(retried).toEqual({ ok: true, alreadyDeleted: false, deleted: 7, commits: 2 });
        expect(store.commits).toEqual([4, 4, 3]);
        expect(store.list('groups/g1/items')).toEqual([]);
        expect(store.peek('groups/g1')).toBeUndefined();
    });

    it('should return a failure when the root cannot be read', async () => {
        const store = new MemoryStore();
        seedGroup(store, 1);
        store.failNext('get', 'permission-denied');

        const result = await cascadingDeleter(store, plan).deleteCascade('g1');

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe('permission-denied');
            expect(result.commits).toBe(0);
        }
        expect(store.peek('groups/g1')).toBeDefined();
    });

    it('should leave the root in place when root-level records cannot be located', async () => {
        const store = new MemoryStore();
        store.seed('groups/g1', { name: 'No owner' });
        const deleter = cascadingDeleter(store, {
            root: id => `groups/${id}`,
            dependents: [],
            auxiliary: () => {
                throw new SyncError('invalid-document', 'Root has no owner');
            },
        });

        const result = await deleter.deleteCascade('g1');

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe('invalid-document');
        }
        expect(store.peek('groups/g1')).toEqual({ name: 'No owner' });
    });

    it('should share one run between concurrent calls for the same root', async () => {
        const store = new MemoryStore();
        store.seed('groups/g1', { ownerUid: 'owner' });
        const deleter = cascadingDeleter(store, { root: id => `groups/${id}`, dependents: [] });

        const [first, second] = await Promise.all([deleter.deleteCascade('g1'), deleter.deleteCascade('g1')]);

        expect(first).toBe(second);
        expect(store.commits).toEqual([1]);
    });

    it('should share one run between deleters working on the same store', async () => {
        const store = new MemoryStore();
        seedGroup(store, 2);

        const [first, second] = await Promise.all([
            cascadingDeleter(store, plan).deleteCascade('g1'),
            cascadingDeleter(store, plan, { batchCap: 10 }).deleteCascade('g1'),
        ]);

        expect(first).toBe(second);
        expect(store.commits).toEqual([4]);
    });

    it('should not share runs across stores', async () => {
        const one = new MemoryStore();
        const two = new MemoryStore();
        one.seed('groups/g1', { ownerUid: 'owner' });
        two.seed('groups/g1', { ownerUid: 'owner' });
        const rootOnly: DeletionPlan = { root: id => `groups/${id}`, dependents: [] };

        const [first, second] = await Promise.all([
            cascadingDeleter(one, rootOnly).deleteCascade('g1'),
            cascadingDeleter(two, rootOnly).deleteCascade('g1'),
        ]);

        expect(first).not.toBe(second);
        expect(one.commits).toEqual([1]);
        expect(two.commits).toEqual([1]);
    });

    it('should refuse a cap at or above the backend limit', () => {
        expect(() => cascadingDeleter(new MemoryStore(), plan, { batchCap: 500 })).toThrow(SyncError);
    });
});
