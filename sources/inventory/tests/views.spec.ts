/**
 * Tests for the inventory list views
 */

import { describe, it, expect } from 'vitest';
import { FanoutIndex, MemoryStore } from '../../engine';
import {
    groupItemsView,
    groupMembersView,
    saveItem,
    userGroupsView,
    userItemsPath,
    userItemsView,
} from '../index';
import { settle } from '../../engine/tests/test-helpers';

describe('Inventory Views', () => {
    it('should list private items most recently updated first', async () => {
        let now = 1000;
        const store = new MemoryStore({ clock: () => now });
        await saveItem(store, userItemsPath('u1'), { name: 'Tape', quantity: 1 });
        now = 3000;
        await saveItem(store, userItemsPath('u1'), { name: 'Glue', quantity: 1 });
        now = 2000;
        await saveItem(store, userItemsPath('u1'), { name: 'Rope', quantity: 1 });

        const view = userItemsView(store, 'u1');
        await view.startSession();

        expect(view.currentSnapshot().map(entry => entry.fields.name)).toEqual(['Glue', 'Rope', 'Tape']);
        view.endSession();
    });

    it('should list group items by name, filling in malformed fields', async () => {
        const store = new MemoryStore();
        store.seed('groups/g1/items/b', { name: 'Wrench', quantity: 'three' });
        store.seed('groups/g1/items/a', { name: 'Anvil', description: 'Heavy', quantity: 1, updatedAt: new Date(5) });

        const view = groupItemsView(store, 'g1');
        await view.startSession();

        expect(view.currentSnapshot()).toEqual([
            { id: 'a', fields: { name: 'Anvil', description: 'Heavy', quantity: 1, updatedAt: new Date(5) } },
            { id: 'b', fields: { name: 'Wrench', description: null, quantity: 0, updatedAt: null } },
        ]);
        view.endSession();
    });

    it('should list members by email with decoded roles', async () => {
        const store = new MemoryStore();
        store.seed('groups/g1/members/u3', { email: 'zoe@example.com', role: 'something-else' });
        store.seed('groups/g1/members/u2', { email: 'amy@example.com', role: 'ADMIN' });
        store.seed('groups/g1/members/u4', { role: 'member' });

        const view = groupMembersView(store, 'g1');
        await view.startSession();

        expect(view.currentSnapshot()).toEqual([
            { id: 'u4', fields: { email: '[email missing]', role: 'member' } },
            { id: 'u2', fields: { email: 'amy@example.com', role: 'admin' } },
            { id: 'u3', fields: { email: 'zoe@example.com', role: 'member' } },
        ]);
        view.endSession();
    });

    describe('userGroupsView', () => {
        function seedGroups(store: MemoryStore): void {
            store.seed('groups/u1', { ownerUid: 'u1', name: 'Mine' });
            store.seed('groups/g2', { ownerUid: 'u9', name: 'Attic', description: 'Boxes' });
            store.seed('users/u1/groups/g2', { role: 'admin' });
        }

        it('should restore the owner entry and join each entry with its group', async () => {
            const store = new MemoryStore({ clock: () => 1000 });
            seedGroups(store);

            const view = userGroupsView(store, 'u1', new FanoutIndex(store));
            await view.startSession();
            await settle();

            expect(view.memberships.currentSnapshot()).toEqual([
                { id: 'g2', fields: { role: 'admin' } },
                { id: 'u1', fields: { role: 'owner' } },
            ]);
            expect(view.currentSnapshot()).toEqual([
                { groupId: 'g2', role: 'admin', name: 'Attic', description: 'Boxes' },
                { groupId: 'u1', role: 'owner', name: 'Mine', description: null },
            ]);
            expect(store.peek('users/u1/groups/u1')).toEqual({ role: 'owner', createdAt: new Date(1000) });
            view.endSession();
        });

        it('should follow a role change made elsewhere', async () => {
            const store = new MemoryStore();
            seedGroups(store);
            const view = userGroupsView(store, 'u1', new FanoutIndex(store));
            await view.startSession();
            await settle();

            store.seed('users/u1/groups/g2', { role: 'member' });
            await settle();

            expect(view.currentSnapshot()[0]).toEqual({ groupId: 'g2', role: 'member', name: 'Attic', description: 'Boxes' });
            view.endSession();
        });

        it('should follow a renamed group', async () => {
            const store = new MemoryStore();
            seedGroups(store);
            const view = userGroupsView(store, 'u1', new FanoutIndex(store));
            await view.startSession();
            await settle();

            store.seed('groups/g2', { ownerUid: 'u9', name: 'Loft', description: null });
            await settle();

            expect(view.currentSnapshot()[0]).toEqual({ groupId: 'g2', role: 'admin', name: 'Loft', description: null });
            view.endSession();
        });

        it('should drop a group whose document was deleted', async () => {
            const store = new MemoryStore();
            seedGroups(store);
            const view = userGroupsView(store, 'u1', new FanoutIndex(store));
            const published: string[][] = [];
            view.subscribe(groups => published.push(groups.map(group => group.groupId)));
            await view.startSession();
            await settle();

            await store.batch().delete('groups/g2').commit();
            await settle();

            expect(view.currentSnapshot().map(group => group.groupId)).toEqual(['u1']);
            expect(view.memberships.currentSnapshot().map(entry => entry.id)).toEqual(['g2', 'u1']);
            expect(published[published.length - 1]).toEqual(['u1']);
            view.endSession();
        });

        it('should leave out an entry whose group never existed', async () => {
            const store = new MemoryStore();
            store.seed('users/u1/groups/gone', { role: 'member' });
            const view = userGroupsView(store, 'u1', new FanoutIndex(store));
            await view.startSession();
            await settle();

            expect(view.memberships.currentSnapshot().map(entry => entry.id)).toEqual(['gone']);
            expect(view.currentSnapshot()).toEqual([]);
            view.endSession();
        });

        it('should close the group subscriptions with the session', async () => {
            const store = new MemoryStore();
            seedGroups(store);
            const view = userGroupsView(store, 'u1', new FanoutIndex(store));
            await view.startSession();
            await settle();
            expect(store.listenerCount('groups/g2')).toBe(1);

            view.endSession();

            expect(store.listenerCount()).toBe(0);
            expect(view.isActive).toBe(false);
        });
    });
});
