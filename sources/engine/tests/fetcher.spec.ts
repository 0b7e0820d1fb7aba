/**
 * Tests for the remote page fetcher
 */

import { describe, it, expect } from 'vitest';
import {
    DOCUMENT_ID,
    FetchError,
    MemoryStore,
    SyncError,
    cursorOf,
    fetchPage,
    paginate,
} from '../index';
import { seedMany } from './test-helpers';

describe('Page Fetcher', () => {
    describe('fetchPage', () => {
        it('should return the first page ordered by the sort field', async () => {
            const store = new MemoryStore();
            store.seed('items/x', { name: 'Washer' });
            store.seed('items/y', { name: 'Bolt' });
            store.seed('items/z', { name: 'Nut' });

            const page = await fetchPage(store, { collection: 'items', orderBy: 'name', limit: 2 });

            expect(page.map(doc => doc.fields.name)).toEqual(['Bolt', 'Nut']);
        });

        it('should continue strictly after the cursor of the previous page', async () => {
            const store = new MemoryStore();
            store.seed('items/x', { name: 'Washer' });
            store.seed('items/y', { name: 'Bolt' });
            store.seed('items/z', { name: 'Nut' });

            const first = await fetchPage(store, { collection: 'items', orderBy: 'name', limit: 2 });
            const second = await fetchPage(store, {
                collection: 'items',
                orderBy: 'name',
                after: cursorOf(first[first.length - 1], 'name'),
                limit: 2,
            });

            expect(second.map(doc => doc.id)).toEqual(['x']);
        });

        it('should return an empty page past the end', async () => {
            const store = new MemoryStore();
            store.seed('items/x', { name: 'Washer' });

            const page = await fetchPage(store, {
                collection: 'items',
                orderBy: 'name',
                after: { id: 'x', value: 'Washer' },
                limit: 50,
            });

            expect(page).toEqual([]);
        });

        it.each([0, -1, 1.5, 501])('should reject a limit of %s before querying', async limit => {
            const store = new MemoryStore();

            const result = fetchPage(store, { collection: 'items', orderBy: 'name', limit });

            await expect(result).rejects.toBeInstanceOf(SyncError);
            await expect(result).rejects.toMatchObject({ code: 'invalid-argument' });
            expect(store.queries).toBe(0);
        });

        it('should report backend failures as transient', async () => {
            const store = new MemoryStore();
            store.failNext('query', 'unavailable');

            const result = fetchPage(store, { collection: 'items', orderBy: 'name', limit: 10 });

            await expect(result).rejects.toBeInstanceOf(FetchError);
            await expect(result).rejects.toMatchObject({ code: 'transient', collection: 'items' });
        });

        it('should report permission failures distinctly', async () => {
            const store = new MemoryStore();
            store.failNext('query', 'permission-denied');

            await expect(
                fetchPage(store, { collection: 'items', orderBy: 'name', limit: 10 })
            ).rejects.toMatchObject({ code: 'permission-denied' });
        });
    });

    describe('cursorOf', () => {
        it('should take the sort field value', () => {
            const cursor = cursorOf({ id: 'a', path: 'items/a', fields: { quantity: 4 } }, 'quantity');

            expect(cursor).toEqual({ id: 'a', value: 4 });
        });

        it('should use null for a missing sort field', () => {
            const cursor = cursorOf({ id: 'a', path: 'items/a', fields: {} }, 'quantity');

            expect(cursor).toEqual({ id: 'a', value: null });
        });

        it('should use the id when sorting by document id', () => {
            const cursor = cursorOf({ id: 'a', path: 'items/a', fields: {} }, DOCUMENT_ID);

            expect(cursor).toEqual({ id: 'a', value: 'a' });
        });
    });

    describe('paginate', () => {
        it('should yield every page until an empty one comes back', async () => {
            const store = new MemoryStore();
            seedMany(store, 'items', 5);

            const pages: string[][] = [];
            for await (const page of paginate(store, { collection: 'items', orderBy: DOCUMENT_ID, limit: 2 })) {
                pages.push(page.map(doc => doc.id));
            }

            expect(pages).toEqual([['d0000', 'd0001'], ['d0002', 'd0003'], ['d0004']]);
            expect(store.queries).toBe(4);
        });

        it('should keep its place while the pages it returned are deleted', async () => {
            const store = new MemoryStore();
            seedMany(store, 'items', 3);

            const seen: string[] = [];
            for await (const page of paginate(store, { collection: 'items', orderBy: DOCUMENT_ID, limit: 1 })) {
                seen.push(page[0].id);
                await store.batch().delete(page[0].path).commit();
            }

            expect(seen).toEqual(['d0000', 'd0001', 'd0002']);
            expect(store.list('items')).toEqual([]);
        });
    });
});
