/**
 * Shared test utilities
 */

import type { MemoryStore } from '../memory-store';
import type { CollectionPath, WriteData } from '../types';

/**
 * Wait until every pending subscription event has been delivered
 */
export function settle(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, 0));
}

/**
 * Seed `count` documents with zero-padded ids (`d0000`, `d0001`, ...)
 */
export function seedMany(
    store: MemoryStore,
    collection: CollectionPath,
    count: number,
    fields: (index: number) => WriteData = () => ({})
): void {
    for (let i = 0; i < count; i++) {
        store.seed(`${collection}/d${String(i).padStart(4, '0')}`, fields(i));
    }
}
