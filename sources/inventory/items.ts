/**
 * Item writes shared by the private and group lists
 *
 * Views pick the change up through their per-document subscriptions; nothing
 * here touches view state.
 */

import {
    SyncError,
    createDocumentId,
    documentPath,
    serverTimestamp,
    toSyncError,
    type CollectionPath,
    type DocumentId,
    type DocumentStore,
} from '../engine';
import { itemInputSchema, type ItemInput } from './schemas';

/**
 * Create an item, or update it when `input.id` is set
 * Returns the item's id
 *
 * @throws SyncError `invalid-argument` for an empty name or a negative or fractional quantity
 */
export async function saveItem(
    store: DocumentStore,
    collection: CollectionPath,
    input: ItemInput
): Promise<DocumentId> {
    const parsed = itemInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new SyncError('invalid-argument', parsed.error.issues.map(issue => issue.message).join('; '));
    }

    const { id, name, description, quantity } = parsed.data;
    const itemId = id ?? createDocumentId();
    const data = { name, description, quantity, updatedAt: serverTimestamp() };

    try {
        await store.set(documentPath(collection, itemId), data, { merge: id !== undefined });
    } catch (error) {
        throw toSyncError(error);
    }
    return itemId;
}

export async function deleteItem(
    store: DocumentStore,
    collection: CollectionPath,
    id: DocumentId
): Promise<void> {
    try {
        await store.batch().delete(documentPath(collection, id)).commit();
    } catch (error) {
        throw toSyncError(error);
    }
}
