/**
 * Group lifecycle: opening the owner's group and deleting a group with
 * everything that hangs off it
 */

import {
    SyncError,
    cascadingDeleter,
    serverTimestamp,
    toSyncError,
    type DeletionPlan,
    type DeletionResult,
    type DocumentId,
    type DocumentStore,
    type EngineConfigInput,
    type FanoutIndex,
} from '../engine';
import { groupItemsPath, groupMembersPath, groupPath, membershipPath } from './paths';
import { groupSchema } from './schemas';

/**
 * Every user owns at most one group, stored under their own id
 */
export interface OwnerGroup {
    readonly groupId: DocumentId;
    readonly name: string;
    /** The group did not exist and was created by this call */
    readonly created: boolean;
    /** The owner's fan-out entry was written */
    readonly indexed: boolean;
}

/**
 * Open the owner's group, creating it first when it does not exist
 *
 * @throws SyncError when the group cannot be read or created
 */
export async function openOwnerGroup(
    store: DocumentStore,
    fanout: FanoutIndex,
    ownerId: DocumentId,
    defaultName: string
): Promise<OwnerGroup> {
    const path = groupPath(ownerId);
    let name = defaultName;
    let created = false;

    try {
        const existing = await store.get(path);
        if (existing) {
            const parsed = groupSchema.safeParse(existing.fields);
            if (parsed.success) name = parsed.data.name;
        } else {
            await store.set(path, {
                ownerUid: ownerId,
                name: defaultName,
                description: null,
                createdAt: serverTimestamp(),
                updatedAt: serverTimestamp(),
            });
            created = true;
        }
    } catch (error) {
        throw toSyncError(error);
    }

    const indexed = await fanout.upsert(ownerId, ownerId, 'owner');
    return { groupId: ownerId, name, created, indexed };
}

/**
 * Items first, then members together with their fan-out entries, then the
 * owner's fan-out entry and the group itself
 */
export const groupDeletionPlan: DeletionPlan = {
    root: groupPath,
    dependents: [
        {
            name: 'items',
            collection: root => groupItemsPath(root.id),
        },
        {
            name: 'members',
            collection: root => groupMembersPath(root.id),
            linked: (member, root) => [membershipPath(member.id, root.id)],
        },
    ],
    auxiliary: root => {
        const ownerUid = root.fields.ownerUid;
        if (typeof ownerUid !== 'string' || ownerUid.length === 0) {
            throw new SyncError('invalid-document', `Group ${root.id} has no ownerUid`);
        }
        return [membershipPath(ownerUid, root.id)];
    },
};

/**
 * Delete a group and its whole object graph
 * Safe to call again after a failure, or on a group that is already gone
 */
export function deleteGroup(
    store: DocumentStore,
    groupId: DocumentId,
    config?: EngineConfigInput
): Promise<DeletionResult> {
    return cascadingDeleter(store, groupDeletionPlan, config).deleteCascade(groupId);
}
