/**
 * Locations of the inventory collections
 *
 * users/{userId}/items           private items
 * users/{userId}/groups/{gid}    fan-out index: groups a user belongs to, with role
 * groups/{gid}                   group record (ownerUid, name, description)
 * groups/{gid}/items             shared items
 * groups/{gid}/members/{userId}  canonical membership (email, role)
 */

import { collectionPath, documentPath } from '../engine';
import type { CollectionPath, DocumentId, DocumentPath } from '../engine';

export const GROUPS = 'groups';

export function userItemsPath(userId: DocumentId): CollectionPath {
    return collectionPath('users', userId, 'items');
}

export function userGroupsPath(userId: DocumentId): CollectionPath {
    return collectionPath('users', userId, GROUPS);
}

export function membershipPath(userId: DocumentId, groupId: DocumentId): DocumentPath {
    return documentPath(userGroupsPath(userId), groupId);
}

export function groupPath(groupId: DocumentId): DocumentPath {
    return documentPath(GROUPS, groupId);
}

export function groupItemsPath(groupId: DocumentId): CollectionPath {
    return collectionPath(groupPath(groupId), 'items');
}

export function groupMembersPath(groupId: DocumentId): CollectionPath {
    return collectionPath(groupPath(groupId), 'members');
}

export function memberPath(groupId: DocumentId, userId: DocumentId): DocumentPath {
    return documentPath(groupMembersPath(groupId), userId);
}
