/**
 * Membership writes
 *
 * The member record under the group is canonical; the fan-out entry under the
 * user mirrors its role. Role changes and removals touch both in one batch.
 */

import {
    CommitError,
    SyncError,
    toSyncError,
    type DocumentId,
    type DocumentSnapshot,
    type DocumentStore,
    type FanoutIndex,
    type GroupRole,
} from '../engine';
import { memberPath, membershipPath } from './paths';
import { memberSchema } from './schemas';

/**
 * Server-side lookup of a user id by email
 *
 * Clients never read an email → id index themselves, since any signed-in
 * client could enumerate it. Implementations call a backend endpoint that
 * applies its own access rules.
 */
export interface MemberDirectory {
    resolve(email: string): Promise<DocumentId | null>;
}

export interface NewMember {
    readonly userId: DocumentId;
    readonly email: string;
}

export interface AddedMember {
    readonly userId: DocumentId;
    /** The member's fan-out entry was written */
    readonly indexed: boolean;
}

export type AddMemberByEmailResult =
    | ({ readonly ok: true } & AddedMember)
    | { readonly ok: false; readonly reason: 'not-found'; readonly email: string };

function normalizeEmail(email: string): string {
    const normalized = email.trim().toLowerCase();
    if (normalized.length === 0) {
        throw new SyncError('invalid-argument', 'Email is required');
    }
    return normalized;
}

/**
 * Add a user to a group as a plain member
 */
export async function addMember(
    store: DocumentStore,
    fanout: FanoutIndex,
    groupId: DocumentId,
    member: NewMember
): Promise<AddedMember> {
    const email = normalizeEmail(member.email);
    try {
        await store.set(memberPath(groupId, member.userId), { role: 'member', email });
    } catch (error) {
        throw toSyncError(error);
    }

    const indexed = await fanout.upsert(member.userId, groupId, 'member');
    return { userId: member.userId, indexed };
}

/**
 * Resolve an email through the directory, then add that user
 */
export async function addMemberByEmail(
    store: DocumentStore,
    fanout: FanoutIndex,
    directory: MemberDirectory,
    groupId: DocumentId,
    email: string
): Promise<AddMemberByEmailResult> {
    const normalized = normalizeEmail(email);

    let userId: DocumentId | null;
    try {
        userId = await directory.resolve(normalized);
    } catch (error) {
        throw toSyncError(error);
    }
    if (!userId) {
        return { ok: false, reason: 'not-found', email: normalized };
    }

    const added = await addMember(store, fanout, groupId, { userId, email: normalized });
    return { ok: true, ...added };
}

/**
 * Reject changes to the owner's membership, and to members that do not exist
 */
async function assertChangeableMember(
    store: DocumentStore,
    groupId: DocumentId,
    userId: DocumentId
): Promise<void> {
    let snapshot: DocumentSnapshot | null;
    try {
        snapshot = await store.get(memberPath(groupId, userId));
    } catch (error) {
        throw toSyncError(error);
    }
    if (!snapshot) {
        throw new SyncError('invalid-argument', `User ${userId} is not a member of ${groupId}`);
    }
    if (memberSchema.parse(snapshot.fields).role === 'owner') {
        throw new SyncError('invalid-argument', `The owner of ${groupId} cannot be changed`);
    }
}

/**
 * Promote or demote a member; the role is written to both records at once
 *
 * @throws SyncError `invalid-argument` for the owner role or the owner's membership
 * @throws CommitError when the batch is rejected
 */
export async function updateMemberRole(
    store: DocumentStore,
    groupId: DocumentId,
    userId: DocumentId,
    role: GroupRole
): Promise<void> {
    if (role === 'owner') {
        throw new SyncError('invalid-argument', 'Ownership cannot be assigned');
    }
    await assertChangeableMember(store, groupId, userId);

    const batch = store.batch()
        .set(memberPath(groupId, userId), { role }, { merge: true })
        .set(membershipPath(userId, groupId), { role }, { merge: true });
    try {
        await batch.commit();
    } catch (error) {
        throw new CommitError(batch.size, error);
    }
}

/**
 * Remove a member and their fan-out entry at once
 *
 * @throws SyncError `invalid-argument` for the owner's membership
 * @throws CommitError when the batch is rejected
 */
export async function removeMember(
    store: DocumentStore,
    groupId: DocumentId,
    userId: DocumentId
): Promise<void> {
    await assertChangeableMember(store, groupId, userId);

    const batch = store.batch()
        .delete(memberPath(groupId, userId))
        .delete(membershipPath(userId, groupId));
    try {
        await batch.commit();
    } catch (error) {
        throw new CommitError(batch.size, error);
    }
}
