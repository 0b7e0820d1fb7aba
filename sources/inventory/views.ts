/**
 * The list screens, each a materialized view over one collection
 */

import { freeze } from 'immer';
import type { z } from 'zod';
import {
    DOCUMENT_ID,
    SubscriptionRegistry,
    getLogger,
    materializedView,
    type DocumentId,
    type DocumentStore,
    type EngineConfigInput,
    type FanoutIndex,
    type MaterializedView,
} from '../engine';
import { groupItemsPath, groupMembersPath, groupPath, userGroupsPath, userItemsPath } from './paths';
import {
    groupSummarySchema,
    itemSchema,
    memberSchema,
    membershipSchema,
    type GroupMember,
    type GroupSummary,
    type InventoryItem,
    type Membership,
} from './schemas';

/**
 * A user's private items, most recently updated first
 */
export function userItemsView(
    store: DocumentStore,
    userId: DocumentId,
    config?: EngineConfigInput
): MaterializedView<InventoryItem> {
    return materializedView({
        store,
        collection: userItemsPath(userId),
        orderBy: 'updatedAt',
        direction: 'desc',
        schema: itemSchema,
        config,
        name: 'user-items',
    });
}

/**
 * A group's shared items, by name
 */
export function groupItemsView(
    store: DocumentStore,
    groupId: DocumentId,
    config?: EngineConfigInput
): MaterializedView<InventoryItem> {
    return materializedView({
        store,
        collection: groupItemsPath(groupId),
        orderBy: 'name',
        schema: itemSchema,
        config,
        name: 'group-items',
    });
}

/**
 * A group's members, by email
 */
export function groupMembersView(
    store: DocumentStore,
    groupId: DocumentId,
    config?: EngineConfigInput
): MaterializedView<GroupMember> {
    return materializedView({
        store,
        collection: groupMembersPath(groupId),
        orderBy: 'email',
        schema: memberSchema,
        config,
        name: 'group-members',
    });
}

/**
 * The user's group list: fan-out entries joined with their group documents
 */
export interface GroupListView {
    /** The underlying view of the user's fan-out entries */
    readonly memberships: MaterializedView<Membership>;
    readonly isActive: boolean;
    readonly reachedEnd: boolean;

    /**
     * Groups in fan-out order; entries whose group document is missing or not
     * loaded yet are left out
     */
    currentSnapshot(): ReadonlyArray<GroupSummary>;
    subscribe(listener: (groups: ReadonlyArray<GroupSummary>) => void): () => void;
    startSession(): Promise<void>;
    onNextPageNeeded(): Promise<void>;
    shouldLoadMore(lastVisibleIndex: number): boolean;
    reset(): Promise<void>;
    endSession(): void;
}

/**
 * Groups the user belongs to, read from their fan-out index
 * Every session start first restores the entry for the user's own group. Each
 * listed entry also follows its group document, so renames show up and a
 * deleted group drops out of the list.
 */
export function userGroupsView(
    store: DocumentStore,
    userId: DocumentId,
    fanout: FanoutIndex,
    config?: EngineConfigInput
): GroupListView {
    const logger = getLogger(['view', 'user-groups', 'group-documents']);
    const memberships = materializedView({
        store,
        collection: userGroupsPath(userId),
        orderBy: DOCUMENT_ID,
        schema: membershipSchema,
        config,
        onStart: () => fanout.ensureOwnerIndexed(userId, userId),
        name: 'user-groups',
    });

    // undefined: not loaded yet, null: no group document
    const groups = new Map<DocumentId, z.output<typeof groupSummarySchema> | null>();
    const listeners = new Set<(groups: ReadonlyArray<GroupSummary>) => void>();
    let snapshot: ReadonlyArray<GroupSummary> = freeze([], true);

    const rebuild = (): void => {
        snapshot = freeze(
            memberships.currentSnapshot().flatMap(entry => {
                const group = groups.get(entry.id);
                return group ? [{ groupId: entry.id, role: entry.fields.role, ...group }] : [];
            }),
            true
        );
        for (const listener of listeners) {
            listener(snapshot);
        }
    };

    const registry = new SubscriptionRegistry(
        store,
        (groupId, event) => {
            groups.set(groupId, event.exists ? groupSummarySchema.parse(event.snapshot.fields) : null);
            rebuild();
        },
        logger
    );

    memberships.subscribe(entries => {
        const listed = new Set(entries.map(entry => entry.id));
        for (const groupId of registry.ids()) {
            if (!listed.has(groupId)) {
                registry.close(groupId);
                groups.delete(groupId);
            }
        }
        for (const groupId of listed) {
            registry.open(groupPath(groupId));
        }
        rebuild();
    });

    return {
        memberships,

        get isActive() {
            return memberships.isActive;
        },

        get reachedEnd() {
            return memberships.reachedEnd;
        },

        currentSnapshot() {
            return snapshot;
        },

        subscribe(listener) {
            listeners.add(listener);
            return () => {
                listeners.delete(listener);
            };
        },

        startSession: () => memberships.startSession(),
        onNextPageNeeded: () => memberships.onNextPageNeeded(),
        shouldLoadMore: lastVisibleIndex => memberships.shouldLoadMore(lastVisibleIndex),
        reset: () => memberships.reset(),

        endSession() {
            memberships.endSession();
            registry.closeAll();
            groups.clear();
            listeners.clear();
        },
    };
}
