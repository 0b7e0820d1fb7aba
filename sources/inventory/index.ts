/**
 * Inventory call sites of the sync engine
 */

export {
    GROUPS,
    userItemsPath,
    userGroupsPath,
    membershipPath,
    groupPath,
    groupItemsPath,
    groupMembersPath,
    memberPath,
} from './paths';

export {
    itemSchema,
    memberSchema,
    membershipSchema,
    groupSchema,
    groupSummarySchema,
    itemInputSchema,
} from './schemas';
export type { InventoryItem, GroupMember, Membership, Group, GroupSummary, ItemInput } from './schemas';

export { userItemsView, groupItemsView, groupMembersView, userGroupsView } from './views';
export type { GroupListView } from './views';
export { saveItem, deleteItem } from './items';
export { openOwnerGroup, groupDeletionPlan, deleteGroup } from './groups';
export type { OwnerGroup } from './groups';
export { addMember, addMemberByEmail, updateMemberRole, removeMember } from './members';
export type { MemberDirectory, NewMember, AddedMember, AddMemberByEmailResult } from './members';
