/**
 * Projections of the inventory documents
 *
 * Stored documents are read leniently: a missing or mistyped field falls back
 * to a default instead of dropping the row.
 */

import { z } from 'zod';
import { decodeRole, type DocumentId, type GroupRole } from '../engine';

export const itemSchema = z.object({
    name: z.string().catch(''),
    description: z.string().nullable().catch(null),
    quantity: z.number().int().catch(0),
    updatedAt: z.date().nullable().catch(null),
});

export type InventoryItem = z.output<typeof itemSchema>;

export const memberSchema = z.object({
    email: z.string().catch('[email missing]'),
    role: z.unknown().transform(decodeRole),
});

export type GroupMember = z.output<typeof memberSchema>;

export const membershipSchema = z.object({
    role: z.unknown().transform(decodeRole),
});

export type Membership = z.output<typeof membershipSchema>;

export const groupSchema = z.object({
    ownerUid: z.string().min(1),
    name: z.string().catch('Group'),
    description: z.string().nullable().catch(null),
});

export type Group = z.output<typeof groupSchema>;

/**
 * Fields of a group shown in the group list
 */
export const groupSummarySchema = groupSchema.pick({ name: true, description: true });

/**
 * A group the user belongs to, joined with their role
 */
export type GroupSummary = z.output<typeof groupSummarySchema> & {
    readonly groupId: DocumentId;
    readonly role: GroupRole;
};

/**
 * Input accepted when creating or editing an item
 */
export const itemInputSchema = z.object({
    /** Present when editing an existing item */
    id: z.string().min(1).optional(),
    name: z.string().trim().min(1, 'Name is required'),
    description: z
        .string()
        .trim()
        .nullish()
        .transform(value => (value ? value : null)),
    quantity: z.number().int().nonnegative(),
});

export type ItemInput = z.input<typeof itemInputSchema>;
