/**
 * Membership roles
 */

import { z } from 'zod';
import { getLogger } from './logger';

export const GROUP_ROLES = ['owner', 'admin', 'member'] as const;

export const groupRoleSchema = z.enum(GROUP_ROLES);

export type GroupRole = z.infer<typeof groupRoleSchema>;

/**
 * Role given to a stored value that is missing or not one of GROUP_ROLES
 */
export const FALLBACK_ROLE: GroupRole = 'member';

const logger = getLogger(['roles']);

/**
 * Decode a stored role, ignoring case
 * Anything that is not a known role deliberately becomes FALLBACK_ROLE
 */
export function decodeRole(value: unknown): GroupRole {
    const parsed = groupRoleSchema.safeParse(typeof value === 'string' ? value.trim().toLowerCase() : value);
    if (parsed.success) {
        return parsed.data;
    }

    logger.debug('Unrecognized role {value}, using {fallback}', { value, fallback: FALLBACK_ROLE });
    return FALLBACK_ROLE;
}

/**
 * Owners and admins may add, edit and delete items
 */
export function canEditItems(role: GroupRole): boolean {
    return role === 'owner' || role === 'admin';
}

/**
 * Only the owner manages members
 */
export function canManageMembers(role: GroupRole): boolean {
    return role === 'owner';
}
