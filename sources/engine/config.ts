/**
 * Engine configuration
 */

import { z } from 'zod';
import { SyncError } from './errors';

/**
 * Hard per-batch operation limit of the backend
 */
export const MAX_BATCH_OPERATIONS = 500;

/**
 * Largest page a single query may request
 */
export const MAX_PAGE_SIZE = 500;

/**
 * Tunables shared by the materialized view and the cascading deleter
 *
 * - pageSize: documents requested per page by a view
 * - prefetchThreshold: how close to the tail a visible row must be before the
 *   next page is requested
 * - batchCap: queued operations that trigger a commit, kept below the backend limit
 * - deletionPageSize: documents read per page while draining a dependent collection
 */
export const engineConfigSchema = z.object({
    pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(50),
    prefetchThreshold: z.number().int().min(0).default(5),
    batchCap: z.number().int().min(1).max(MAX_BATCH_OPERATIONS - 1).default(450),
    deletionPageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(450),
});

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Fill defaults and validate a partial configuration
 */
export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
    const parsed = engineConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue?.path.join('.') ?? 'config';
        throw new SyncError('invalid-argument', `Invalid engine config at ${path}: ${issue?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
}
