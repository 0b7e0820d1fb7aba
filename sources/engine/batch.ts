/**
 * Size-bounded batch writer
 *
 * Queues write operations into one open batch and commits it whenever the
 * queue reaches the cap, then starts a new one. The cap stays below the
 * backend's hard per-batch limit.
 */

import type { Logger } from '@logtape/logtape';
import { MAX_BATCH_OPERATIONS } from './config';
import { CommitError, SyncError } from './errors';
import { getLogger } from './logger';
import type { DocumentStore, SetOptions, WriteBatch } from './store';
import type { DocumentPath, WriteData } from './types';

export class BatchWriter {
    private batch: WriteBatch;
    private queued = 0;
    private committedBatches = 0;
    private committedOperations = 0;
    private readonly store: DocumentStore;
    private readonly cap: number;
    private readonly logger: Logger;

    constructor(store: DocumentStore, cap: number, logger: Logger = getLogger(['batch'])) {
        if (!Number.isInteger(cap) || cap < 1 || cap >= MAX_BATCH_OPERATIONS) {
            throw new SyncError('invalid-argument', `Batch cap must be an integer between 1 and ${MAX_BATCH_OPERATIONS - 1}, got ${cap}`);
        }
        this.store = store;
        this.cap = cap;
        this.logger = logger;
        this.batch = store.batch();
    }

    /**
     * Operations queued in the open batch
     */
    get pending(): number {
        return this.queued;
    }

    /**
     * Batches committed so far
     */
    get commits(): number {
        return this.committedBatches;
    }

    /**
     * Operations committed so far
     */
    get operations(): number {
        return this.committedOperations;
    }

    async delete(path: DocumentPath): Promise<void> {
        this.batch.delete(path);
        await this.queuedOne();
    }

    async set(path: DocumentPath, data: WriteData, options?: SetOptions): Promise<void> {
        this.batch.set(path, data, options);
        await this.queuedOne();
    }

    /**
     * Delete a group of documents that belong together
     * The group goes into a single batch whenever it fits under the cap
     */
    async deleteAll(paths: readonly DocumentPath[]): Promise<void> {
        if (this.queued > 0 && this.queued + paths.length > this.cap) {
            await this.flush();
        }
        for (const path of paths) {
            await this.delete(path);
        }
    }

    /**
     * Commit the open batch if it holds anything
     *
     * @throws CommitError when the backend rejects the batch
     */
    async flush(): Promise<void> {
        if (this.queued === 0) return;

        const size = this.queued;
        try {
            await this.batch.commit();
        } catch (error) {
            throw new CommitError(size, error);
        }

        this.committedBatches++;
        this.committedOperations += size;
        this.batch = this.store.batch();
        this.queued = 0;
        this.logger.debug('Committed batch of {size} operations', { size });
    }

    private async queuedOne(): Promise<void> {
        this.queued++;
        if (this.queued >= this.cap) {
            await this.flush();
        }
    }
}
