/**
 * Loads files into a table: create a bucket, stage the files, complete the bucket.
 *
 * @module load/orchestrator
 */

import type { Bucket, BucketsService } from '../services/buckets/index.js';
import type { StagingFiles, StagingResult } from '../staging/index.js';
import type { LoadOperation } from '../types/index.js';
import { createNoopObservability, type Observability } from '../observability/index.js';

/**
 * Table a load writes to, by id or API name.
 */
export interface LoadTarget {
  tableId?: string;
  tableName?: string;
}

export type LoadResult =
  /** Nothing was staged; the bucket is left in the New state */
  | { status: 'NotStaged'; bucket: Bucket; files: StagingResult }
  | { status: 'Completed'; body: unknown; bucket: Bucket; files: StagingResult }
  /** The service refused the load; `body` is its error payload, unchanged */
  | { status: 'Rejected'; body: Record<string, unknown>; bucket: Bucket; files: StagingResult };

export class LoadOrchestrator {
  private readonly observability: Observability;

  constructor(
    private readonly buckets: BucketsService,
    observability?: Observability
  ) {
    this.observability = observability ?? createNoopObservability();
  }

  /**
   * Creates a bucket for `target`, uploads `files` to it and completes it.
   * Bucket creation and completion errors propagate.
   */
  async load(target: LoadTarget, files: StagingFiles, operation: LoadOperation = 'TruncateAndInsert'): Promise<LoadResult> {
    const { logger } = this.observability;

    const bucket = await this.buckets.create({ tableId: target.tableId, tableName: target.tableName, operation });
    const staged = await this.buckets.upload(bucket.id, files);

    if (staged.total === 0) {
      logger.warn(`No files were staged to bucket ${bucket.id}; it was not completed`, {
        skipped: staged.skipped.length,
      });
      return { status: 'NotStaged', bucket, files: staged };
    }

    const completion = await this.buckets.complete(bucket.id);
    if (completion.state === 'Rejected') {
      return { status: 'Rejected', body: completion.body, bucket, files: staged };
    }
    return { status: 'Completed', body: completion.body, bucket, files: staged };
  }

  /**
   * Removes every row of the table by completing a `TruncateAndInsert` bucket holding an empty file.
   */
  async truncate(target: LoadTarget): Promise<LoadResult> {
    return this.load(target, undefined, 'TruncateAndInsert');
  }
}
