import { z } from 'zod';
import { TypeReferenceSchema, type LoadOperation, type OutputType } from '../../types/index.js';

export const BucketRecordSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    displayName: z.string().optional(),
    state: TypeReferenceSchema.optional(),
    operation: TypeReferenceSchema.optional(),
    targetDataset: z
      .object({
        id: z.string(),
        descriptor: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Bucket = z.infer<typeof BucketRecordSchema>;

export interface BucketListParams {
  /** Exact bucket name, or a substring when `search` is set */
  name?: string;
  search?: boolean;
  limit?: number;
  offset?: number;
  /** @default 'summary' */
  type?: Exclude<OutputType, 'permissions'>;
  /** Only buckets targeting this table id */
  tableId?: string;
  /** Only buckets targeting this table name (substring when `search` is set) */
  tableName?: string;
}

export interface BucketCreateParams {
  tableId?: string;
  tableName?: string;
  /** Schema object, or the path of a JSON file holding one */
  schema?: Record<string, unknown> | string;
  /** Bucket name; generated when omitted */
  name?: string;
  /** @default 'TruncateAndInsert' */
  operation?: LoadOperation;
}

/**
 * Outcome of completing a bucket. A `Rejected` body is the service's error
 * payload, returned unchanged.
 */
export type BucketCompletion =
  | { state: 'Completed'; body: unknown }
  | { state: 'Rejected'; body: Record<string, unknown> };

/** Largest page the buckets endpoint returns */
export const BUCKETS_PAGE_SIZE = 100;

/** Prefix of generated bucket names */
export const BUCKET_NAME_PREFIX = 'prism_loader_';
