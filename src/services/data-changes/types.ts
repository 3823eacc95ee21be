import { z } from 'zod';
import { TypeReferenceSchema, type OutputType } from '../../types/index.js';

export const DataChangeSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    displayName: z.string().optional(),
    target: TypeReferenceSchema.optional(),
  })
  .passthrough();

export type DataChange = z.infer<typeof DataChangeSchema>;

export const ActivitySchema = z
  .object({
    id: z.string(),
    state: TypeReferenceSchema.optional(),
  })
  .passthrough();

export type Activity = z.infer<typeof ActivitySchema>;

export interface DataChangeListParams {
  /** Exact name, or a substring of the name or display name when `search` is set */
  name?: string;
  search?: boolean;
  limit?: number;
  offset?: number;
  /** @default 'summary' */
  type?: Exclude<OutputType, 'permissions'>;
}

export interface RunActivityOptions {
  /** File container holding the files the data change loads */
  fileContainerId?: string;
}

export type ActivityRun =
  | { state: 'Started'; activity: Activity }
  | { state: 'Rejected'; body: Record<string, unknown> };

/** Largest page the data changes endpoint returns */
export const DATA_CHANGES_PAGE_SIZE = 500;
