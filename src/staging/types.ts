import { z } from 'zod';
import type { PagedResult } from '../types/index.js';

/**
 * Service acknowledgement of one uploaded file.
 */
export const UploadReceiptSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    fileLength: z.number().optional(),
  })
  .passthrough();

export type UploadReceipt = z.infer<typeof UploadReceiptSchema>;

export type StagingTarget =
  | { kind: 'bucket'; bucketId: string }
  /** Without an id a container is created on the first upload */
  | { kind: 'fileContainer'; containerId?: string };

export type StagingFiles = string | readonly string[] | undefined;

export type SkipReason = 'missing' | 'unsupported' | 'read-failed' | 'upload-failed' | 'container-unavailable';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface StagingResult extends PagedResult<UploadReceipt> {
  /** Number of paths the caller asked for; 0 for the empty truncate upload */
  requested: number;
  skipped: SkippedFile[];
  /** Container the files went to, for file-container targets */
  containerId?: string;
  /** False only when paths were requested and none was staged */
  ok: boolean;
}

/**
 * Creates file containers on demand.
 */
export interface ContainerFactory {
  create(): Promise<{ id: string }>;
}

/** Name of the zero-length upload used when no files are given */
export const EMPTY_UPLOAD_NAME = 'empty.csv.gz';
