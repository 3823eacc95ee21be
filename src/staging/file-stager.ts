/**
 * Uploads CSV files to a bucket or file container.
 *
 * The service only accepts gzip-compressed delimited files, so `.csv` input
 * is compressed before upload and `.csv.gz` input is sent unchanged. Staging
 * is best effort across a batch: a missing, unsupported or rejected file is
 * logged and skipped, and the remaining files are still sent in order.
 *
 * @module staging/file-stager
 */

import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { promisify } from 'node:util';
import { gzip as gzipCallback } from 'node:zlib';
import { MetricNames, logError } from '../observability/index.js';
import type { ServiceContext } from '../services/context.js';
import type { UploadFile } from '../transport/index.js';
import {
  EMPTY_UPLOAD_NAME,
  UploadReceiptSchema,
  type ContainerFactory,
  type SkipReason,
  type SkippedFile,
  type StagingFiles,
  type StagingResult,
  type StagingTarget,
  type UploadReceipt,
} from './types.js';

const gzip = promisify(gzipCallback);

const GZIP_CONTENT_TYPE = 'application/gzip';

type PreparedUpload = { kind: 'ready'; file: UploadFile } | { kind: 'skipped'; reason: SkipReason };

function toPathList(files: StagingFiles): string[] {
  if (files === undefined) {
    return [];
  }
  return typeof files === 'string' ? [files] : [...files];
}

/**
 * Uploads local files to a bucket or a file container.
 *
 * Each file is read whole into memory before it is sent. `.csv.gz` files go
 * out byte for byte but are buffered as well, since the multipart body is
 * built from a `Blob`.
 */
export class FileStager {
  constructor(
    private readonly context: ServiceContext,
    private readonly containers?: ContainerFactory
  ) {}

  /**
   * Uploads `files` in the given order. With no files, a single zero-length
   * gzip payload is uploaded, which empties the table when a
   * `TruncateAndInsert` bucket is completed.
   */
  async stage(target: StagingTarget, files?: StagingFiles): Promise<StagingResult> {
    const { logger } = this.context.observability;
    const paths = toPathList(files);
    const data: UploadReceipt[] = [];
    const skipped: SkippedFile[] = [];
    let containerId = target.kind === 'fileContainer' ? target.containerId : undefined;

    if (files !== undefined && paths.length === 0) {
      logger.warn('No files were given to stage');
    }

    const uploads: Array<{ path?: string; prepare: () => Promise<PreparedUpload> }> =
      files === undefined
        ? [{ prepare: async () => ({ kind: 'ready', file: await emptyUpload() }) }]
        : paths.map((path) => ({ path, prepare: () => this.prepare(path) }));

    for (let index = 0; index < uploads.length; index++) {
      const { path, prepare } = uploads[index];
      const label = path ?? EMPTY_UPLOAD_NAME;

      const prepared = await prepare();
      if (prepared.kind === 'skipped') {
        skipped.push({ path: label, reason: prepared.reason });
        continue;
      }

      if (target.kind === 'fileContainer' && containerId === undefined) {
        containerId = await this.createContainer();
        if (containerId === undefined) {
          for (const remaining of uploads.slice(index)) {
            skipped.push({ path: remaining.path ?? EMPTY_UPLOAD_NAME, reason: 'container-unavailable' });
          }
          break;
        }
      }

      const url =
        target.kind === 'bucket'
          ? `${this.context.endpoints.prism}/buckets/${encodeURIComponent(target.bucketId)}/files`
          : `${this.context.endpoints.prism}/fileContainers/${encodeURIComponent(containerId ?? '')}/files`;

      const receipt = await this.upload(url, prepared.file, label);
      if (receipt === undefined) {
        skipped.push({ path: label, reason: 'upload-failed' });
      } else {
        data.push(receipt);
      }
    }

    this.recordMetrics(target, data.length, skipped.length);

    return {
      total: data.length,
      data,
      requested: paths.length,
      skipped,
      containerId,
      ok: !(paths.length > 0 && data.length === 0),
    };
  }

  private async prepare(path: string): Promise<PreparedUpload> {
    const { logger } = this.context.observability;

    const exists = await stat(path).then(
      (stats) => stats.isFile(),
      () => false
    );
    if (!exists) {
      logger.warn(`File ${path} not found - skipping`);
      return { kind: 'skipped', reason: 'missing' };
    }

    const lower = path.toLowerCase();
    const compressed = lower.endsWith('.csv.gz');
    if (!compressed && !lower.endsWith('.csv')) {
      logger.warn(`File ${path} is not a .csv.gz or .csv file - skipping`);
      return { kind: 'skipped', reason: 'unsupported' };
    }

    try {
      const content = await readFile(path);
      if (compressed) {
        return {
          kind: 'ready',
          file: { filename: basename(path), content, contentType: GZIP_CONTENT_TYPE },
        };
      }
      return {
        kind: 'ready',
        file: { filename: `${basename(path)}.gz`, content: await gzip(content), contentType: GZIP_CONTENT_TYPE },
      };
    } catch (error) {
      logger.warn(`File ${path} could not be read - skipping`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { kind: 'skipped', reason: 'read-failed' };
    }
  }

  private async createContainer(): Promise<string | undefined> {
    const { logger } = this.context.observability;

    if (this.containers === undefined) {
      logger.error('Unable to create a file container: no container factory configured');
      return undefined;
    }

    try {
      const container = await this.containers.create();
      logger.debug('Created file container', { containerId: container.id });
      return container.id;
    } catch (error) {
      logError(logger, error, 'Unable to create a file container');
      return undefined;
    }
  }

  private async upload(url: string, file: UploadFile, label: string): Promise<UploadReceipt | undefined> {
    const { logger } = this.context.observability;

    try {
      const response = await this.context.http.upload(url, file);
      if (response.status !== 201) {
        logger.warn(`Upload of ${label} was not accepted`, { status: response.status, body: response.text });
        return undefined;
      }

      const parsed = UploadReceiptSchema.safeParse(response.body);
      logger.debug(`Uploaded ${label}`, { filename: file.filename });
      return parsed.success ? parsed.data : { name: file.filename };
    } catch (error) {
      logger.warn(`Upload of ${label} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private recordMetrics(target: StagingTarget, staged: number, skipped: number): void {
    const { metrics } = this.context.observability;
    const labels = { target: target.kind };
    if (staged > 0) {
      metrics.incrementCounter(MetricNames.FILES_STAGED, staged, labels);
    }
    if (skipped > 0) {
      metrics.incrementCounter(MetricNames.FILES_SKIPPED, skipped, labels);
    }
  }
}

async function emptyUpload(): Promise<UploadFile> {
  return {
    filename: EMPTY_UPLOAD_NAME,
    content: await gzip(Buffer.alloc(0)),
    contentType: GZIP_CONTENT_TYPE,
  };
}
