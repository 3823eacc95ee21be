import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { FileStager } from '../file-stager.js';
import { MetricNames } from '../../observability/index.js';
import type { HttpRequest } from '../../transport/index.js';
import { createTestContext, jsonResponse, textResponse, type TestContext } from '../../__mocks__/index.js';

const BUCKET_FILES = '/buckets/B1/files';

function receipt(request: HttpRequest) {
  return jsonResponse(201, { id: `file-${request.file?.filename ?? ''}`, name: request.file?.filename });
}

describe('FileStager', () => {
  let test: TestContext;
  let dir: string;

  beforeEach(async () => {
    test = createTestContext();
    dir = await mkdtemp(join(tmpdir(), 'prism-stager-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('bucket target', () => {
    it('should compress .csv files, send .csv.gz files unchanged and skip missing files', async () => {
      const csv = join(dir, 'a.csv');
      const gz = join(dir, 'b.csv.gz');
      await writeFile(csv, 'id,amount\n1,10\n');
      await writeFile(gz, gzipSync('id,amount\n2,20\n'));
      test.http.on('POST', BUCKET_FILES, receipt);

      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, [
        csv,
        join(dir, 'missing.csv'),
        gz,
      ]);

      expect(result.total).toBe(2);
      expect(result.requested).toBe(3);
      expect(result.ok).toBe(true);
      expect(result.skipped).toEqual([{ path: join(dir, 'missing.csv'), reason: 'missing' }]);

      const uploads = test.http.calls('POST', BUCKET_FILES);
      expect(uploads.map((request) => request.file?.filename)).toEqual(['a.csv.gz', 'b.csv.gz']);
      expect(uploads.map((request) => request.file?.contentType)).toEqual(['application/gzip', 'application/gzip']);
      expect(gunzipSync(uploads[0].file?.content ?? new Uint8Array()).toString('utf8')).toBe('id,amount\n1,10\n');
      expect(gunzipSync(uploads[1].file?.content ?? new Uint8Array()).toString('utf8')).toBe('id,amount\n2,20\n');

      expect(test.logger.warn).toHaveBeenCalledWith(`File ${join(dir, 'missing.csv')} not found - skipping`);
      expect(test.metrics.getCounter(MetricNames.FILES_STAGED, { target: 'bucket' })).toBe(2);
      expect(test.metrics.getCounter(MetricNames.FILES_SKIPPED, { target: 'bucket' })).toBe(1);
    });

    it('should upload one empty gzip payload when no files are given', async () => {
      test.http.on('POST', BUCKET_FILES, receipt);

      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' });

      expect(result).toMatchObject({ total: 1, requested: 0, ok: true, skipped: [] });
      expect(result.data[0].name).toBe('empty.csv.gz');
      const [upload] = test.http.calls('POST');
      expect(gunzipSync(upload.file?.content ?? new Uint8Array())).toHaveLength(0);
    });

    it('should upload nothing for an empty list', async () => {
      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, []);

      expect(result).toMatchObject({ total: 0, requested: 0, ok: true });
      expect(test.http.requests).toHaveLength(0);
      expect(test.logger.warn).toHaveBeenCalledWith('No files were given to stage');
    });

    it('should skip unsupported extensions', async () => {
      const json = join(dir, 'data.json');
      await writeFile(json, '{}');

      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, json);

      expect(result.skipped).toEqual([{ path: json, reason: 'unsupported' }]);
      expect(result.ok).toBe(false);
      expect(test.http.requests).toHaveLength(0);
    });

    it('should accept upper-case extensions', async () => {
      const csv = join(dir, 'DATA.CSV');
      await writeFile(csv, 'id\n1\n');
      test.http.on('POST', BUCKET_FILES, receipt);

      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, csv);

      expect(result.data.map((file) => file.name)).toEqual(['DATA.CSV.gz']);
    });

    it('should continue after a rejected upload', async () => {
      const first = join(dir, 'first.csv');
      const second = join(dir, 'second.csv');
      await writeFile(first, 'id\n1\n');
      await writeFile(second, 'id\n2\n');
      test.http.once('POST', BUCKET_FILES, textResponse(500, 'boom')).on('POST', BUCKET_FILES, receipt);

      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, [first, second]);

      expect(result.data.map((file) => file.name)).toEqual(['second.csv.gz']);
      expect(result.skipped).toEqual([{ path: first, reason: 'upload-failed' }]);
      expect(result.ok).toBe(true);
    });

    it('should record the file name when the receipt has no body', async () => {
      const csv = join(dir, 'a.csv');
      await writeFile(csv, 'id\n1\n');
      test.http.on('POST', BUCKET_FILES, textResponse(201, ''));

      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, csv);

      expect(result.data).toEqual([{ name: 'a.csv.gz' }]);
    });

    it('should report failure when nothing was staged', async () => {
      const result = await new FileStager(test.context).stage({ kind: 'bucket', bucketId: 'B1' }, [
        join(dir, 'one.csv'),
        join(dir, 'two.csv'),
      ]);

      expect(result).toMatchObject({ total: 0, requested: 2, ok: false });
    });
  });

  describe('file container target', () => {
    it('should create one container on the first upload and reuse it', async () => {
      const first = join(dir, 'first.csv');
      const second = join(dir, 'second.csv');
      await writeFile(first, 'id\n1\n');
      await writeFile(second, 'id\n2\n');
      const containers = { create: vi.fn().mockResolvedValue({ id: 'FC1' }) };
      test.http.on('POST', '/fileContainers/FC1/files', receipt);

      const result = await new FileStager(test.context, containers).stage({ kind: 'fileContainer' }, [first, second]);

      expect(containers.create).toHaveBeenCalledTimes(1);
      expect(result.containerId).toBe('FC1');
      expect(result.total).toBe(2);
    });

    it('should use a given container without creating one', async () => {
      const csv = join(dir, 'a.csv');
      await writeFile(csv, 'id\n1\n');
      const containers = { create: vi.fn() };
      test.http.on('POST', '/fileContainers/FC7/files', receipt);

      const result = await new FileStager(test.context, containers).stage(
        { kind: 'fileContainer', containerId: 'FC7' },
        csv
      );

      expect(containers.create).not.toHaveBeenCalled();
      expect(result.containerId).toBe('FC7');
    });

    it('should stop the batch when no container can be created', async () => {
      const first = join(dir, 'first.csv');
      const second = join(dir, 'second.csv');
      await writeFile(first, 'id\n1\n');
      await writeFile(second, 'id\n2\n');
      const containers = { create: vi.fn().mockRejectedValue(new Error('forbidden')) };

      const result = await new FileStager(test.context, containers).stage({ kind: 'fileContainer' }, [first, second]);

      expect(result.skipped).toEqual([
        { path: first, reason: 'container-unavailable' },
        { path: second, reason: 'container-unavailable' },
      ]);
      expect(result.ok).toBe(false);
      expect(result.containerId).toBeUndefined();
      expect(test.http.requests).toHaveLength(0);
      expect(test.logger.error).toHaveBeenCalledWith('Unable to create a file container', {
        errorName: 'Error',
        errorMessage: 'forbidden',
      });
    });
  });
});
