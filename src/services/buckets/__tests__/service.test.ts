import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BucketsServiceImpl, generateBucketName } from '../service.js';
import { TablesServiceImpl } from '../../tables/index.js';
import { FileStager } from '../../../staging/index.js';
import {
  BucketCompleteFailedError,
  BucketCreateFailedError,
  InvalidSchemaError,
  MissingTargetError,
  TableNotFoundError,
} from '../../../errors/index.js';
import { MetricNames } from '../../../observability/index.js';
import type { HttpRequest } from '../../../transport/index.js';
import { createTestContext, jsonResponse, textResponse, type TestContext } from '../../../__mocks__/index.js';
import { bucketPage, bucketRecord, salesOrdersTable } from '../../../__fixtures__/index.js';

function pageOffset(request: HttpRequest): number {
  return Number(request.query?.offset ?? 0);
}

describe('BucketsServiceImpl', () => {
  let test: TestContext;
  let service: BucketsServiceImpl;

  beforeEach(() => {
    test = createTestContext();
    const tables = new TablesServiceImpl(test.context);
    service = new BucketsServiceImpl(test.context, tables, new FileStager(test.context));
  });

  describe('create', () => {
    it('should build the bucket schema from the live table when only a table id is given', async () => {
      test.http
        .on('GET', '/tables/T1', jsonResponse(200, salesOrdersTable()))
        .on('POST', '/buckets', jsonResponse(201, bucketRecord('B1', 'prism_loader_1')));

      const bucket = await service.create({ tableId: 'T1', operation: 'TruncateAndInsert' });

      expect(bucket.id).toBe('B1');
      expect(test.http.calls('GET')[0].query).toEqual({ format: 'full' });

      const [post] = test.http.calls('POST', '/buckets');
      expect(post.url).toBe('https://prism.test/api/prismAnalytics/v3/acme/buckets');
      expect(post.body).toMatchObject({
        name: expect.stringMatching(/^prism_loader_[0-9a-f]{32}$/),
        operation: { id: 'Operation_Type=TruncateAndInsert' },
        targetDataset: { id: 'T1' },
        schema: {
          schemaVersion: { id: 'Schema_Version=1.0' },
          parseOptions: { fieldsDelimitedBy: ',', headerLinesToIgnore: 1 },
          fields: [
            { name: 'order_id', ordinal: 1, useAsOperationKey: true },
            { name: 'amount', ordinal: 2, useAsOperationKey: false },
            { name: 'order_date', ordinal: 3, useAsOperationKey: false },
          ],
        },
      });
      expect(test.metrics.getCounter(MetricNames.BUCKETS_CREATED, { operation: 'TruncateAndInsert' })).toBe(1);
    });

    it('should resolve a table name through an exact name lookup', async () => {
      test.http
        .on('GET', '/tables', jsonResponse(200, { total: 1, data: [salesOrdersTable()] }))
        .on('POST', '/buckets', jsonResponse(201, bucketRecord('B2', 'nightly')));

      await service.create({ tableName: 'sales orders', name: 'nightly', operation: 'Insert' });

      expect(test.http.calls('GET')[0].query).toEqual({ type: 'full', limit: 1, offset: 0, name: 'sales_orders' });
      expect(test.http.calls('POST')[0].body).toMatchObject({
        name: 'nightly',
        operation: { id: 'Operation_Type=Insert' },
        targetDataset: { id: 'T1' },
      });
    });

    it('should prefer the table id over the table name', async () => {
      test.http
        .on('GET', '/tables/T1', jsonResponse(200, salesOrdersTable()))
        .on('POST', '/buckets', jsonResponse(201, bucketRecord('B3', 'b')));

      await service.create({ tableId: 'T1', tableName: 'something_else' });

      expect(test.http.calls('GET').map((request) => request.url)).toEqual([
        'https://prism.test/api/prismAnalytics/v3/acme/tables/T1',
      ]);
    });

    it('should target the id embedded in a supplied schema', async () => {
      test.http.on('POST', '/buckets', jsonResponse(201, bucketRecord('B4', 'b')));

      await service.create({ schema: { id: 'T7', fields: [{ name: 'a' }] } });

      expect(test.http.calls('GET')).toHaveLength(0);
      expect(test.http.calls('POST')[0].body).toMatchObject({
        targetDataset: { id: 'T7' },
        schema: { fields: [{ name: 'a', ordinal: 1, useAsOperationKey: false }] },
      });
    });

    it('should use supplied fields and parse options with the resolved table id', async () => {
      test.http
        .on('GET', '/tables/T1', jsonResponse(200, salesOrdersTable()))
        .on('POST', '/buckets', jsonResponse(201, bucketRecord('B5', 'b')));

      await service.create({
        tableId: 'T1',
        schema: {
          id: 'stale-id',
          fields: [{ name: 'sku', externalId: true }],
          parseOptions: { fieldsDelimitedBy: '|' },
        },
      });

      expect(test.http.calls('POST')[0].body).toMatchObject({
        targetDataset: { id: 'T1' },
        schema: {
          parseOptions: { fieldsDelimitedBy: '|' },
          fields: [{ name: 'sku', ordinal: 1, useAsOperationKey: true }],
        },
      });
    });

    it('should fail without any target', async () => {
      await expect(service.create({})).rejects.toBeInstanceOf(MissingTargetError);
      await expect(service.create({ schema: { fields: [{ name: 'a' }] } })).rejects.toBeInstanceOf(MissingTargetError);
      expect(test.http.requests).toHaveLength(0);
    });

    it('should fail when the table id does not exist', async () => {
      test.http.on('GET', '/tables/T404', jsonResponse(404, { error: 'not found' }));

      const error = await service.create({ tableId: 'T404' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TableNotFoundError);
      expect(error).toHaveProperty('message', 'Table ID T404 not found');
    });

    it('should fail when the table name does not exist', async () => {
      test.http.on('GET', '/tables', jsonResponse(200, { total: 0, data: [] }));

      await expect(service.create({ tableName: 'nope' })).rejects.toThrow('Table name nope not found');
    });

    it('should refuse a blank table name', async () => {
      test.http.on('GET', '/tables', jsonResponse(200, { total: 1, data: [salesOrdersTable()] }));

      const error = await service.create({ tableName: '' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingTargetError);
      expect(error).toHaveProperty('message', 'a table name must not be blank');
      await expect(service.create({ tableName: '  ', schema: { id: 'T1', fields: [{ name: 'a' }] } })).rejects.toBeInstanceOf(
        MissingTargetError
      );
      expect(test.http.requests).toHaveLength(0);
    });

    it('should report a refused bucket with its name and table', async () => {
      test.http
        .on('GET', '/tables/T1', jsonResponse(200, salesOrdersTable()))
        .on('POST', '/buckets', jsonResponse(400, { error: 'invalid schema' }));

      const error = await service.create({ tableId: 'T1', name: 'my_bucket' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BucketCreateFailedError);
      expect(error).toHaveProperty('message', 'Unable to create bucket my_bucket for table T1 (HTTP 400)');
      expect(error).toHaveProperty('statusCode', 400);
    });

    describe('with a schema file', () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'prism-buckets-'));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it('should read the schema from a JSON file', async () => {
        const path = join(dir, 'schema.json');
        await writeFile(path, JSON.stringify({ id: 'T8', fields: [{ name: 'x' }, { name: 'y' }] }));
        test.http.on('POST', '/buckets', jsonResponse(201, bucketRecord('B6', 'b')));

        await service.create({ schema: path });

        expect(test.http.calls('POST')[0].body).toMatchObject({
          targetDataset: { id: 'T8' },
          schema: { fields: [{ name: 'x', ordinal: 1 }, { name: 'y', ordinal: 2 }] },
        });
      });

      it('should reject an unreadable schema file', async () => {
        await expect(service.create({ tableId: 'T1', schema: join(dir, 'missing.json') })).rejects.toBeInstanceOf(
          InvalidSchemaError
        );
      });

      it('should reject a file that does not hold an object', async () => {
        const path = join(dir, 'list.json');
        await writeFile(path, '[1, 2]');

        await expect(service.create({ schema: path })).rejects.toThrow(`Invalid schema: ${path} does not contain a schema object`);
      });
    });
  });

  describe('complete', () => {
    it('should report a committed bucket', async () => {
      test.http.on('POST', '/buckets/B1/complete', jsonResponse(201, { id: 'B1', state: { descriptor: 'Processing' } }));

      const completion = await service.complete('B1');

      expect(completion).toEqual({ state: 'Completed', body: { id: 'B1', state: { descriptor: 'Processing' } } });
    });

    it('should return a 400 body unchanged', async () => {
      const body = { error: 'Row 2: value "abc" is not a valid Decimal', errors: [{ row: 2, field: 'amount' }] };
      test.http.on('POST', '/buckets/B1/complete', jsonResponse(400, body));

      const completion = await service.complete('B1');

      expect(completion).toEqual({ state: 'Rejected', body });
    });

    it('should fail on any other status', async () => {
      test.http.on('POST', '/buckets/B1/complete', textResponse(500, 'boom'));

      const error = await service.complete('B1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BucketCompleteFailedError);
      expect(error).toHaveProperty('message', 'Unable to complete bucket B1 (HTTP 500)');
    });
  });

  describe('list', () => {
    it('should scan every page for a substring and stop after a short page', async () => {
      const pages = new Map([
        [0, bucketPage(100, 0, 'sales_daily')],
        [100, bucketPage(100, 100, 'archive')],
        [200, bucketPage(47, 200, 'SALES_weekly')],
      ]);
      test.http.on('GET', '/buckets', (request) =>
        jsonResponse(200, { total: 247, data: pages.get(pageOffset(request)) ?? [] })
      );

      const result = await service.list({ name: 'sales', search: true });

      expect(test.http.calls('GET')).toHaveLength(3);
      expect(test.http.calls('GET').map((request) => request.query)).toEqual([
        { type: 'summary', limit: 100, offset: 0, name: undefined },
        { type: 'summary', limit: 100, offset: 100, name: undefined },
        { type: 'summary', limit: 100, offset: 200, name: undefined },
      ]);
      expect(result.total).toBe(147);
      expect(result.data.every((bucket) => bucket.name?.toLowerCase().includes('sales'))).toBe(true);
    });

    it('should filter by target table', async () => {
      test.http.on(
        'GET',
        '/buckets',
        jsonResponse(200, {
          total: 3,
          data: [
            bucketRecord('b1', 'one', { id: 'T1', descriptor: 'sales_orders' }),
            bucketRecord('b2', 'two', { id: 'T2', descriptor: 'returns' }),
            bucketRecord('b3', 'three', { id: 'T1', descriptor: 'sales_orders' }),
          ],
        })
      );

      const byId = await service.list({ tableId: 'T1' });
      const byName = await service.list({ tableName: 'RET', search: true });
      const byExactName = await service.list({ tableName: 'returns' });

      expect(byId.data.map((bucket) => bucket.id)).toEqual(['b1', 'b3']);
      expect(byName.data.map((bucket) => bucket.id)).toEqual(['b2']);
      expect(byExactName.data.map((bucket) => bucket.id)).toEqual(['b2']);
    });

    it('should send an empty exact bucket name to the service', async () => {
      test.http.on('GET', '/buckets', jsonResponse(200, { total: 0, data: [] }));

      expect(await service.list({ name: '' })).toEqual({ total: 0, data: [] });
      expect(test.http.calls('GET')[0].query).toEqual({ type: 'summary', limit: 1, offset: 0, name: '' });
    });

    it('should match no bucket for an empty exact table name', async () => {
      test.http.on(
        'GET',
        '/buckets',
        jsonResponse(200, { total: 1, data: [bucketRecord('b1', 'one', { id: 'T1', descriptor: 'sales_orders' })] })
      );

      expect(await service.list({ tableName: '' })).toEqual({ total: 0, data: [] });
    });

    it('should return an empty result when the service fails', async () => {
      test.http.on('GET', '/buckets', textResponse(503, 'unavailable'));

      expect(await service.list()).toEqual({ total: 0, data: [] });
    });
  });

  describe('get', () => {
    it('should read one bucket with the requested format', async () => {
      test.http.on('GET', '/buckets/B1', jsonResponse(200, bucketRecord('B1', 'one')));

      const bucket = await service.get('B1', 'full');

      expect(bucket?.name).toBe('one');
      expect(test.http.calls('GET')[0].query).toEqual({ format: 'full' });
    });

    it('should return undefined for an unknown bucket', async () => {
      test.http.on('GET', '/buckets/B404', jsonResponse(404, { error: 'not found' }));

      expect(await service.get('B404')).toBeUndefined();
    });
  });

  describe('errorFile', () => {
    it('should return the raw rows', async () => {
      test.http.on('GET', '/buckets/B1/errorFile', textResponse(200, 'order_id,amount\n7,abc\n'));

      expect(await service.errorFile('B1')).toBe('order_id,amount\n7,abc\n');
    });

    it('should return undefined when there is no error file', async () => {
      test.http.on('GET', '/buckets/B1/errorFile', textResponse(404, ''));

      expect(await service.errorFile('B1')).toBeUndefined();
    });
  });

  describe('generateBucketName', () => {
    it('should produce distinct names with the loader prefix', () => {
      const first = generateBucketName();
      const second = generateBucketName();

      expect(first).toMatch(/^prism_loader_[0-9a-f]{32}$/);
      expect(first).not.toBe(second);
    });
  });
});
