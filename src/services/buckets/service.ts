import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import {
  BucketCompleteFailedError,
  BucketCreateFailedError,
  InvalidSchemaError,
  MissingTargetError,
  TableNotFoundError,
} from '../../errors/index.js';
import { MetricNames } from '../../observability/index.js';
import { ResourcePager, createHttpPagedSource } from '../../paging/index.js';
import { normalizeSchema, toBucketSchema } from '../../schema/normalizer.js';
import type { FileStager, StagingFiles, StagingResult } from '../../staging/index.js';
import { isRecord, parsePayload, typeReference, type PagedResult } from '../../types/index.js';
import type { ServiceContext } from '../context.js';
import type { TablesService } from '../tables/index.js';
import {
  BUCKETS_PAGE_SIZE,
  BUCKET_NAME_PREFIX,
  BucketRecordSchema,
  type Bucket,
  type BucketCompletion,
  type BucketCreateParams,
  type BucketListParams,
} from './types.js';

export interface BucketsService {
  /**
   * Reads one bucket; `undefined` when it does not exist or cannot be read.
   */
  get(bucketId: string, type?: BucketListParams['type']): Promise<Bucket | undefined>;

  /**
   * Lists buckets, optionally only those targeting one table. Never throws.
   */
  list(params?: BucketListParams): Promise<PagedResult<Bucket>>;

  /**
   * Creates a bucket bound to one table and operation.
   *
   * The target is the explicit table id, else the explicit table name, else
   * the `id` of the supplied schema. Without a schema the live table
   * definition is used.
   *
   * @throws MissingTargetError when no target can be determined or the table name is blank
   * @throws TableNotFoundError when the table id or name does not resolve
   * @throws InvalidSchemaError when the schema cannot be read or has no fields
   * @throws BucketCreateFailedError when the service refuses the bucket
   */
  create(params?: BucketCreateParams): Promise<Bucket>;

  /**
   * Commits the staged files into the target table. A 400 carrying a JSON
   * body is reported as `Rejected` with that body.
   *
   * @throws BucketCompleteFailedError on any other non-201 status
   */
  complete(bucketId: string): Promise<BucketCompletion>;

  upload(bucketId: string, files?: StagingFiles): Promise<StagingResult>;

  /**
   * Rows that failed to load, as the raw text the service returns.
   */
  errorFile(bucketId: string): Promise<string | undefined>;
}

export function generateBucketName(): string {
  return `${BUCKET_NAME_PREFIX}${randomUUID().replace(/-/g, '')}`;
}

export class BucketsServiceImpl implements BucketsService {
  private readonly url: string;

  constructor(
    private readonly context: ServiceContext,
    private readonly tables: TablesService,
    private readonly stager: FileStager
  ) {
    this.url = `${context.endpoints.prism}/buckets`;
  }

  async get(bucketId: string, type: BucketListParams['type'] = 'summary'): Promise<Bucket | undefined> {
    return this.pager(type).fetchById(bucketId);
  }

  async list(params: BucketListParams = {}): Promise<PagedResult<Bucket>> {
    const { tableId, tableName, search } = params;
    let matcher: ((bucket: Bucket) => boolean) | undefined;

    if (tableId !== undefined || tableName !== undefined) {
      const needle = tableName?.toLowerCase();
      matcher = (bucket) => {
        const target = bucket.targetDataset;
        if (tableId !== undefined && target?.id !== tableId) {
          return false;
        }
        if (tableName !== undefined) {
          const descriptor = target?.descriptor;
          if (descriptor === undefined) {
            return false;
          }
          return search === true && needle !== undefined
            ? descriptor.toLowerCase().includes(needle)
            : descriptor === tableName;
        }
        return true;
      };
    }

    return this.pager(params.type ?? 'summary').fetch({
      name: params.name,
      searching: search,
      matcher,
      limit: params.limit,
      offset: params.offset,
    });
  }

  async create(params: BucketCreateParams = {}): Promise<Bucket> {
    const { logger, metrics } = this.context.observability;
    const operation = params.operation ?? 'TruncateAndInsert';
    const name = params.name ?? generateBucketName();
    const supplied = params.schema === undefined ? undefined : await readSchema(params.schema);

    let tableId: string;
    let definition: Record<string, unknown>;

    if (params.tableId === undefined && params.tableName !== undefined && params.tableName.trim().length === 0) {
      throw new MissingTargetError('a table name must not be blank');
    }

    if (params.tableId !== undefined || params.tableName !== undefined) {
      const table =
        params.tableId !== undefined
          ? await this.tables.get(params.tableId, 'full')
          : await this.tables.findByName(params.tableName ?? '', 'full');

      if (table === undefined) {
        throw new TableNotFoundError(
          params.tableId !== undefined ? { id: params.tableId } : { name: params.tableName }
        );
      }

      tableId = table.id;
      definition = supplied === undefined ? table : { ...supplied, id: table.id };
    } else {
      if (supplied === undefined) {
        throw new MissingTargetError();
      }
      if (typeof supplied.id !== 'string' || supplied.id.length === 0) {
        throw new MissingTargetError('the schema has no table id and no table id or name was given');
      }
      tableId = supplied.id;
      definition = supplied;
    }

    const compact = normalizeSchema(definition);
    const schema = toBucketSchema(
      definition.parseOptions === undefined ? compact : { ...compact, parseOptions: definition.parseOptions }
    );

    const payload = {
      name,
      operation: typeReference('Operation_Type', operation),
      targetDataset: { id: tableId },
      schema,
    };

    logger.debug('Creating bucket', { name, tableId, operation });
    const response = await this.context.http.post(this.url, payload);

    if (response.status !== 201) {
      logger.error(`Unable to create bucket ${name} for table ${tableId}`, { status: response.status });
      throw new BucketCreateFailedError(name, tableId, response.status, response.body ?? response.text);
    }

    const bucket = parsePayload(BucketRecordSchema, response.body, 'bucket');
    metrics.incrementCounter(MetricNames.BUCKETS_CREATED, 1, { operation });
    logger.info(`Created bucket ${bucket.id}`, { name, tableId, operation });
    return bucket;
  }

  async complete(bucketId: string): Promise<BucketCompletion> {
    const { logger, metrics } = this.context.observability;
    const response = await this.context.http.post(`${this.url}/${encodeURIComponent(bucketId)}/complete`);

    if (response.status === 201) {
      metrics.incrementCounter(MetricNames.BUCKETS_COMPLETED, 1, { state: 'Completed' });
      logger.info(`Completed bucket ${bucketId}`);
      return { state: 'Completed', body: response.body };
    }

    if (response.status === 400 && isRecord(response.body)) {
      metrics.incrementCounter(MetricNames.BUCKETS_COMPLETED, 1, { state: 'Rejected' });
      logger.warn(`Bucket ${bucketId} was rejected`, { body: response.body });
      return { state: 'Rejected', body: response.body };
    }

    throw new BucketCompleteFailedError(bucketId, response.status, response.body ?? response.text);
  }

  async upload(bucketId: string, files?: StagingFiles): Promise<StagingResult> {
    return this.stager.stage({ kind: 'bucket', bucketId }, files);
  }

  async errorFile(bucketId: string): Promise<string | undefined> {
    try {
      const response = await this.context.http.get(`${this.url}/${encodeURIComponent(bucketId)}/errorFile`);
      return response.status === 200 ? response.text : undefined;
    } catch (error) {
      this.context.observability.logger.warn(`Unable to read the error file of bucket ${bucketId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private pager(type: NonNullable<BucketListParams['type']>): ResourcePager<Bucket> {
    return new ResourcePager(
      createHttpPagedSource({
        http: this.context.http,
        resource: 'bucket',
        url: this.url,
        itemSchema: BucketRecordSchema,
        maxPageSize: BUCKETS_PAGE_SIZE,
        query: { type },
        itemQuery: { format: type },
        searchableNames: (bucket) => [bucket.name, bucket.displayName],
        exactName: (bucket) => bucket.name,
      }),
      this.context.observability
    );
  }
}

/**
 * Reads a schema given inline or as the path of a JSON file.
 */
async function readSchema(schema: Record<string, unknown> | string): Promise<Record<string, unknown>> {
  if (typeof schema !== 'string') {
    return schema;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(schema, 'utf8'));
  } catch (error) {
    throw new InvalidSchemaError(`unable to read ${schema}`, { path: schema }, error);
  }

  if (!isRecord(parsed)) {
    throw new InvalidSchemaError(`${schema} does not contain a schema object`, { path: schema });
  }
  return parsed;
}
