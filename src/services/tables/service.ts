import { InvalidSchemaError, NotFoundError, TransportError, ValidationError } from '../../errors/index.js';
import { ResourcePager, createHttpPagedSource } from '../../paging/index.js';
import { normalizeSchema } from '../../schema/normalizer.js';
import { isRecord, parsePayload, type PagedResult } from '../../types/index.js';
import type { ServiceContext } from '../context.js';
import {
  PATCHABLE_TABLE_ATTRIBUTES,
  TABLES_PAGE_SIZE,
  TableSchema,
  type Table,
  type TableCreateOptions,
  type TableListParams,
  type TablePatch,
} from './types.js';

export interface TablesService {
  /**
   * Reads one table; `undefined` when it does not exist or cannot be read.
   */
  get(tableId: string, type?: TableListParams['type']): Promise<Table | undefined>;

  /**
   * Lists tables. Never throws; a failed page ends the listing.
   */
  list(params?: TableListParams): Promise<PagedResult<Table>>;

  /**
   * Exact API name lookup; spaces in the name are read as underscores.
   * A blank name matches no table.
   */
  findByName(name: string, type?: TableListParams['type']): Promise<Table | undefined>;

  create(schema: unknown, options?: TableCreateOptions): Promise<Table>;

  /**
   * Replaces the definition of the table identified by the schema's `id`.
   */
  replace(schema: unknown): Promise<Table>;

  patch(tableId: string, patch: TablePatch): Promise<Table>;
}

/**
 * API names cannot contain spaces.
 */
export function toApiName(name: string): string {
  return name.replace(/ /g, '_');
}

export class TablesServiceImpl implements TablesService {
  private readonly url: string;

  constructor(private readonly context: ServiceContext) {
    this.url = `${context.endpoints.prism}/tables`;
  }

  async get(tableId: string, type: TableListParams['type'] = 'summary'): Promise<Table | undefined> {
    return this.pager(type).fetchById(tableId);
  }

  async list(params: TableListParams = {}): Promise<PagedResult<Table>> {
    return this.pager(params.type ?? 'summary').fetch({
      name: params.name !== undefined && params.search !== true ? toApiName(params.name) : params.name,
      searching: params.search,
      limit: params.limit,
      offset: params.offset,
    });
  }

  async findByName(name: string, type: TableListParams['type'] = 'summary'): Promise<Table | undefined> {
    if (name.trim().length === 0) {
      return undefined;
    }
    const tables = await this.list({ name, type });
    return tables.data[0];
  }

  async create(schema: unknown, options: TableCreateOptions = {}): Promise<Table> {
    if (!isRecord(schema)) {
      throw new InvalidSchemaError('schema must be an object');
    }

    const definition: Record<string, unknown> = { ...schema };

    if (options.name !== undefined) {
      definition.name = toApiName(options.name);
      definition.displayName = options.name;
    } else if (typeof definition.name !== 'string' || definition.name.length === 0) {
      throw new InvalidSchemaError('a table name is required');
    }

    if (options.displayName !== undefined) {
      definition.displayName = options.displayName;
    } else if (definition.displayName === undefined) {
      definition.displayName = definition.name;
    }

    definition.enableForAnalysis = options.enableForAnalysis ?? definition.enableForAnalysis ?? false;

    const compact = normalizeSchema(definition);
    this.context.observability.logger.debug('Creating table', { name: compact.name });

    const response = await this.context.http.post(this.url, compact);
    if (response.status !== 201) {
      throw new TransportError('Create table', response.status, response.body ?? response.text, {
        name: compact.name,
      });
    }

    return parsePayload(TableSchema, response.body, 'table');
  }

  async replace(schema: unknown): Promise<Table> {
    if (!isRecord(schema) || typeof schema.id !== 'string' || schema.id.length === 0) {
      throw new InvalidSchemaError('a table id is required to replace a table');
    }
    if (schema.fields === undefined) {
      throw new InvalidSchemaError('fields are required to replace a table', { tableId: schema.id });
    }

    const tableId = schema.id;
    const compact = normalizeSchema(schema);

    const response = await this.context.http.put(`${this.url}/${encodeURIComponent(tableId)}`, compact);
    if (response.status === 404) {
      throw new NotFoundError('Table', tableId);
    }
    if (response.status !== 200) {
      throw new TransportError('Replace table', response.status, response.body ?? response.text, { tableId });
    }

    return parsePayload(TableSchema, response.body, 'table');
  }

  async patch(tableId: string, patch: TablePatch): Promise<Table> {
    const body: Record<string, unknown> = {};
    for (const attribute of PATCHABLE_TABLE_ATTRIBUTES) {
      if (patch[attribute] !== undefined) {
        body[attribute] = patch[attribute];
      }
    }

    const unsupported = Object.keys(patch).filter(
      (key) => !PATCHABLE_TABLE_ATTRIBUTES.some((attribute) => attribute === key)
    );
    if (unsupported.length > 0) {
      throw new ValidationError(`attributes cannot be patched: ${unsupported.join(', ')}`, { tableId, unsupported });
    }
    if (Object.keys(body).length === 0) {
      throw new ValidationError(`a patch must set one of ${PATCHABLE_TABLE_ATTRIBUTES.join(', ')}`, { tableId });
    }

    const response = await this.context.http.patch(`${this.url}/${encodeURIComponent(tableId)}`, body);
    if (response.status === 404) {
      throw new NotFoundError('Table', tableId);
    }
    if (response.status !== 200) {
      throw new TransportError('Patch table', response.status, response.body ?? response.text, { tableId });
    }

    return parsePayload(TableSchema, response.body, 'table');
  }

  private pager(type: NonNullable<TableListParams['type']>): ResourcePager<Table> {
    return new ResourcePager(
      createHttpPagedSource({
        http: this.context.http,
        resource: 'table',
        url: this.url,
        itemSchema: TableSchema,
        maxPageSize: TABLES_PAGE_SIZE,
        query: { type },
        itemQuery: { format: type },
        searchableNames: (table) => [table.name, table.displayName],
        exactName: (table) => table.name,
      }),
      this.context.observability
    );
  }
}
