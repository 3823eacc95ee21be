/**
 * Builds table schemas from files or existing tables.
 *
 * A JSON file holds either a whole table definition or a bare array of
 * fields. A CSV file describes one field per row with the columns `name`,
 * `displayName`, `type`, `required`, `externalId`, `parseFormat`,
 * `precision`, `scale` and `businessObject`.
 *
 * @module schema/loader
 */

import { readFile } from 'node:fs/promises';
import { InvalidSchemaError, MissingTargetError, TableNotFoundError } from '../errors/index.js';
import { createNoopObservability, type Observability } from '../observability/index.js';
import type { DataSourcesService } from '../services/data-sources/index.js';
import type { Table, TablesService } from '../services/tables/index.js';
import { isRecord, typeReference } from '../types/index.js';
import { parseCSVRecords } from './csv.js';

const FIELD_TYPES = ['Text', 'Integer', 'Boolean', 'Date', 'Numeric', 'Decimal', 'Instance'] as const;

type FieldType = (typeof FIELD_TYPES)[number];

export interface SchemaSource {
  /** JSON or CSV file; takes precedence over the table options */
  file?: string;
  tableId?: string;
  tableName?: string;
}

export class SchemaLoader {
  private readonly observability: Observability;

  constructor(
    private readonly tables: TablesService,
    private readonly dataSources: DataSourcesService,
    observability?: Observability
  ) {
    this.observability = observability ?? createNoopObservability();
  }

  /**
   * @throws InvalidSchemaError when the file cannot be read or holds no schema
   * @throws TableNotFoundError when the source table does not exist
   * @throws MissingTargetError when neither a file nor a table is given
   */
  async load(source: SchemaSource): Promise<Record<string, unknown>> {
    if (source.file !== undefined) {
      return this.fromFile(source.file);
    }
    if (source.tableId !== undefined || source.tableName !== undefined) {
      return this.fromTable(source);
    }
    throw new MissingTargetError('a schema file or a source table id or name is required');
  }

  async fromFile(path: string): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new InvalidSchemaError(`unable to read ${path}`, { path }, error);
    }

    return path.toLowerCase().endsWith('.csv') ? this.fromCSV(text, path) : fromJSON(text, path);
  }

  async fromTable(source: { tableId?: string; tableName?: string }): Promise<Table> {
    const table =
      source.tableId !== undefined
        ? await this.tables.get(source.tableId, 'full')
        : await this.tables.findByName(source.tableName ?? '', 'full');

    if (table === undefined) {
      throw new TableNotFoundError(source.tableId !== undefined ? { id: source.tableId } : { name: source.tableName });
    }
    return table;
  }

  private async fromCSV(text: string, path: string): Promise<Record<string, unknown>> {
    const { logger } = this.observability;
    const rows = parseCSVRecords(text);
    const fields: Array<Record<string, unknown>> = [];

    for (const [index, row] of rows.entries()) {
      const name = row.name?.trim();
      if (!name) {
        throw new InvalidSchemaError(`row ${index + 1} of ${path} has no name`, { path, row: index + 1 });
      }

      const field: Record<string, unknown> = {
        ordinal: index + 1,
        name,
        displayName: row.displayName ? row.displayName : name,
        required: parseFlag(row.required),
        externalId: parseFlag(row.externalId),
      };

      const type = resolveFieldType(row.type);
      if (type === undefined) {
        logger.warn(`Invalid type ${row.type} for field ${name} - defaulting to Text`);
      }
      const fieldType: FieldType = type ?? 'Text';
      field.type = typeReference('Schema_Field_Type', fieldType);

      if (fieldType === 'Date' && row.parseFormat) {
        field.parseFormat = row.parseFormat;
      } else if (fieldType === 'Numeric' || fieldType === 'Decimal') {
        if (row.precision) {
          field.precision = parseNumber(row.precision, 'precision', name);
        }
        if (row.scale) {
          field.scale = parseNumber(row.scale, 'scale', name);
        }
      } else if (fieldType === 'Instance') {
        const descriptor = row.businessObject ?? '';
        const businessObject = await this.dataSources.findBusinessObject(descriptor);
        if (businessObject === undefined) {
          throw new InvalidSchemaError(`business object ${descriptor} not found for field ${name}`, {
            field: name,
            businessObject: descriptor,
          });
        }
        field.businessObject = businessObject;
      }

      fields.push(field);
    }

    return { fields };
  }
}

function fromJSON(text: string, path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidSchemaError(`${path} is not valid JSON`, { path }, error);
  }

  if (Array.isArray(parsed)) {
    return { fields: parsed };
  }

  if (!isRecord(parsed) || (parsed.name === undefined && parsed.fields === undefined)) {
    throw new InvalidSchemaError(`${path} has neither a name nor fields`, { path });
  }
  return parsed;
}

function resolveFieldType(value: string | undefined): FieldType | undefined {
  if (value === undefined || value.trim().length === 0) {
    return 'Text';
  }
  const lower = value.trim().toLowerCase();
  return FIELD_TYPES.find((type) => type.toLowerCase() === lower);
}

function parseFlag(value: string | undefined): boolean {
  return value !== undefined && value.trim().toLowerCase() === 'true';
}

function parseNumber(value: string, attribute: string, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidSchemaError(`${attribute} of field ${field} must be a number`, { field, [attribute]: value });
  }
  return parsed;
}
