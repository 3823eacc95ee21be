/**
 * Schema normalization.
 *
 * `normalizeSchema` reduces a table definition (read from the service or a
 * file) to the attributes a table or bucket write accepts. `toBucketSchema`
 * turns that compact schema into the schema block of a bucket. Both work on
 * copies; the caller's value is never modified.
 *
 * @module schema/normalizer
 */

import { InvalidSchemaError } from '../errors/index.js';
import { RESERVED_FIELD_PREFIX, isRecord, typeReference } from '../types/index.js';

/**
 * Top-level attributes accepted by table POST/PUT and bucket creation.
 */
export const SCHEMA_ATTRIBUTES: ReadonlySet<string> = new Set([
  'name',
  'id',
  'fields',
  'tags',
  'categories',
  'displayName',
  'description',
  'documentation',
  'enableForAnalysis',
]);

const DROPPED_FIELD_ATTRIBUTES: ReadonlySet<string> = new Set(['name', 'ordinal', 'id', 'fieldId']);

const DROPPED_BUCKET_FIELD_ATTRIBUTES: ReadonlySet<string> = new Set([
  'id',
  'displayName',
  'fieldId',
  'required',
  'externalId',
]);

export interface SchemaField {
  name: string;
  ordinal: number;
  [attribute: string]: unknown;
}

export interface CompactSchema {
  fields?: SchemaField[];
  [attribute: string]: unknown;
}

export interface BucketField {
  name: string;
  useAsOperationKey: boolean;
  [attribute: string]: unknown;
}

export interface BucketSchema {
  schemaVersion: { id: string };
  parseOptions: Record<string, unknown>;
  fields: BucketField[];
}

/**
 * Parse options suitable for a comma separated file with one header line.
 */
export function defaultParseOptions(): Record<string, unknown> {
  return {
    fieldsDelimitedBy: ',',
    fieldsEnclosedBy: '"',
    headerLinesToIgnore: 1,
    charset: typeReference('Encoding', 'UTF-8'),
    type: typeReference('Schema_File_Type', 'Delimited'),
  };
}

export function isReservedField(name: string): boolean {
  return name.startsWith(RESERVED_FIELD_PREFIX);
}

interface NamedField {
  name: string;
  attributes: Record<string, unknown>;
}

function readFields(fields: unknown): NamedField[] {
  if (!Array.isArray(fields)) {
    throw new InvalidSchemaError('fields must be an array');
  }

  return fields.map((field: unknown, index) => {
    if (!isRecord(field) || typeof field.name !== 'string') {
      throw new InvalidSchemaError(`field ${index + 1} must be an object with a string name`, { index });
    }
    return { name: field.name, attributes: field };
  });
}

function normalizeFieldType(type: unknown): unknown {
  if (!isRecord(type) || typeof type.descriptor !== 'string') {
    return structuredClone(type);
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(type)) {
    if (key !== 'descriptor') {
      normalized[key] = structuredClone(value);
    }
  }
  normalized.id = typeReference('Schema_Field_Type', type.descriptor).id;
  return normalized;
}

/**
 * Reduces a table definition to its writable attributes.
 *
 * Reserved `WPA_` fields are dropped, the remaining fields are renumbered
 * from 1 in their original order, field ids are removed and a type given by
 * descriptor is rewritten to its `Schema_Field_Type=` id.
 *
 * @throws InvalidSchemaError when the schema is not an object or a field has no name
 */
export function normalizeSchema(schema: unknown): CompactSchema {
  if (!isRecord(schema)) {
    throw new InvalidSchemaError('schema must be an object');
  }

  const compact: CompactSchema = {};

  for (const [key, value] of Object.entries(schema)) {
    if (key === 'fields' || !SCHEMA_ATTRIBUTES.has(key)) {
      continue;
    }
    compact[key] = structuredClone(value);
  }

  if (schema.fields !== undefined) {
    compact.fields = readFields(schema.fields)
      .filter((field) => !isReservedField(field.name))
      .map((field, index) => {
        const normalized: SchemaField = { name: field.name, ordinal: index + 1 };
        for (const [key, value] of Object.entries(field.attributes)) {
          if (DROPPED_FIELD_ATTRIBUTES.has(key)) {
            continue;
          }
          normalized[key] = key === 'type' ? normalizeFieldType(value) : structuredClone(value);
        }
        return normalized;
      });
  }

  return compact;
}

/**
 * Builds the schema block of a bucket from a table definition.
 *
 * Fields marked `externalId: true` become operation keys. `parseOptions` on
 * the input are used as given, otherwise the defaults apply.
 *
 * @throws InvalidSchemaError when the input has no fields
 */
export function toBucketSchema(schema: unknown): BucketSchema {
  if (!isRecord(schema) || schema.fields === undefined) {
    throw new InvalidSchemaError('a bucket schema requires fields');
  }

  const fields = readFields(schema.fields)
    .filter((field) => !isReservedField(field.name))
    .map((field) => {
      const bucketField: BucketField = {
        name: field.name,
        useAsOperationKey: field.attributes.externalId === true,
      };
      for (const [key, value] of Object.entries(field.attributes)) {
        if (key === 'name' || key === 'useAsOperationKey' || DROPPED_BUCKET_FIELD_ATTRIBUTES.has(key)) {
          continue;
        }
        bucketField[key] = structuredClone(value);
      }
      return bucketField;
    });

  let parseOptions: Record<string, unknown>;
  if (schema.parseOptions === undefined) {
    parseOptions = defaultParseOptions();
  } else if (isRecord(schema.parseOptions)) {
    parseOptions = structuredClone(schema.parseOptions);
  } else {
    throw new InvalidSchemaError('parseOptions must be an object');
  }

  return {
    schemaVersion: typeReference('Schema_Version', '1.0'),
    parseOptions,
    fields,
  };
}
