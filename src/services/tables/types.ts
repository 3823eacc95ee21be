import { z } from 'zod';
import { TypeReferenceSchema, type OutputType } from '../../types/index.js';

/**
 * Field of a table schema.
 */
export const FieldSchema = z
  .object({
    name: z.string(),
    displayName: z.string().optional(),
    ordinal: z.number().optional(),
    type: TypeReferenceSchema.optional(),
    precision: z.number().optional(),
    scale: z.number().optional(),
    parseFormat: z.string().optional(),
    businessObject: TypeReferenceSchema.optional(),
    externalId: z.boolean().optional(),
    required: z.boolean().optional(),
    id: z.string().optional(),
    fieldId: z.string().optional(),
  })
  .passthrough();

export type Field = z.infer<typeof FieldSchema>;

export const TableSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    displayName: z.string().optional(),
    description: z.string().optional(),
    documentation: z.string().optional(),
    enableForAnalysis: z.boolean().optional(),
    fields: z.array(FieldSchema).optional(),
  })
  .passthrough();

export type Table = z.infer<typeof TableSchema>;

export interface TableListParams {
  /** Exact API name, or a substring when `search` is set */
  name?: string;
  search?: boolean;
  limit?: number;
  offset?: number;
  /** @default 'summary' */
  type?: OutputType;
}

export interface TableCreateOptions {
  /** Overrides the schema name; spaces become underscores and it also becomes the display name */
  name?: string;
  displayName?: string;
  enableForAnalysis?: boolean;
}

/**
 * Attributes a PATCH may change.
 */
export interface TablePatch {
  displayName?: string;
  description?: string;
  documentation?: string;
  enableForAnalysis?: boolean;
}

export const PATCHABLE_TABLE_ATTRIBUTES = ['displayName', 'description', 'documentation', 'enableForAnalysis'] as const;

/** Largest page the tables endpoint returns */
export const TABLES_PAGE_SIZE = 100;
