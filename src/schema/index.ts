export {
  SCHEMA_ATTRIBUTES,
  type SchemaField,
  type CompactSchema,
  type BucketField,
  type BucketSchema,
  defaultParseOptions,
  isReservedField,
  normalizeSchema,
  toBucketSchema,
} from './normalizer.js';
export { SchemaLoader, type SchemaSource } from './loader.js';
export { parseCSVRecords, parseCSVLine, splitCSVRows } from './csv.js';
