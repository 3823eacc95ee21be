export {
  RESERVED_FIELD_PREFIX,
  TypeReferenceSchema,
  type TypeReference,
  typeReference,
  LOAD_OPERATIONS,
  type LoadOperation,
  type OutputType,
  type PagedResult,
  listPageSchema,
  parsePayload,
  isRecord,
} from './common.js';
