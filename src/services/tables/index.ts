export { type TablesService, TablesServiceImpl, toApiName } from './service.js';
export {
  FieldSchema,
  TableSchema,
  PATCHABLE_TABLE_ATTRIBUTES,
  TABLES_PAGE_SIZE,
  type Field,
  type Table,
  type TableListParams,
  type TableCreateOptions,
  type TablePatch,
} from './types.js';
