export { type DataChangesService, DataChangesServiceImpl } from './service.js';
export {
  DataChangeSchema,
  ActivitySchema,
  DATA_CHANGES_PAGE_SIZE,
  type DataChange,
  type Activity,
  type DataChangeListParams,
  type RunActivityOptions,
  type ActivityRun,
} from './types.js';
