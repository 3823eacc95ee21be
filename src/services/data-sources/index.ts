export { type DataSourcesService, DataSourcesServiceImpl } from './service.js';
export { DataSourceSchema, DATA_SOURCES_PAGE_SIZE, type DataSource, type DataSourceListParams } from './types.js';
