export { salesOrdersTable, tableSummary } from './tables.fixture.js';
export { bucketRecord, bucketPage } from './buckets.fixture.js';
