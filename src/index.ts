/**
 * prism-loader
 *
 * TypeScript client for Workday Prism Analytics: manage tables, stage CSV
 * files into buckets and load them into tables.
 *
 * @example
 * ```typescript
 * import { createClientFromEnv } from 'prism-loader';
 *
 * const client = createClientFromEnv();
 * const result = await client.loads.load({ tableName: 'sales_orders' }, ['orders.csv'], 'Insert');
 *
 * if (result.status === 'Rejected') {
 *   console.error(result.body);
 * }
 * ```
 */

// Client exports
export {
  createClient,
  createClientFromEnv,
  PrismClientImpl,
  type PrismClient,
  type PrismClientOptions,
} from './client/index.js';

// Configuration exports
export * from './config/index.js';

// Auth exports
export * from './auth/index.js';

// Error exports
export * from './errors/index.js';

// Observability exports
export * from './observability/index.js';

// Transport exports
export * from './transport/index.js';

// Type exports
export * from './types/index.js';

// Schema exports
export * from './schema/index.js';

// Paging exports
export * from './paging/index.js';

// Staging exports
export * from './staging/index.js';

// Load exports
export * from './load/index.js';

// Service exports
export * from './services/index.js';
