export { type ServiceContext } from './context.js';
export * from './tables/index.js';
export * from './buckets/index.js';
export * from './data-changes/index.js';
export * from './file-containers/index.js';
export * from './data-sources/index.js';
