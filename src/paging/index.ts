export {
  DEFAULT_PAGE_LIMIT,
  type PageRequest,
  type PageFailure,
  type PageFetchResult,
  type ItemFetchResult,
  type PagedSource,
  type PagerQuery,
  type ScanOutcome,
  type ScanResult,
  type HttpPagedSourceOptions,
  ResourcePager,
  createHttpPagedSource,
} from './resource-pager.js';
