export { type BucketsService, BucketsServiceImpl, generateBucketName } from './service.js';
export {
  BucketRecordSchema,
  BUCKETS_PAGE_SIZE,
  BUCKET_NAME_PREFIX,
  type Bucket,
  type BucketListParams,
  type BucketCreateParams,
  type BucketCompletion,
} from './types.js';
