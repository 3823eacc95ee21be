export { FileStager } from './file-stager.js';
export {
  UploadReceiptSchema,
  EMPTY_UPLOAD_NAME,
  type UploadReceipt,
  type StagingTarget,
  type StagingFiles,
  type SkipReason,
  type SkippedFile,
  type StagingResult,
  type ContainerFactory,
} from './types.js';
