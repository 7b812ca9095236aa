/**
 * @trackdrop/upload
 *
 * Upload targets for packaged archives.
 */

export type { Uploader, UploadResult, UploadProgressCallback } from './types.js';

export {
  GofileUploader,
  extractServerName,
  extractDownloadPage,
  type GofileConfig,
} from './targets/gofile.js';
