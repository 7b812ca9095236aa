/**
 * Upload Types
 */

export type UploadProgressCallback = (percentage: number, status: string) => void;

export interface UploadResult {
  success: boolean;
  /** Download page for the uploaded file */
  link?: string;
  error?: string;
}

export interface Uploader {
  readonly name: string;
  upload(filePath: string, onProgress?: UploadProgressCallback): Promise<UploadResult>;
}
