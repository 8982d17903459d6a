import type { ProgressListener } from "../transfer/progress-stream.js";

/**
 * Object entry from a bucket listing. Size may be absent in listings.
 */
export interface R2Object {
  key: string;
  size?: number;
}

export interface TransferOptions {
  onProgress?: ProgressListener;
}

export interface DownloadResult {
  path: string;
  bytes: number;
  /** ContentLength from the response, undefined when the store omitted it */
  total: number | undefined;
}

export interface UploadResult {
  bytes: number;
  total: number;
}
