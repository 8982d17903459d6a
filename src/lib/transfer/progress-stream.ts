import { Transform, type TransformCallback } from "stream";

/**
 * Snapshot of a running transfer. `total` is undefined when the size
 * is not known up front.
 */
export interface TransferProgress {
  transferred: number;
  total: number | undefined;
}

export type ProgressListener = (progress: TransferProgress) => void;

/**
 * Pass-through stream that counts the bytes flowing through it and reports
 * the running total after every chunk. Drop it into any pipeline, either
 * in front of a file write stream or as the body handed to an uploader.
 */
export class ProgressStream extends Transform {
  private transferred = 0;

  constructor(
    private readonly total: number | undefined,
    private readonly onProgress?: ProgressListener,
  ) {
    super();
  }

  get bytesTransferred(): number {
    return this.transferred;
  }

  override _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    this.transferred += chunk.length;
    this.onProgress?.({ transferred: this.transferred, total: this.total });
    callback(null, chunk);
  }
}
