/**
 * Error taxonomy for the CLI. Every class keeps the underlying failure as
 * `cause` so the error handler can print it on a separate line.
 */

/**
 * Missing or unreadable configuration
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * R2 client could not be constructed
 */
export class ClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClientError";
  }
}

export type StoreOperation =
  | "list"
  | "download"
  | "upload"
  | "delete"
  | "copy"
  | "presign";

/**
 * A call against the object store failed
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly operation: StoreOperation,
    public readonly bucket: string,
    public readonly key?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

/**
 * Rename copied the object but could not delete the original.
 * Both keys exist in the bucket afterwards.
 */
export class PartialRenameError extends StoreError {
  constructor(
    bucket: string,
    public readonly oldKey: string,
    public readonly newKey: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Copy to '${newKey}' succeeded but failed to delete original object '${oldKey}' from bucket '${bucket}'`,
      "delete",
      bucket,
      oldKey,
      options,
    );
    this.name = "PartialRenameError";
  }
}

/**
 * Local filesystem failure
 */
export class IOError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "IOError";
  }
}
