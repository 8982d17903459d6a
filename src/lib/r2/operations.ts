import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  type S3Client,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { open, type FileHandle } from "fs/promises";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { IOError, PartialRenameError, StoreError } from "../errors.js";
import { ProgressStream } from "../transfer/progress-stream.js";
import { encodeKeyPath } from "./client.js";
import type {
  DownloadResult,
  R2Object,
  TransferOptions,
  UploadResult,
} from "./types.js";

export const DEFAULT_PRESIGN_EXPIRY_SECONDS = 24 * 60 * 60;

/**
 * List every object in a bucket, following continuation tokens until the
 * last page. A failure on any page discards what was already collected.
 */
export async function listObjects(
  client: S3Client,
  bucket: string,
): Promise<R2Object[]> {
  const objects: R2Object[] = [];
  let continuationToken: string | undefined;

  try {
    do {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ContinuationToken: continuationToken,
        }),
      );

      for (const item of response.Contents ?? []) {
        if (!item.Key) continue;
        objects.push(
          item.Size === undefined
            ? { key: item.Key }
            : { key: item.Key, size: item.Size },
        );
      }

      continuationToken = response.IsTruncated
        ? response.NextContinuationToken
        : undefined;
    } while (continuationToken);
  } catch (error) {
    throw new StoreError(
      `Failed to list objects in bucket '${bucket}'`,
      "list",
      bucket,
      undefined,
      { cause: error },
    );
  }

  return objects;
}

/**
 * Download one object to a local file, reporting progress as bytes land.
 * A partially written file is left in place when the transfer fails.
 */
export async function downloadObject(
  client: S3Client,
  bucket: string,
  key: string,
  destinationPath: string,
  options: TransferOptions = {},
): Promise<DownloadResult> {
  let body: Readable;
  let total: number | undefined;
  try {
    const response = await client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key }),
    );
    if (!(response.Body instanceof Readable)) {
      throw new Error("Empty response body");
    }
    body = response.Body;
    total = response.ContentLength;
  } catch (error) {
    throw new StoreError(
      `Failed to get object '${key}' from bucket '${bucket}'`,
      "download",
      bucket,
      key,
      { cause: error },
    );
  }

  let file: FileHandle;
  try {
    file = await open(destinationPath, "w");
  } catch (error) {
    body.destroy();
    throw new IOError(
      `Failed to create local file '${destinationPath}'`,
      destinationPath,
      { cause: error },
    );
  }

  const progress = new ProgressStream(total, options.onProgress);
  try {
    await pipeline(body, progress, file.createWriteStream());
  } catch (error) {
    throw new IOError(
      `Failed to write object content to file '${destinationPath}'`,
      destinationPath,
      { cause: error },
    );
  } finally {
    // No-op when the write stream already closed the handle
    await file.close();
  }

  return { path: destinationPath, bytes: progress.bytesTransferred, total };
}

/**
 * Upload a local file. Part sizing and multipart orchestration are left to
 * the SDK's Upload helper.
 */
export async function uploadObject(
  client: S3Client,
  bucket: string,
  key: string,
  sourcePath: string,
  options: TransferOptions = {},
): Promise<UploadResult> {
  let file: FileHandle;
  try {
    file = await open(sourcePath, "r");
  } catch (error) {
    throw new IOError(`Failed to open local file '${sourcePath}'`, sourcePath, {
      cause: error,
    });
  }

  let size: number;
  try {
    size = (await file.stat()).size;
  } catch (error) {
    await file.close();
    throw new IOError(
      `Failed to get file info for '${sourcePath}'`,
      sourcePath,
      { cause: error },
    );
  }

  const source = file.createReadStream();
  const progress = new ProgressStream(size, options.onProgress);
  let readError: Error | undefined;
  source.on("error", (error) => {
    readError = error;
    progress.destroy(error);
  });
  source.pipe(progress);

  try {
    const upload = new Upload({
      client,
      params: { Bucket: bucket, Key: key, Body: progress },
    });
    await upload.done();
  } catch (error) {
    if (readError) {
      throw new IOError(
        `Failed to read local file '${sourcePath}'`,
        sourcePath,
        { cause: readError },
      );
    }
    throw new StoreError(
      `Failed to upload object '${key}' to bucket '${bucket}'`,
      "upload",
      bucket,
      key,
      { cause: error },
    );
  } finally {
    source.destroy();
  }

  return { bytes: progress.bytesTransferred, total: size };
}

/**
 * Delete one object. Deleting a key that does not exist succeeds.
 */
export async function deleteObject(
  client: S3Client,
  bucket: string,
  key: string,
): Promise<void> {
  try {
    await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  } catch (error) {
    throw new StoreError(
      `Failed to delete object '${key}' from bucket '${bucket}'`,
      "delete",
      bucket,
      key,
      { cause: error },
    );
  }
}

/**
 * Rename by server-side copy followed by delete of the original.
 *
 * Not atomic: if the delete fails after a successful copy, both keys exist
 * and a PartialRenameError is thrown. Nothing is rolled back.
 */
export async function renameObject(
  client: S3Client,
  bucket: string,
  oldKey: string,
  newKey: string,
): Promise<void> {
  try {
    await client.send(
      new CopyObjectCommand({
        Bucket: bucket,
        CopySource: `${bucket}/${encodeKeyPath(oldKey)}`,
        Key: newKey,
      }),
    );
  } catch (error) {
    throw new StoreError(
      `Failed to copy object from '${oldKey}' to '${newKey}' in bucket '${bucket}'`,
      "copy",
      bucket,
      oldKey,
      { cause: error },
    );
  }

  try {
    await deleteObject(client, bucket, oldKey);
  } catch (error) {
    throw new PartialRenameError(bucket, oldKey, newKey, {
      cause: error instanceof StoreError ? error.cause : error,
    });
  }
}

/**
 * Presigned GET URL for an object. Expiry limits are enforced by the
 * signer, not here.
 */
export async function presignObjectUrl(
  client: S3Client,
  bucket: string,
  key: string,
  expiresInSeconds: number = DEFAULT_PRESIGN_EXPIRY_SECONDS,
): Promise<string> {
  try {
    return await getSignedUrl(
      client,
      new GetObjectCommand({ Bucket: bucket, Key: key }),
      { expiresIn: expiresInSeconds },
    );
  } catch (error) {
    throw new StoreError(
      `Failed to generate presigned URL for object '${key}' in bucket '${bucket}'`,
      "presign",
      bucket,
      key,
      { cause: error },
    );
  }
}
