import { S3Client } from "@aws-sdk/client-s3";
import type { R2Config } from "../config.js";
import { ClientError } from "../errors.js";

const R2_HOST = "r2.cloudflarestorage.com";

// R2 has no regions, but the SDK refuses to sign without one
const R2_REGION = "auto";

export function getR2Endpoint(accountId: string): string {
  return `https://${accountId}.${R2_HOST}`;
}

export function getR2BucketUrl(accountId: string, bucket: string): string {
  return `${getR2Endpoint(accountId)}/${bucket}`;
}

/**
 * Object URL with each key segment path-escaped, "/" separators kept
 */
export function getR2ObjectUrl(
  accountId: string,
  bucket: string,
  key: string,
): string {
  return `${getR2BucketUrl(accountId, bucket)}/${encodeKeyPath(key)}`;
}

export function encodeKeyPath(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

/**
 * Create an S3 client bound to the account's R2 endpoint
 */
export function createR2Client(config: R2Config): S3Client {
  const endpoint = getR2Endpoint(config.accountId);

  let parsed: URL;
  try {
    parsed = new URL(endpoint);
  } catch (error) {
    throw new ClientError(
      `Invalid R2 endpoint for account '${config.accountId}'`,
      { cause: error },
    );
  }
  if (parsed.hostname !== `${config.accountId}.${R2_HOST}`.toLowerCase()) {
    throw new ClientError(
      `Invalid R2 endpoint for account '${config.accountId}'`,
    );
  }

  try {
    return new S3Client({
      region: R2_REGION,
      endpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  } catch (error) {
    throw new ClientError("Failed to create R2 client", { cause: error });
  }
}
