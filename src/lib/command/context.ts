import type { S3Client } from "@aws-sdk/client-s3";
import { loadConfig, type R2Config } from "../config.js";
import { createR2Client } from "../r2/client.js";

export interface R2Context {
  config: R2Config;
  client: S3Client;
}

/**
 * Load config, build the client, run the action, and release the client's
 * sockets afterwards so the process can exit.
 */
export async function withR2Context<T>(
  fn: (context: R2Context) => Promise<T>,
): Promise<T> {
  const config = await loadConfig();
  const client = createR2Client(config);
  try {
    return await fn({ config, client });
  } finally {
    client.destroy();
  }
}

/**
 * The -b flag when given, otherwise the configured default bucket
 */
export function resolveBucket(
  bucket: string | undefined,
  config: R2Config,
): string {
  return bucket || config.defaultBucket;
}

/**
 * Return the option value or throw a usage error naming the flags
 */
export function requireOption(
  value: string | undefined,
  description: string,
  flags: string,
): string {
  if (!value) {
    throw new Error(`${description} not specified. Use ${flags} flag.`);
  }
  return value;
}
