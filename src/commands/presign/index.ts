import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { presignObjectUrl } from "../../lib/r2/operations.js";
import {
  withErrorHandler,
  withR2Context,
  resolveBucket,
  requireOption,
} from "../../lib/command/index.js";

const DEFAULT_EXPIRY_HOURS = 24;

export function parseExpiryHours(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expiry must be a whole number of hours.");
  }
  return Number.parseInt(value, 10);
}

interface PresignOptions {
  bucket?: string;
  key?: string;
  expiry: number;
}

export const presignCommand = new Command()
  .name("presign")
  .description("Generate a time-limited download URL for an object")
  .option("-b, --bucket <name>", "Bucket name (defaults to DefaultBucket)")
  .option("-k, --key <key>", "Object key (required)")
  .option(
    "-e, --expiry <hours>",
    "URL expiry time in hours",
    parseExpiryHours,
    DEFAULT_EXPIRY_HOURS,
  )
  .action(
    withErrorHandler(async (options: PresignOptions) => {
      const key = requireOption(options.key, "Object key", "-k or --key");

      await withR2Context(async ({ config, client }) => {
        const bucket = resolveBucket(options.bucket, config);

        console.log(
          chalk.cyan(
            `Generating presigned URL for '${key}' in bucket '${bucket}' with ${options.expiry}-hour expiry...`,
          ),
        );
        const url = await presignObjectUrl(
          client,
          bucket,
          key,
          options.expiry * 60 * 60,
        );
        console.log(`Presigned URL: ${url}`);
      });
    }),
  );
