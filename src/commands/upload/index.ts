import { Command } from "commander";
import chalk from "chalk";
import { uploadObject } from "../../lib/r2/operations.js";
import { createTransferProgress } from "../../lib/ui/transfer-progress.js";
import { getR2ObjectUrl } from "../../lib/r2/client.js";
import { formatBytes } from "../../lib/utils/file-utils.js";
import {
  withErrorHandler,
  withR2Context,
  resolveBucket,
  requireOption,
} from "../../lib/command/index.js";

interface UploadOptions {
  bucket?: string;
  file?: string;
  key?: string;
}

export const uploadCommand = new Command()
  .name("upload")
  .description("Upload a local file")
  .option("-b, --bucket <name>", "Bucket name (defaults to DefaultBucket)")
  .option("-f, --file <path>", "Local file to upload (required)")
  .option("-k, --key <key>", "Object key for the uploaded file (required)")
  .action(
    withErrorHandler(async (options: UploadOptions) => {
      const filePath = requireOption(options.file, "File path", "-f or --file");
      const key = requireOption(options.key, "Object key", "-k or --key");

      await withR2Context(async ({ config, client }) => {
        const bucket = resolveBucket(options.bucket, config);

        console.log(
          chalk.cyan(
            `Uploading '${filePath}' to bucket '${bucket}' as '${key}'...`,
          ),
        );

        const progress = createTransferProgress();
        const result = await uploadObject(client, bucket, key, filePath, {
          onProgress: progress.update,
        }).finally(progress.finish);

        console.log(
          chalk.green(
            `✓ Uploaded '${filePath}' to '${key}' (${formatBytes(result.total)})`,
          ),
        );
        console.log(
          chalk.dim(`  URL: ${getR2ObjectUrl(config.accountId, bucket, key)}`),
        );
      });
    }),
  );
