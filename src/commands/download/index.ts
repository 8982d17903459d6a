import { Command } from "commander";
import chalk from "chalk";
import { downloadObject } from "../../lib/r2/operations.js";
import { createTransferProgress } from "../../lib/ui/transfer-progress.js";
import { resolveDownloadPath } from "../../lib/utils/output-path.js";
import {
  withErrorHandler,
  withR2Context,
  resolveBucket,
  requireOption,
} from "../../lib/command/index.js";

interface DownloadOptions {
  bucket?: string;
  key?: string;
  output?: string;
}

export const downloadCommand = new Command()
  .name("download")
  .description("Download an object to a local file")
  .option("-b, --bucket <name>", "Bucket name (defaults to DefaultBucket)")
  .option("-k, --key <key>", "Object key to download (required)")
  .option(
    "-o, --output <path>",
    "Output file or directory (defaults to the key in the current directory)",
  )
  .action(
    withErrorHandler(async (options: DownloadOptions) => {
      const key = requireOption(options.key, "Object key", "-k or --key");

      await withR2Context(async ({ config, client }) => {
        const bucket = resolveBucket(options.bucket, config);
        const outputPath = resolveDownloadPath(key, options.output);

        console.log(
          chalk.cyan(
            `Downloading '${key}' from bucket '${bucket}' to '${outputPath}'...`,
          ),
        );

        const progress = createTransferProgress();
        const result = await downloadObject(client, bucket, key, outputPath, {
          onProgress: progress.update,
        }).finally(progress.finish);

        if (result.total === undefined) {
          console.log(
            chalk.dim(
              "  Size was not reported by the store; no percentage shown",
            ),
          );
        }
        console.log(chalk.green(`✓ Downloaded '${key}' to '${result.path}'`));
      });
    }),
  );
