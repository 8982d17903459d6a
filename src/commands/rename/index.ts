import { Command } from "commander";
import chalk from "chalk";
import { renameObject } from "../../lib/r2/operations.js";
import {
  withErrorHandler,
  withR2Context,
  resolveBucket,
  requireOption,
} from "../../lib/command/index.js";

interface RenameOptions {
  bucket?: string;
  oldKey?: string;
  newKey?: string;
}

export const renameCommand = new Command()
  .name("rename")
  .alias("mv")
  .description(
    "Rename an object (copy to the new key, then delete the old one)",
  )
  .option("-b, --bucket <name>", "Bucket name (defaults to DefaultBucket)")
  .option("-o, --old-key <key>", "Current object key (required)")
  .option("-n, --new-key <key>", "New object key (required)")
  .action(
    withErrorHandler(async (options: RenameOptions) => {
      const oldKey = requireOption(
        options.oldKey,
        "Old object key",
        "-o or --old-key",
      );
      const newKey = requireOption(
        options.newKey,
        "New object key",
        "-n or --new-key",
      );

      await withR2Context(async ({ config, client }) => {
        const bucket = resolveBucket(options.bucket, config);

        console.log(
          chalk.cyan(
            `Renaming '${oldKey}' to '${newKey}' in bucket '${bucket}'...`,
          ),
        );
        await renameObject(client, bucket, oldKey, newKey);
        console.log(
          chalk.green(`✓ Renamed '${oldKey}' to '${newKey}' in '${bucket}'`),
        );
      });
    }),
  );
