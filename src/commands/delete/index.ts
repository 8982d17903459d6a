import { Command } from "commander";
import chalk from "chalk";
import { deleteObject } from "../../lib/r2/operations.js";
import {
  withErrorHandler,
  withR2Context,
  resolveBucket,
  requireOption,
} from "../../lib/command/index.js";

export const deleteCommand = new Command()
  .name("delete")
  .alias("rm")
  .description("Delete an object")
  .option("-b, --bucket <name>", "Bucket name (defaults to DefaultBucket)")
  .option("-k, --key <key>", "Object key to delete (required)")
  .action(
    withErrorHandler(async (options: { bucket?: string; key?: string }) => {
      const key = requireOption(options.key, "Object key", "-k or --key");

      await withR2Context(async ({ config, client }) => {
        const bucket = resolveBucket(options.bucket, config);

        console.log(chalk.cyan(`Deleting '${key}' from bucket '${bucket}'...`));
        await deleteObject(client, bucket, key);
        console.log(chalk.green(`✓ Deleted '${key}' from '${bucket}'`));
      });
    }),
  );
