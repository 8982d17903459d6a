import { Command } from "commander";
import chalk from "chalk";
import { listObjects } from "../../lib/r2/operations.js";
import {
  withErrorHandler,
  withR2Context,
  resolveBucket,
} from "../../lib/command/index.js";

export const listCommand = new Command()
  .name("list")
  .alias("ls")
  .description("List all objects in a bucket")
  .option("-b, --bucket <name>", "Bucket name (defaults to DefaultBucket)")
  .action(
    withErrorHandler(async (options: { bucket?: string }) => {
      await withR2Context(async ({ config, client }) => {
        const bucket = resolveBucket(options.bucket, config);
        const objects = await listObjects(client, bucket);

        if (objects.length === 0) {
          console.log(chalk.dim("No objects found in the bucket."));
          return;
        }

        for (const object of objects) {
          const size = object.size === undefined ? "N/A" : String(object.size);
          console.log(`${object.key} | ${size}`);
        }
      });
    }),
  );
