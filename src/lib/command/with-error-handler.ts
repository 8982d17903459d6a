import chalk from "chalk";
import { ConfigError, PartialRenameError } from "../errors.js";
import { DEFAULT_CONFIG_PATH } from "../config.js";

/**
 * Wraps a Commander.js action handler with centralized error handling.
 *
 * Catches errors thrown by the action, prints them to stderr with the
 * failure marker, and calls process.exit(1). Nothing is retried.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`✗ ${error.message}`));
      } else {
        console.error(chalk.red("✗ An unexpected error occurred"));
      }

      if (error instanceof Error && error.cause instanceof Error) {
        console.error(chalk.dim(`  Cause: ${error.cause.message}`));
      }

      if (error instanceof ConfigError) {
        console.error(chalk.dim(`  Config file: ${DEFAULT_CONFIG_PATH}`));
      } else if (error instanceof PartialRenameError) {
        console.error(
          chalk.yellow(
            `  Both '${error.oldKey}' and '${error.newKey}' now exist in bucket '${error.bucket}'. Delete one of them manually.`,
          ),
        );
      }

      process.exit(1);
    }
  };
}
