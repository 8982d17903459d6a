import { Command } from "commander";
import chalk from "chalk";
import { existsSync } from "fs";
import {
  CONFIG_FIELDS,
  DEFAULT_CONFIG_PATH,
  expandHome,
  loadConfig,
  type R2Config,
} from "../../lib/config.js";
import { getR2BucketUrl, getR2Endpoint } from "../../lib/r2/client.js";
import { maskSecret } from "../../lib/utils/file-utils.js";
import { getCliVersion } from "../../lib/version.js";
import { withErrorHandler } from "../../lib/command/index.js";

function source(field: keyof R2Config): string {
  return process.env[CONFIG_FIELDS[field].envVar]
    ? `${CONFIG_FIELDS[field].envVar} env var`
    : "config file";
}

export const infoCommand = new Command()
  .name("info")
  .description("Display resolved configuration and environment information")
  .action(
    withErrorHandler(async () => {
      console.log(chalk.bold(`r2obj v${getCliVersion()}`));
      console.log();

      const configExists = existsSync(expandHome(DEFAULT_CONFIG_PATH));
      console.log(chalk.bold("Configuration:"));
      console.log(
        `  File: ${DEFAULT_CONFIG_PATH}${configExists ? "" : " (not found)"}`,
      );

      const config = await loadConfig();
      console.log(
        `  Account ID: ${config.accountId} ${chalk.dim(`(${source("accountId")})`)}`,
      );
      console.log(
        `  Access Key ID: ${maskSecret(config.accessKeyId)} ${chalk.dim(`(${source("accessKeyId")})`)}`,
      );
      console.log(
        `  Default Bucket: ${config.defaultBucket} ${chalk.dim(`(${source("defaultBucket")})`)}`,
      );
      console.log();

      console.log(chalk.bold("Endpoint:"));
      console.log(`  Account: ${getR2Endpoint(config.accountId)}`);
      console.log(
        `  Default Bucket: ${getR2BucketUrl(config.accountId, config.defaultBucket)}`,
      );
      console.log();

      console.log(chalk.bold("System:"));
      console.log(`  Node: ${process.version}`);
      console.log(`  Platform: ${process.platform} (${process.arch})`);
    }),
  );
