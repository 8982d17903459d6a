#!/usr/bin/env node
import { Command } from "commander";
import { listCommand } from "./commands/list/index.js";
import { downloadCommand } from "./commands/download/index.js";
import { uploadCommand } from "./commands/upload/index.js";
import { deleteCommand } from "./commands/delete/index.js";
import { renameCommand } from "./commands/rename/index.js";
import { presignCommand } from "./commands/presign/index.js";
import { infoCommand } from "./commands/info/index.js";
import { getCliVersion } from "./lib/version.js";

const program = new Command();

program
  .name("r2obj")
  .description("Manage objects in Cloudflare R2 buckets")
  .version(getCliVersion())
  .showHelpAfterError();

program.addCommand(listCommand);
program.addCommand(downloadCommand);
program.addCommand(uploadCommand);
program.addCommand(deleteCommand);
program.addCommand(renameCommand);
program.addCommand(presignCommand);
program.addCommand(infoCommand);

export { program };

if (
  process.argv[1]?.endsWith("index.js") ||
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("r2obj")
) {
  await program.parseAsync();
}
