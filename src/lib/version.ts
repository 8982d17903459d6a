import { readFileSync } from "fs";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string() });

/**
 * CLI version from package.json (two levels above src/lib and dist/lib)
 */
export function getCliVersion(): string {
  const content = readFileSync(
    new URL("../../package.json", import.meta.url),
    "utf8",
  );
  return packageJsonSchema.parse(JSON.parse(content)).version;
}
