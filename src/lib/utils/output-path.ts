import { statSync } from "fs";
import { join, posix } from "path";

/**
 * Where a downloaded object is written:
 * - no output: current directory, "/" in the key replaced by "_"
 * - existing directory: the key's base name inside it
 * - anything else: used as given
 */
export function resolveDownloadPath(key: string, output?: string): string {
  if (!output) {
    return join(".", key.replaceAll("/", "_"));
  }

  const stats = statSync(output, { throwIfNoEntry: false });
  if (stats?.isDirectory()) {
    return join(output, posix.basename(key));
  }
  return output;
}
