import { homedir } from "os";
import { join } from "path";
import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface R2Config {
  readonly accountId: string;
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly defaultBucket: string;
}

export const DEFAULT_CONFIG_PATH = "~/.local/cfg/r2obj.toml";

// Unknown keys are stripped, recognised keys must be strings
const fileConfigSchema = z.object({
  AccountID: z.string().optional(),
  AccessKeyID: z.string().optional(),
  SecretAccessKey: z.string().optional(),
  DefaultBucket: z.string().optional(),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * File key and environment variable for each config field, in the order
 * they are validated.
 */
export const CONFIG_FIELDS = {
  accountId: { fileKey: "AccountID", envVar: "R2_ACCOUNT_ID" },
  accessKeyId: { fileKey: "AccessKeyID", envVar: "R2_ACCESS_KEY_ID" },
  secretAccessKey: {
    fileKey: "SecretAccessKey",
    envVar: "R2_SECRET_ACCESS_KEY",
  },
  defaultBucket: { fileKey: "DefaultBucket", envVar: "R2_DEFAULT_BUCKET" },
} as const satisfies Record<
  keyof R2Config,
  { fileKey: keyof FileConfig; envVar: string }
>;

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return homedir();
  }
  if (filePath.startsWith("~/")) {
    return join(homedir(), filePath.slice(2));
  }
  return filePath;
}

async function readConfigFile(filePath: string): Promise<FileConfig> {
  if (!existsSync(filePath)) {
    return {};
  }

  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${filePath}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${filePath}`, {
      cause: error,
    });
  }

  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ConfigError(`Invalid config file ${filePath} (${details})`);
  }
  return result.data;
}

/**
 * Load R2 settings from the TOML config file, then let non-empty
 * environment variables override individual fields.
 *
 * A missing file is fine as long as the environment supplies every field.
 */
export async function loadConfig(
  filePath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<R2Config> {
  const expandedPath = expandHome(filePath);
  const fileConfig = await readConfigFile(expandedPath);

  const resolve = (field: keyof R2Config): string => {
    const { fileKey, envVar } = CONFIG_FIELDS[field];
    const fromEnv = env[envVar];
    if (fromEnv) {
      return fromEnv;
    }
    const fromFile = fileConfig[fileKey] ?? "";
    if (!fromFile) {
      throw new ConfigError(
        `${fileKey} is not set. Provide it in ${expandedPath} or via the ${envVar} environment variable`,
      );
    }
    return fromFile;
  };

  return Object.freeze({
    accountId: resolve("accountId"),
    accessKeyId: resolve("accessKeyId"),
    secretAccessKey: resolve("secretAccessKey"),
    defaultBucket: resolve("defaultBucket"),
  });
}
