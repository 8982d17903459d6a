import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { expandHome, loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

vi.mock("os", async (importOriginal) => {
  const actual = await importOriginal<typeof import("os")>();
  return { ...actual, homedir: vi.fn(() => actual.homedir()) };
});

const FULL_CONFIG = `
AccountID = "file-account"
AccessKeyID = "file-key"
SecretAccessKey = "test-secret"
DefaultBucket = "file-bucket"
`;

const FULL_ENV = {
  R2_ACCOUNT_ID: "env-account",
  R2_ACCESS_KEY_ID: "env-key",
  R2_SECRET_ACCESS_KEY: "env-secret",
  R2_DEFAULT_BUCKET: "env-bucket",
};

describe("config", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "r2obj-config-"));
    configPath = path.join(tempDir, "r2obj.toml");
    vi.mocked(os.homedir).mockReturnValue(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("expandHome", () => {
    it("should expand a bare tilde", () => {
      expect(expandHome("~")).toBe(tempDir);
    });

    it("should expand a leading tilde path", () => {
      expect(expandHome("~/.local/cfg/r2obj.toml")).toBe(
        path.join(tempDir, ".local/cfg/r2obj.toml"),
      );
    });

    it("should leave other paths alone", () => {
      expect(expandHome("/etc/r2obj.toml")).toBe("/etc/r2obj.toml");
      expect(expandHome("~other/r2obj.toml")).toBe("~other/r2obj.toml");
    });
  });

  describe("loadConfig", () => {
    it("should read every field from the config file", async () => {
      fs.writeFileSync(configPath, FULL_CONFIG);

      const config = await loadConfig(configPath, {});

      expect(config).toEqual({
        accountId: "file-account",
        accessKeyId: "file-key",
        secretAccessKey: "test-secret",
        defaultBucket: "file-bucket",
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("should accept a missing file when the environment has every field", async () => {
      const config = await loadConfig(configPath, FULL_ENV);

      expect(config).toEqual({
        accountId: "env-account",
        accessKeyId: "env-key",
        secretAccessKey: "env-secret",
        defaultBucket: "env-bucket",
      });
    });

    it("should let environment values override file values per field", async () => {
      fs.writeFileSync(configPath, FULL_CONFIG);

      const config = await loadConfig(configPath, {
        R2_DEFAULT_BUCKET: "env-bucket",
      });

      expect(config).toEqual({
        accountId: "file-account",
        accessKeyId: "file-key",
        secretAccessKey: "test-secret",
        defaultBucket: "env-bucket",
      });
    });

    it("should ignore empty environment values", async () => {
      fs.writeFileSync(configPath, FULL_CONFIG);

      const config = await loadConfig(configPath, { R2_ACCOUNT_ID: "" });

      expect(config.accountId).toBe("file-account");
    });

    it("should name the first missing field", async () => {
      fs.writeFileSync(configPath, 'AccountID = "file-account"\n');

      await expect(loadConfig(configPath, {})).rejects.toThrow(
        `AccessKeyID is not set. Provide it in ${configPath} or via the R2_ACCESS_KEY_ID environment variable`,
      );
    });

    it("should treat an empty file value as missing", async () => {
      fs.writeFileSync(configPath, FULL_CONFIG.replace("file-bucket", ""));

      const error = await loadConfig(configPath, {}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        message: `DefaultBucket is not set. Provide it in ${configPath} or via the R2_DEFAULT_BUCKET environment variable`,
      });
    });

    it("should reject a file that is not valid TOML", async () => {
      fs.writeFileSync(configPath, "AccountID = \n[[[");

      const error = await loadConfig(configPath, FULL_ENV).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        message: `Failed to parse config file ${configPath}`,
      });
    });

    it("should reject a recognised field holding a non-string", async () => {
      fs.writeFileSync(configPath, "AccountID = 123\n");

      await expect(loadConfig(configPath, FULL_ENV)).rejects.toThrow(
        `Invalid config file ${configPath} (AccountID: Expected string, received number)`,
      );
    });

    it("should ignore unknown fields", async () => {
      fs.writeFileSync(
        configPath,
        `${FULL_CONFIG}\nEndpoint = "https://example.com"\nRetries = 3\n`,
      );

      const config = await loadConfig(configPath, {});

      expect(config).toEqual({
        accountId: "file-account",
        accessKeyId: "file-key",
        secretAccessKey: "test-secret",
        defaultBucket: "file-bucket",
      });
    });

    it("should read the default path under the home directory", async () => {
      const configDir = path.join(tempDir, ".local", "cfg");
      fs.mkdirSync(configDir, { recursive: true });
      fs.writeFileSync(path.join(configDir, "r2obj.toml"), FULL_CONFIG);

      const config = await loadConfig(undefined, {});

      expect(config.defaultBucket).toBe("file-bucket");
    });
  });
});
