import { describe, it, expect } from "vitest";
import { requireOption, resolveBucket } from "../context.js";

const config = {
  accountId: "test-account",
  accessKeyId: "test-key",
  secretAccessKey: "test-secret",
  defaultBucket: "default-bucket",
};

describe("command context helpers", () => {
  describe("resolveBucket", () => {
    it("should prefer the bucket flag", () => {
      expect(resolveBucket("media", config)).toBe("media");
    });

    it("should fall back to the configured default bucket", () => {
      expect(resolveBucket(undefined, config)).toBe("default-bucket");
      expect(resolveBucket("", config)).toBe("default-bucket");
    });
  });

  describe("requireOption", () => {
    it("should return a given value", () => {
      expect(requireOption("a.txt", "Object key", "-k or --key")).toBe("a.txt");
    });

    it("should name the flags when the value is missing", () => {
      expect(() => requireOption(undefined, "Object key", "-k or --key")).toThrow(
        "Object key not specified. Use -k or --key flag.",
      );
    });
  });
});
