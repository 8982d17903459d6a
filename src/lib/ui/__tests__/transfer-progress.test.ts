import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type MockInstance,
} from "vitest";
import {
  createTransferProgress,
  formatProgressLine,
} from "../transfer-progress.js";

describe("transfer-progress", () => {
  describe("formatProgressLine", () => {
    it("should show bytes and percentage", () => {
      expect(formatProgressLine({ transferred: 512, total: 2048 })).toBe(
        "512 / 2048 (25.00%)",
      );
    });

    it("should round the percentage to two decimals", () => {
      expect(formatProgressLine({ transferred: 1, total: 3 })).toBe(
        "1 / 3 (33.33%)",
      );
    });

    it("should show only bytes when the total is unknown", () => {
      expect(formatProgressLine({ transferred: 100, total: undefined })).toBe(
        "100 bytes",
      );
    });

    it("should treat an empty object as complete", () => {
      expect(formatProgressLine({ transferred: 0, total: 0 })).toBe(
        "0 / 0 (100.00%)",
      );
    });
  });

  describe("createTransferProgress", () => {
    let output: string[];
    let writeSpy: MockInstance<typeof process.stdout.write>;

    beforeEach(() => {
      output = [];
      writeSpy = vi
        .spyOn(process.stdout, "write")
        .mockImplementation((chunk: string | Uint8Array) => {
          output.push(String(chunk));
          return true;
        });
    });

    afterEach(() => {
      writeSpy.mockRestore();
    });

    it("should redraw one line in interactive mode", () => {
      const progress = createTransferProgress(true);

      progress.update({ transferred: 5, total: 10 });
      progress.update({ transferred: 10, total: 10 });
      progress.finish();

      expect(output).toEqual([
        "\r5 / 10 (50.00%)",
        "\r10 / 10 (100.00%)",
        "\n",
      ]);
    });

    it("should print only the final line in non-interactive mode", () => {
      const progress = createTransferProgress(false);

      progress.update({ transferred: 5, total: 10 });
      progress.update({ transferred: 10, total: 10 });
      progress.finish();

      expect(output).toEqual(["10 / 10 (100.00%)\n"]);
    });

    it("should print nothing when no progress was recorded", () => {
      const progress = createTransferProgress(true);

      progress.finish();

      expect(output).toEqual([]);
    });
  });
});
