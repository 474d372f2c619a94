import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { formatDuration, parseThreshold, readJsonArgument } from "../commands/shared.js";
import { ErrorCode } from "../../core/errors.js";

describe("CLI helpers", () => {
  it("parses thresholds", () => {
    expect(parseThreshold("12.5")).toBe(12.5);
    expect(parseThreshold("0")).toBe(0);
    expect(() => parseThreshold("-3")).toThrow(InvalidArgumentError);
    expect(() => parseThreshold("lots")).toThrow("Threshold must be a non-negative number.");
  });

  it("formats durations", () => {
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });

  it("reports a missing file argument", async () => {
    await expect(readJsonArgument("/nonexistent/tree.json")).rejects.toMatchObject({
      code: ErrorCode.INPUT_FILE_NOT_FOUND,
    });
  });
});
