import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  ErrorCode,
  InputShapeError,
  TopologyError,
  isTopologyError,
  wrapError,
} from "../errors.js";

describe("errors", () => {
  it("formats the code and name", () => {
    const error = new InputShapeError("CMDB record list is empty", ErrorCode.INPUT_EMPTY);

    expect(error).toBeInstanceOf(TopologyError);
    expect(error.toString()).toBe("[E1001] InputShapeError: CMDB record list is empty");
  });

  it("names the config file", () => {
    const error = new ConfigurationError("Bad value", ErrorCode.CONFIG_INVALID, { configPath: "/tmp/c.json" });
    expect(error.toString()).toBe("[E2000] ConfigurationError: Bad value in /tmp/c.json");
  });

  it("serializes for logging", () => {
    const json = new TopologyError("boom", ErrorCode.FILE_SYSTEM_ERROR, { filePath: "x" }).toJSON();
    expect(json).toMatchObject({ name: "TopologyError", message: "boom", code: "E9002", context: { filePath: "x" } });
  });

  describe("wrapError", () => {
    it("returns topology errors unchanged", () => {
      const original = new InputShapeError("bad");
      expect(wrapError(original)).toBe(original);
    });

    it("wraps plain errors with the given code", () => {
      const wrapped = wrapError(new Error("disk gone"), "fallback", ErrorCode.FILE_SYSTEM_ERROR);

      expect(isTopologyError(wrapped)).toBe(true);
      expect(wrapped.message).toBe("disk gone");
      expect(wrapped.code).toBe(ErrorCode.FILE_SYSTEM_ERROR);
      expect(wrapped.context?.originalError).toBe("Error");
    });

    it("uses strings and falls back for anything else", () => {
      expect(wrapError("text").message).toBe("text");
      expect(wrapError(42, "fallback").message).toBe("fallback");
      expect(wrapError(42).code).toBe(ErrorCode.UNKNOWN_ERROR);
    });
  });
});
