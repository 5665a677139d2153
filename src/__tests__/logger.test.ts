import { describe, expect, it } from "vitest";
import { createModuleLogger, LOG_LEVEL_ENV, resolveLogLevel } from "../logger.js";

describe("logger", () => {
  it("prefers an explicit level", () => {
    expect(resolveLogLevel("debug")).toBe("debug");
    expect(createModuleLogger("preprocess", "error").level).toBe("error");
  });

  it("falls back to the environment", () => {
    expect(process.env[LOG_LEVEL_ENV]).toBe("silent");
    expect(resolveLogLevel()).toBe("silent");
  });
});
