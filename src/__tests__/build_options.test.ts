import { describe, expect, it } from "vitest";
import { parseBuildOptions } from "../build_options.js";
import { BuildOptionsError } from "../errors.js";

function optionIssues(input: unknown): string[] {
  try {
    parseBuildOptions(input);
  } catch (err) {
    if (err instanceof BuildOptionsError) return err.issues;
    throw err;
  }
  throw new Error("expected invalid options");
}

describe("parseBuildOptions", () => {
  it("fills in defaults", () => {
    expect(parseBuildOptions({ themeName: "Dusk" })).toEqual({
      themeName: "Dusk",
      confineToRoot: false,
      configExtensions: ["reapertheme", "ini"],
      scriptExtensions: ["lua"],
      globals: {},
    });
  });

  it("normalizes extensions", () => {
    const options = parseBuildOptions({ themeName: "Dusk", configExtensions: [".INI", "Cfg"] });
    expect(options.configExtensions).toEqual(["ini", "cfg"]);
  });

  it("keeps an injected clock and environment", () => {
    const now = new Date(0);
    const options = parseBuildOptions({ themeName: "Dusk", now, env: { A: "1" } });
    expect(options.now).toBe(now);
    expect(options.env).toEqual({ A: "1" });
  });

  it("lists every problem with its path", () => {
    expect(optionIssues({})).toEqual(["themeName: Required"]);
    expect(optionIssues({ themeName: "x", scriptExtensions: ["a b"] })).toEqual([
      "scriptExtensions.0: extension must be a plain file suffix",
    ]);
    expect(optionIssues("nope")).toEqual(["options: Expected object, received string"]);
  });

  it("rejects unknown log levels", () => {
    const [issue] = optionIssues({ themeName: "x", logLevel: "loud" });
    expect(issue?.startsWith("logLevel: ")).toBe(true);
  });

  it("raises a coded error", () => {
    expect(() => parseBuildOptions({ themeName: "" })).toThrow(BuildOptionsError);
    try {
      parseBuildOptions({ themeName: "" });
    } catch (err) {
      expect(err).toMatchObject({ code: "TD_OPTIONS" });
    }
  });
});
