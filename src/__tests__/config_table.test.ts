import { describe, expect, it } from "vitest";
import { ConfigTable, GENERAL_SECTION, readConfigTable, writeConfigTable } from "../config_table.js";
import { ConfigSyntaxError } from "../errors.js";

function configError(text: string): ConfigSyntaxError {
  try {
    readConfigTable(text, "theme.ini");
  } catch (err) {
    if (err instanceof ConfigSyntaxError) return err;
    throw err;
  }
  throw new Error("expected a config syntax error");
}

describe("readConfigTable", () => {
  it("reads sections, keys and comments", () => {
    const table = readConfigTable(
      ["top = 1", "; comment", "# also a comment", "", "[color theme]", "  bg = #{rgb(1, 2, 3)}  ", "fg=a=b"].join("\r\n")
    );
    expect([...table.entries()]).toEqual([
      [GENERAL_SECTION, "top", "1"],
      ["color theme", "bg", "#{rgb(1, 2, 3)}"],
      ["color theme", "fg", "a=b"],
    ]);
  });

  it("does not create sections that hold no keys", () => {
    expect(readConfigTable("[empty]\n[full]\nk=v").sectionNames()).toEqual(["full"]);
  });

  it("reports malformed lines with their line number", () => {
    const header = configError("a=1\n[broken");
    expect(header.code).toBe("TD_CONFIG_SYNTAX");
    expect(header.line).toBe(2);
    expect(header.message).toBe("theme.ini: unterminated section header (line 2)");

    expect(configError("just text").line).toBe(1);
    expect(configError("\n\n = value").message).toBe("theme.ini: empty key (line 3)");
  });
});

describe("ConfigTable", () => {
  it("overwrites keys in place and merges tables", () => {
    const a = new ConfigTable();
    a.set("s", "x", "1");
    a.set("s", "y", "2");
    const b = new ConfigTable();
    b.set("s", "x", "3");
    b.set("t", "z", "4");
    a.merge(b);

    expect([...a.entries()]).toEqual([
      ["s", "x", "3"],
      ["s", "y", "2"],
      ["t", "z", "4"],
    ]);
    expect(a.get("t", "z")).toBe("4");
    expect(a.has("t", "missing")).toBe(false);
    expect(a.toObject()).toEqual({ s: { x: "3", y: "2" }, t: { z: "4" } });
  });
});

describe("writeConfigTable", () => {
  it("writes the general section first", () => {
    const table = new ConfigTable();
    table.set("colors", "bg", "1");
    table.set(GENERAL_SECTION, "version", "2");
    table.set("colors", "fg", "3");
    expect(writeConfigTable(table)).toBe("version=2\n\n[colors]\nbg=1\nfg=3\n");
  });

  it("writes nothing for an empty table", () => {
    expect(writeConfigTable(new ConfigTable())).toBe("");
  });

  it("round-trips through readConfigTable", () => {
    const text = "a=1\n\n[x]\nb=#{2}\n";
    expect(writeConfigTable(readConfigTable(text))).toBe(text);
  });
});
