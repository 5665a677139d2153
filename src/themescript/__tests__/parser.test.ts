import { describe, expect, it } from "vitest";
import { parseChunk, tryParseExpression } from "../parser.js";
import { lineColFromOffset, ThemeScriptSyntaxError, type Token, Tokenizer } from "../tokenizer.js";

function syntaxMessage(src: string): string {
  try {
    parseChunk(src);
  } catch (err) {
    if (err instanceof ThemeScriptSyntaxError) return err.message;
    throw err;
  }
  throw new Error(`expected \`${src}\` to fail`);
}

describe("Tokenizer", () => {
  it("reads numbers, names, keywords and punctuators", () => {
    const t = new Tokenizer("local x = 0x1F .. 2.5e1");
    const tokens: Token[] = [];
    for (let tok = t.next(); tok.type !== "eof"; tok = t.next()) tokens.push(tok);
    expect(tokens).toEqual([
      { type: "keyword", value: "local", pos: 0 },
      { type: "name", value: "x", pos: 6 },
      { type: "punct", value: "=", pos: 8 },
      { type: "number", value: 31n, pos: 10 },
      { type: "punct", value: "..", pos: 15 },
      { type: "number", value: 25, pos: 18 },
    ]);
  });

  it("decodes escapes and long strings", () => {
    expect(tryParseExpression("'\\x41\\u{48}\\65\\t'")).toEqual({ kind: "string", value: "AHA\t" });
    expect(tryParseExpression("[[\nfirst\nsecond]]")).toEqual({ kind: "string", value: "first\nsecond" });
    expect(tryParseExpression("[==[a]]b]==]")).toEqual({ kind: "string", value: "a]]b" });
  });

  it("skips line and block comments", () => {
    expect(parseChunk("-- note\n--[[ block\n comment ]] return 1")).toEqual([
      { kind: "return", values: [{ kind: "number", value: 1n }], pos: 31 },
    ]);
  });

  it("rejects malformed numbers and strings", () => {
    expect(() => new Tokenizer("3x")).toThrow("malformed number near '3x'");
    expect(() => new Tokenizer("'open")).toThrow("unfinished string");
    expect(() => new Tokenizer("'\\q'")).toThrow("invalid escape sequence '\\q'");
    expect(() => new Tokenizer("[[never closed")).toThrow("unfinished long string");
  });

  it("maps offsets to lines and columns", () => {
    expect(lineColFromOffset("ab\ncd", 4)).toEqual({ line: 2, column: 2 });
    expect(lineColFromOffset("ab", 99)).toEqual({ line: 1, column: 3 });
  });
});

describe("tryParseExpression", () => {
  it("applies arithmetic precedence", () => {
    expect(tryParseExpression("1 + 2 * 3")).toMatchObject({
      kind: "binary",
      op: "+",
      left: { kind: "number", value: 1n },
      right: { kind: "binary", op: "*" },
    });
  });

  it("associates concatenation and powers to the right", () => {
    expect(tryParseExpression("a .. b .. c")).toMatchObject({
      op: "..",
      left: { kind: "identifier", name: "a" },
      right: { op: "..", left: { name: "b" }, right: { name: "c" } },
    });
    expect(tryParseExpression("2 ^ 3 ^ 2")).toMatchObject({ op: "^", left: { value: 2n }, right: { op: "^" } });
  });

  it("binds unary minus looser than powers", () => {
    expect(tryParseExpression("-x ^ 2")).toMatchObject({ kind: "unary", op: "-", expr: { kind: "binary", op: "^" } });
  });

  it("parses method calls and call sugar", () => {
    expect(tryParseExpression("c:hex()")).toMatchObject({ kind: "method", name: "hex", args: [] });
    expect(tryParseExpression('f "x"')).toMatchObject({ kind: "call", args: [{ kind: "string", value: "x" }] });
    expect(tryParseExpression("f { 1 }")).toMatchObject({ kind: "call", args: [{ kind: "table" }] });
  });

  it("parses table constructors", () => {
    expect(tryParseExpression("{ 1, a = 2; [3] = 4 }")).toEqual({
      kind: "table",
      fields: [
        { kind: "positional", value: { kind: "number", value: 1n } },
        { kind: "named", key: "a", value: { kind: "number", value: 2n } },
        { kind: "keyed", key: { kind: "number", value: 3n }, value: { kind: "number", value: 4n } },
      ],
      pos: 0,
    });
  });

  it("keeps integer and float literals apart", () => {
    expect(tryParseExpression("10")).toEqual({ kind: "number", value: 10n });
    expect(tryParseExpression("10.0")).toEqual({ kind: "number", value: 10 });
    expect(tryParseExpression("0xff")).toEqual({ kind: "number", value: 255n });
    expect(tryParseExpression("9223372036854775808")).toEqual({ kind: "number", value: 2 ** 63 });
  });

  it("wraps parenthesized expressions", () => {
    expect(tryParseExpression("(f())")).toMatchObject({ kind: "paren", expr: { kind: "call" } });
  });

  it("returns null for statements and broken input", () => {
    expect(tryParseExpression("x = 1")).toBeNull();
    expect(tryParseExpression("return 1")).toBeNull();
    expect(tryParseExpression("1 +")).toBeNull();
    expect(tryParseExpression("1 2")).toBeNull();
  });
});

describe("parseChunk", () => {
  it("parses statement sequences", () => {
    const kinds = parseChunk("local a, b = 1, 2; a = b\nif a then elseif b then else end\nfor i = 1, 2 do end\nreturn a").map(
      (s) => s.kind
    );
    expect(kinds).toEqual(["local", "assign", "if", "numericFor", "return"]);
  });

  it("desugars method definitions into assignments with self", () => {
    const [stmt] = parseChunk("function theme.colors:dim(f) end");
    expect(stmt).toMatchObject({
      kind: "assign",
      targets: [{ kind: "index", key: { value: "dim" }, object: { kind: "index", key: { value: "colors" } } }],
      values: [{ kind: "function", fn: { name: "theme.colors:dim", params: ["self", "f"] } }],
    });
  });

  it("parses generic for over several names", () => {
    expect(parseChunk("for k, v in pairs(t) do end")[0]).toMatchObject({ kind: "genericFor", names: ["k", "v"] });
    expect(parseChunk("for k, v in next, t, nil do end")[0]).toMatchObject({
      kind: "genericFor",
      iterators: [{ kind: "identifier", name: "next" }, { kind: "identifier", name: "t" }, { kind: "nil" }],
    });
  });

  it("parses vararg functions and multiple return values", () => {
    expect(parseChunk("local function f(a, ...) return a, ... end")[0]).toMatchObject({
      kind: "localFunction",
      fn: { params: ["a"], isVararg: true, body: [{ kind: "return", values: [{ kind: "identifier" }, { kind: "vararg" }] }] },
    });
    expect(parseChunk("return ...")[0]).toMatchObject({ kind: "return", values: [{ kind: "vararg" }] });
  });

  it("reports syntax errors", () => {
    expect(syntaxMessage("return 1 x")).toBe("<eof> expected near 'x'");
    expect(syntaxMessage("f() = 1")).toBe("syntax error: cannot assign to this expression");
    expect(syntaxMessage("local function f() return ... end")).toBe(
      "cannot use '...' outside a vararg function near '...'"
    );
    expect(syntaxMessage("local function f(..., a) end")).toBe("')' expected to close parameter list near 'a'");
    expect(syntaxMessage("if x then")).toBe("'end' expected to close 'if' near <eof>");
    expect(syntaxMessage("t = { 1 2 }")).toBe("'}' expected to close table near number 2");
  });

  it("locates syntax errors in their chunk", () => {
    try {
      parseChunk("local x = 1\nlocal y = = 2");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ThemeScriptSyntaxError)) throw err;
      err.locate("local x = 1\nlocal y = = 2", "colors.lua");
      expect(err.line).toBe(2);
      expect(err.column).toBe(11);
      expect(err.message).toBe("colors.lua:2:11: unexpected symbol near '='");
    }
  });
});
