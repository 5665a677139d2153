import { describe, expect, it } from "vitest";
import { parseDescriptor, renderContent } from "../descriptor_parse.js";
import { DescriptorSyntaxError } from "../errors.js";

function syntaxError(text: string): DescriptorSyntaxError {
  try {
    parseDescriptor(text);
  } catch (err) {
    if (err instanceof DescriptorSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected \`${text}\` to fail`);
}

describe("parseDescriptor", () => {
  it("splits code, comments, newlines and expressions", () => {
    expect(parseDescriptor("a\n;c\n#{1+2}x")).toEqual([
      { kind: "code", text: "a" },
      { kind: "newline" },
      { kind: "comment", text: ";c" },
      { kind: "newline" },
      { kind: "expression", text: "1+2", span: { offset: 7, line: 3, column: 3, fragment: "1+2" } },
      { kind: "code", text: "x" },
    ]);
  });

  it("counts expression offsets in bytes and columns in code points", () => {
    const items = parseDescriptor("é#{x}");
    expect(items[1]).toEqual({ kind: "expression", text: "x", span: { offset: 4, line: 1, column: 4, fragment: "x" } });
  });

  it("ends a comment at the line break, even across `#{`", () => {
    expect(parseDescriptor("x ; note #{1}\ny")).toEqual([
      { kind: "code", text: "x " },
      { kind: "comment", text: "; note #{1}" },
      { kind: "newline" },
      { kind: "code", text: "y" },
    ]);
  });

  it("nests braces and skips braces inside quoted strings", () => {
    expect(parseDescriptor('#{ {1} }')[0]).toMatchObject({ kind: "expression", text: " {1} " });
    expect(parseDescriptor('#{ f("}") }')[0]).toMatchObject({ kind: "expression", text: ' f("}") ' });
    expect(parseDescriptor("#{ f('{') }")[0]).toMatchObject({ kind: "expression", text: " f('{') " });
  });

  it("reads an include and normalizes its path", () => {
    const items = parseDescriptor('#include "./parts/../colors.reapertheme"  ; shared\nrest');
    expect(items).toEqual([
      {
        kind: "directive",
        directive: { kind: "include", path: "colors.reapertheme" },
        span: { offset: 0, line: 1, column: 1, fragment: '#include "./parts/../colors.reapertheme"  ; shared' },
      },
      { kind: "newline" },
      { kind: "code", text: "rest" },
    ]);
  });

  it("accepts indented directives and keeps the indent in the span", () => {
    const [item] = parseDescriptor('  \t#include "a.rtd"');
    expect(item).toEqual({
      kind: "directive",
      directive: { kind: "include", path: "a.rtd" },
      span: { offset: 0, line: 1, column: 1, fragment: '  \t#include "a.rtd"' },
    });
  });

  it("treats a directive keyword after other text as code", () => {
    expect(parseDescriptor('x #include "a"')).toEqual([{ kind: "code", text: 'x #include "a"' }]);
  });

  it("defaults the resource destination to the root", () => {
    const [item] = parseDescriptor('#resource "images/*.png"');
    expect(item).toMatchObject({ kind: "directive", directive: { kind: "resource", pattern: "images/*.png", dest: "." } });
  });

  it("normalizes an explicit resource destination", () => {
    const [item] = parseDescriptor('#resource "./icons/" : "art/**/*.png"');
    expect(item).toMatchObject({ directive: { kind: "resource", pattern: "art/**/*.png", dest: "icons" } });
  });

  it("keeps unknown directives with their raw remainder", () => {
    const [item] = parseDescriptor("#version 7 ; keep\n");
    expect(item).toMatchObject({ directive: { kind: "unknown", name: "version", rest: " 7 ; keep" } });
  });

  it("swallows a carriage return before the newline of a directive", () => {
    const items = parseDescriptor('#include "a"\r\nb');
    expect(items.map((i) => i.kind)).toEqual(["directive", "newline", "code"]);
  });
});

describe("parseDescriptor errors", () => {
  it("rejects an include without a quoted path", () => {
    const err = syntaxError("line\n#include colors");
    expect(err.code).toBe("TD_SYNTAX_INCLUDE");
    expect(err.line).toBe(2);
    expect(err.column).toBe(1);
    expect(err.fragment).toBe("#include colors");
  });

  it("rejects text after the include path", () => {
    expect(syntaxError('#include "a" "b"').code).toBe("TD_SYNTAX_INCLUDE");
  });

  it("rejects absolute and drive-letter paths", () => {
    expect(syntaxError('#include "/etc/theme"').code).toBe("TD_SYNTAX_NON_RELATIVE_PATH");
    expect(syntaxError('#include "C:/theme"').code).toBe("TD_SYNTAX_NON_RELATIVE_PATH");
    expect(syntaxError('#resource "/abs":"x.png"').code).toBe("TD_SYNTAX_NON_RELATIVE_PATH");
  });

  it("rejects unterminated strings and bad escapes", () => {
    expect(syntaxError('#include "a').code).toBe("TD_SYNTAX_UNTERMINATED_STRING");
    expect(syntaxError('#include "\\q"').code).toBe("TD_SYNTAX_INVALID_ESCAPE");
  });

  it("rejects a malformed resource directive", () => {
    expect(syntaxError("#resource images").code).toBe("TD_SYNTAX_RESOURCE");
    expect(syntaxError('#resource "150" "./*.png"').code).toBe("TD_SYNTAX_RESOURCE");
    expect(syntaxError('#resource "C:/abs" "x.png"').code).toBe("TD_SYNTAX_NON_RELATIVE_PATH");
    expect(syntaxError('#resource "a":').code).toBe("TD_SYNTAX_RESOURCE");
  });

  it("rejects invalid glob patterns", () => {
    expect(syntaxError('#resource "[abc"').code).toBe("TD_SYNTAX_INVALID_GLOB");
    expect(syntaxError('#resource "a/**b"').code).toBe("TD_SYNTAX_INVALID_GLOB");
  });

  it("reports an unterminated expression at its opening", () => {
    const err = syntaxError("ab #{1 +\n2");
    expect(err.code).toBe("TD_SYNTAX_UNTERMINATED_EXPRESSION");
    expect(err.line).toBe(1);
    expect(err.column).toBe(4);
    expect(err.fragment).toBe("#{1 +");
  });

  it("prefixes the message with the file when one is attached", () => {
    const err = syntaxError("#include x").withFile("main.rtd");
    expect(err.file).toBe("main.rtd");
    expect(err.message.startsWith("main.rtd: ")).toBe(true);
  });
});

describe("renderContent", () => {
  it("reproduces the source text", () => {
    const text = 'top ; c\n  #include "a.rtd" ; x\n#resource "d":"*.png"\nv=#{rgb(1, 2, 3)}\n#other thing\n';
    expect(renderContent(parseDescriptor(text))).toBe(text);
  });
});
