import { describe, expect, it } from "vitest";
import { ScriptEngine } from "../../themescript/engine.js";
import { toByteString } from "../../themescript/values.js";
import { formatString } from "../builtins_string.js";

describe("string library", () => {
  const e = new ScriptEngine({ themeName: "t" });

  it("slices by byte position", () => {
    expect(e.evaluate("('hello'):sub(2, 4)")).toBe("ell");
    expect(e.evaluate("('hello'):sub(-3)")).toBe("llo");
    expect(e.evaluate("string.sub('hello', 0)")).toBe("hello");
    expect(e.evaluate("('abc'):sub(5)")).toBe("");
  });

  it("changes ASCII case only", () => {
    expect(e.evaluate("('aBc'):upper()")).toBe("ABC");
    expect(e.evaluate("string.lower('ÀB')")).toBe(toByteString("Àb"));
  });

  it("repeats, reverses and measures", () => {
    expect(e.evaluate("string.rep('ab', 3, ',')")).toBe("ab,ab,ab");
    expect(e.evaluate("string.rep('x', 0)")).toBe("");
    expect(e.evaluate("('abc'):reverse()")).toBe("cba");
    expect(e.evaluate("string.len('é')")).toBe(2n);
  });

  it("converts between bytes and characters", () => {
    expect(e.evaluate("string.byte('A')")).toBe(65n);
    expect(e.evaluate("('abc'):byte(-1)")).toBe(99n);
    expect(e.evaluate("select('#', string.byte('abc', 1, -1))")).toBe(3n);
    expect(e.execute("local a, b = string.byte('abc', 2, 3) return a + b")).toBe(197n);
    expect(e.evaluate("#string.char(0xC3, 0xA9)")).toBe(2n);
    expect(e.evaluate("string.char(72, 105)")).toBe("Hi");
    expect(() => e.evaluate("string.char(256)")).toThrow(
      "bad argument #1 to 'char' (value 256 is out of range 0-255)"
    );
  });

  it("formats through string.format", () => {
    expect(e.evaluate("string.format('%d-%s', 3, 'x')")).toBe("3-x");
    expect(e.evaluate("('%02x'):format(10)")).toBe("0a");
    expect(e.evaluate("string.format('%c%c', 72, 105)")).toBe("Hi");
    expect(e.evaluate("string.format('%d', math.maxinteger)")).toBe("9223372036854775807");
  });
});

describe("string patterns", () => {
  const e = new ScriptEngine({ themeName: "t" });

  it("finds plain text and pattern matches", () => {
    expect(e.execute("local s, e = string.find('hello world', 'o w') return s .. ',' .. e")).toBe("5,7");
    expect(e.execute("local s, e = string.find('hello', 'l+') return s .. ',' .. e")).toBe("3,4");
    expect(e.evaluate("string.find('a.b', '.', 1, true)")).toBe(1n);
    expect(e.evaluate("string.find('abcabc', 'b', -3)")).toBe(5n);
    expect(e.evaluate("string.find('abc', 'a', 10)")).toBeNull();
    expect(e.evaluate("string.find('abc', '%d')")).toBeNull();
  });

  it("returns captures after the positions from find", () => {
    expect(e.execute("local s, e, k, v = string.find('key=val', '(%w+)=(%w+)') return s .. e .. k .. v")).toBe("17keyval");
  });

  it("matches captures, the whole match and positions", () => {
    expect(e.execute("local y, m = string.match('2024-03-09', '(%d+)-(%d+)') return y .. '/' .. m")).toBe("2024/03");
    expect(e.evaluate("string.match('  trim  ', '^%s*(.-)%s*$')")).toBe("trim");
    expect(e.evaluate("('abc123'):match('%a+')")).toBe("abc");
    expect(e.execute("local a, b = ('hello'):match('()ll()') return a * 10 + b")).toBe(35n);
  });

  it("matches balanced pairs and frontiers", () => {
    expect(e.evaluate("string.match('f(a(b)c) d', '%b()')")).toBe("(a(b)c)");
    expect(e.execute("local s, n = string.gsub('THE (quick) fox', '%f[%a]%a+', 'W') return s .. n")).toBe("W (W) W3");
  });

  it("matches back-references", () => {
    expect(e.execute("local s, n = string.gsub('aabbcd', '(%a)%1', '<%1>') return s .. n")).toBe("<a><b>cd2");
  });

  it("iterates matches with gmatch", () => {
    const pairsSrc = [
      "local out = {}",
      "for k, v in string.gmatch('a=1, b=2', '(%w+)=(%w+)') do out[#out + 1] = k .. v end",
      "return table.concat(out, ' ')",
    ].join("\n");
    expect(e.execute(pairsSrc)).toBe("a1 b2");
    expect(e.execute("local n = 0 for w in ('one two three'):gmatch('%a+') do n = n + 1 end return n")).toBe(3n);
    expect(e.execute("local out = '' for w in ('abc'):gmatch('%a*') do out = out .. '[' .. w .. ']' end return out")).toBe(
      "[abc]"
    );
  });

  it("substitutes with strings, tables and functions", () => {
    expect(e.execute("local s, n = string.gsub('hello world', '%w+', '<%0>') return s .. n")).toBe("<hello> <world>2");
    expect(e.evaluate("string.gsub('$name is $age', '%$(%w+)', {name = 'Ann', age = 3})")).toBe("Ann is 3");
    expect(e.evaluate("string.gsub('a b', '%a', function(c) return c:upper() end)")).toBe("A B");
    expect(
      e.execute("local s, n = string.gsub('abc', '%a', function(c) if c == 'b' then return 'X' end end) return s .. n")
    ).toBe("aXc3");
  });

  it("limits and anchors substitutions", () => {
    expect(e.execute("local s, n = string.gsub('aaa', 'a', 'b', 2) return s .. n")).toBe("bba2");
    expect(e.execute("local s, n = string.gsub('aaa', '^a', 'b') return s .. n")).toBe("baa1");
    expect(e.execute("local s, n = string.gsub('abc', '', '-') return s .. n")).toBe("-a-b-c-4");
  });

  it("rejects malformed patterns", () => {
    expect(() => e.evaluate("string.find('a', '%')")).toThrow("malformed pattern (ends with '%')");
    expect(() => e.evaluate("string.match('a', '[a')")).toThrow("malformed pattern (missing ']')");
    expect(() => e.evaluate("string.match('a', '(a')")).toThrow("unfinished capture");
    expect(() => e.evaluate("string.match('a', 'a)')")).toThrow("invalid pattern capture");
    expect(() => e.evaluate("string.find('a', '%f')")).toThrow("missing '[' after '%f' in pattern");
    expect(() => e.evaluate("string.find('a', '%b(')")).toThrow("malformed pattern (missing arguments to '%b')");
  });

  it("rejects bad replacements", () => {
    expect(() => e.evaluate("string.gsub('abc', '%w', '%2')")).toThrow("invalid capture index %2");
    expect(() => e.evaluate("string.gsub('abc', '%w', '%x')")).toThrow("invalid use of '%' in replacement string");
    expect(() => e.evaluate("string.gsub('abc', '%w')")).toThrow(
      "bad argument #3 to 'gsub' (string/function/table expected, got no value)"
    );
    expect(() => e.evaluate("string.gsub('abc', '%w', function() return {} end)")).toThrow(
      "invalid replacement value (a table)"
    );
  });
});

describe("formatString", () => {
  it("pads and aligns numbers", () => {
    expect(formatString("%5.2f|%-4d|%03d", [3.14159, 7, 5])).toBe(" 3.14|7   |005");
    expect(formatString("%+d % d", [4, 4])).toBe("+4  4");
  });

  it("writes hex in 64-bit two's complement", () => {
    expect(formatString("%x %X %#X", [255, 255, 255])).toBe("ff FF 0XFF");
    expect(formatString("%x", [-1])).toBe("ffffffffffffffff");
  });

  it("chooses between fixed and exponent notation for %g", () => {
    expect(formatString("%g", [0.0001])).toBe("0.0001");
    expect(formatString("%g", [1e20])).toBe("1e+20");
    expect(formatString("%g", [100])).toBe("100");
    expect(formatString("%.3g", [2.71828])).toBe("2.72");
  });

  it("pads and truncates strings", () => {
    expect(formatString("%5s|%.2s", ["ab", "xyz"])).toBe("   ab|xy");
    expect(formatString("%s %s", [null, true])).toBe("nil true");
    expect(formatString("100%%", [])).toBe("100%");
  });

  it("writes exponent notation for %e", () => {
    expect(formatString("%e", [12345.678])).toBe("1.234568e+04");
    expect(formatString("%.2E", [0.000123])).toBe("1.23E-04");
  });

  it("rejects bad conversions and arguments", () => {
    expect(() => formatString("%q", ["x"])).toThrow("invalid conversion '%q' to 'format'");
    expect(() => formatString("%d", [1.5])).toThrow("number has no integer representation");
    expect(() => formatString("%d", [])).toThrow("number expected, got no value");
  });
});
