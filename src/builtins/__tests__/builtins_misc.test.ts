import pino from "pino";
import { describe, expect, it } from "vitest";
import { ScriptEngine } from "../../themescript/engine.js";
import type { ResourceRequest } from "../../types.js";

describe("base functions", () => {
  const e = new ScriptEngine({ themeName: "t" });

  it("converts with tostring and tonumber", () => {
    expect(e.evaluate("tostring(1/0)")).toBe("inf");
    expect(e.evaluate("tostring(10/2)")).toBe("5.0");
    expect(e.evaluate("tostring(10//2)")).toBe("5");
    expect(e.evaluate("tostring(0.1 + 0.2)")).toBe("0.3");
    expect(e.evaluate("tostring(nil)")).toBe("nil");
    expect(e.evaluate("tonumber('0x10')")).toBe(16n);
    expect(e.evaluate("tonumber(' 2.5 ')")).toBe(2.5);
    expect(e.evaluate("tonumber('ff', 16)")).toBe(255n);
    expect(e.evaluate("tonumber('z', 36)")).toBe(35n);
    expect(e.evaluate("tonumber('12', 2)")).toBeNull();
    expect(e.evaluate("tonumber('abc')")).toBeNull();
  });

  it("names value types", () => {
    expect(e.evaluate("type(nil)")).toBe("nil");
    expect(e.evaluate("type(print)")).toBe("function");
    expect(e.evaluate("type(pairs({}))")).toBe("function");
    expect(e.evaluate("type({})")).toBe("table");
    expect(() => e.evaluate("type()")).toThrow("bad argument #1 to 'type' (value expected)");
  });

  it("walks tables with next", () => {
    expect(e.execute("local k, v = next({7}) return k + v")).toBe(8n);
    expect(e.evaluate("next({})")).toBeNull();
    expect(() => e.evaluate("next({}, 'nope')")).toThrow("invalid key to 'next'");
  });

  it("selects from its arguments", () => {
    expect(e.evaluate("select(2, 'a', 'b', 'c')")).toBe("b");
    expect(e.evaluate("select('#', 'a', nil)")).toBe(2n);
    expect(() => e.evaluate("select(0, 'a')")).toThrow("bad argument #1 to 'select' (index out of range)");
    expect(() => e.evaluate("select(-2, 'a')")).toThrow("bad argument #1 to 'select' (index out of range)");
  });

  it("returns every argument from a passing assert", () => {
    expect(e.execute("local a, b = assert(1, 'two') return b")).toBe("two");
  });

  it("exposes the raw table functions", () => {
    expect(e.evaluate("rawequal(1, 1.0)")).toBe(true);
    expect(e.evaluate("rawequal({}, {})")).toBe(false);
    expect(e.evaluate("rawlen({1, 2})")).toBe(2n);
    expect(e.evaluate("rawlen('abc')")).toBe(3n);
    expect(e.execute("local t = rawset({}, 'k', 4) return rawget(t, 'k')")).toBe(4n);
    expect(() => e.evaluate("rawlen(1)")).toThrow("bad argument #1 to 'rawlen' (table or string expected)");
  });

  it("prints through the logger", () => {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (msg: string) => lines.push(msg) });
    const engine = new ScriptEngine({ themeName: "t", logger });
    engine.execute("print('a', 1, nil)");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ level: 30, msg: "a\t1\tnil" });
  });
});

describe("math library", () => {
  const e = new ScriptEngine({ themeName: "t" });

  it("computes", () => {
    expect(e.evaluate("math.max(3, 9, 2)")).toBe(9n);
    expect(e.evaluate("math.min(3, '1')")).toBe(1n);
    expect(e.evaluate("math.floor(-2.5)")).toBe(-3n);
    expect(e.evaluate("math.ceil(2.1)")).toBe(3n);
    expect(e.evaluate("math.fmod(-7, 3)")).toBe(-1n);
    expect(e.evaluate("math.fmod(-7.5, 2)")).toBe(-1.5);
    expect(e.evaluate("math.sqrt(16)")).toBe(4);
    expect(e.evaluate("math.abs(-3)")).toBe(3n);
    expect(e.evaluate("math.tointeger(3.0)")).toBe(3n);
    expect(e.evaluate("math.tointeger(3.5)")).toBeNull();
    expect(e.evaluate("math.huge")).toBe(Infinity);
  });

  it("splits a float with modf", () => {
    expect(e.execute("local i, f = math.modf(3.75) return i")).toBe(3);
    expect(e.execute("local i, f = math.modf(-3.75) return f")).toBe(-0.75);
  });

  it("names number subtypes", () => {
    expect(e.evaluate("math.type(2)")).toBe("integer");
    expect(e.evaluate("math.type(2.5)")).toBe("float");
    expect(e.evaluate("math.type({})")).toBeNull();
    expect(() => e.evaluate("math.type()")).toThrow("bad argument #1 to 'type' (value expected)");
  });

  it("compares unsigned with ult", () => {
    expect(e.evaluate("math.ult(1, -1)")).toBe(true);
    expect(e.evaluate("math.ult(-1, 1)")).toBe(false);
  });

  it("keeps the subtype of the chosen argument", () => {
    expect(e.evaluate("math.max(1, 2.0)")).toBe(2);
    expect(e.evaluate("math.type(math.max(1, 2.0))")).toBe("float");
    expect(e.evaluate("math.floor(2 ^ 70)")).toBe(2 ** 70);
  });

  it("rejects integer modulo by zero", () => {
    expect(() => e.evaluate("math.fmod(1, 0)")).toThrow("bad argument #2 to 'fmod' (zero)");
  });
});

describe("table library", () => {
  const e = new ScriptEngine({ themeName: "t" });

  it("inserts, removes and concatenates", () => {
    const src = [
      'local t = {"a", "c"}',
      'table.insert(t, 2, "b")',
      'table.insert(t, "d")',
      "local removed = table.remove(t, 1)",
      'return removed .. ":" .. table.concat(t, ",") .. ":" .. #t',
    ].join("\n");
    expect(e.execute(src)).toBe("a:b,c,d:3");
  });

  it("handles empty tables and bounds", () => {
    expect(e.evaluate("table.remove({})")).toBeNull();
    expect(e.evaluate("table.concat({1, 'x', 2.5}, '-')")).toBe("1-x-2.5");
    expect(e.evaluate("table.concat({1, 2, 3}, '', 2, 3)")).toBe("23");
    expect(() => e.evaluate("table.concat({1, {}})")).toThrow(
      "invalid value (at index 2) in table for 'concat' (got table)"
    );
    expect(() => e.execute("table.insert({1}, 5, 'x')")).toThrow(
      "bad argument #2 to 'insert' (position out of bounds)"
    );
  });

  it("unpacks sequences into multiple values", () => {
    expect(e.execute("local a, b, c = table.unpack({1, 2, 3}) return a + b + c")).toBe(6n);
    expect(e.evaluate("select('#', table.unpack({1, 2, 3}, 2))")).toBe(2n);
    expect(e.evaluate("select('#', table.unpack({}, 1, 3))")).toBe(3n);
    expect(e.evaluate("table.unpack({}, 2, 1)")).toBeNull();
  });

  it("sorts in place", () => {
    expect(e.execute("local t = {3, 1, 2} table.sort(t) return table.concat(t, ',')")).toBe("1,2,3");
    expect(e.execute("local t = {'b', 'c', 'a'} table.sort(t, function(x, y) return x > y end) return table.concat(t)")).toBe(
      "cba"
    );
    expect(() => e.execute("table.sort({1, 'x'})")).toThrow("attempt to compare");
  });
});

describe("os library", () => {
  const now = new Date(Date.UTC(2024, 2, 9, 14, 5, 7));
  const e = new ScriptEngine({ themeName: "t", now });

  it("formats the injected clock in UTC", () => {
    expect(e.evaluate("os.date('!%Y-%m-%d %H:%M:%S')")).toBe("2024-03-09 14:05:07");
    expect(e.evaluate("os.date('!%A %a %B %b %j %p')")).toBe("Saturday Sat March Mar 069 PM");
    expect(e.evaluate("os.date('!%c')")).toBe("Sat Mar  9 14:05:07 2024");
    expect(e.evaluate("os.date('!%x %X %%')")).toBe("03/09/24 14:05:07 %");
  });

  it("formats explicit timestamps", () => {
    expect(e.evaluate("os.date('!%Y-%m-%d', 0)")).toBe("1970-01-01");
  });

  it("returns date tables", () => {
    expect(e.execute("local t = os.date('!*t') return t.year .. '/' .. t.yday .. '/' .. t.wday .. '/' .. tostring(t.isdst)")).toBe(
      "2024/69/7/false"
    );
  });

  it("reads and builds timestamps", () => {
    expect(e.evaluate("os.time()")).toBe(BigInt(now.getTime() / 1000));
    expect(e.evaluate("os.time({year = 2024, month = 3, day = 9, hour = 0})")).toBe(
      BigInt(new Date(2024, 2, 9, 0, 0, 0).getTime() / 1000)
    );
    expect(e.evaluate("os.difftime(10, 4)")).toBe(6);
    expect(() => e.evaluate("os.time({year = 2024})")).toThrow("field 'month' missing in date table");
  });

  it("measures elapsed time with clock", () => {
    const clock = e.evaluate("os.clock()");
    expect(typeof clock).toBe("number");
    expect(clock).toBeGreaterThanOrEqual(0);
  });

  it("rejects unknown conversions", () => {
    expect(() => e.evaluate("os.date('!%Q')")).toThrow("invalid conversion specifier '%Q'");
  });
});

describe("theme functions", () => {
  it("encodes blend settings", () => {
    const e = new ScriptEngine({ themeName: "t" });
    expect(e.evaluate("blend('multiply', 1)")).toBe(196611n);
    expect(e.evaluate("blend('normal', 0.5)")).toBe(163840n);
    expect(e.evaluate("blend('hsv', 0.25)")).toBe(147710n);
  });

  it("reads the injected environment", () => {
    const e = new ScriptEngine({ themeName: "t", env: (name) => (name === "ACCENT" ? "teal" : undefined) });
    expect(e.evaluate("env('ACCENT')")).toBe("teal");
    expect(() => e.evaluate("env('MISSING')")).toThrow("environment variable `MISSING` is not set");
  });

  it("stages resources with the sink", () => {
    const staged: ResourceRequest[] = [];
    const e = new ScriptEngine({ themeName: "t", resources: { push: (r) => staged.push(r) } });
    e.execute("resource('*.png')\nresource('./icons/', 'art/*.svg')");
    expect(staged).toEqual([
      { pattern: "*.png", dest: "." },
      { pattern: "art/*.svg", dest: "icons" },
    ]);
  });

  it("validates resource arguments", () => {
    const e = new ScriptEngine({ themeName: "t", resources: { push: () => undefined } });
    expect(() => e.execute("resource()")).toThrow("resource(...) can only be called with 1 or 2 arguments");
    expect(() => e.execute("resource('/abs', 'x')")).toThrow(
      "invalid resource destination: path `/abs` must be relative"
    );
    expect(() => e.execute("resource('[x')")).toThrow("invalid glob pattern `[x`");
  });

  it("refuses resources outside a build", () => {
    const e = new ScriptEngine({ themeName: "t" });
    expect(() => e.execute("resource('*.png')")).toThrow("resource(...) is only available while building a theme");
  });
});
