/**
 * Purpose: Provide ThemeScript's base functions (conversion, type inspection, errors, printing, iteration).
 * Intent: Cover what scripts routinely need without exposing any loader or host access.
 */

import type { Logger } from "../logger.js";
import { rawEquals } from "../themescript/eval_ops.js";
import { errorValue, ScriptError } from "../themescript/eval_runtime.js";
import { isScriptNumber, parseNumeral, wrapInteger } from "../themescript/numbers.js";
import {
  fromByteString,
  type ScriptValue,
  ScriptFunction,
  ScriptTable,
  tostring,
  typeName,
} from "../themescript/values.js";
import {
  argAt,
  argFunction,
  argInteger,
  argTable,
  badArgument,
  type LibraryEntry,
  multiReturn,
  optInteger,
} from "./builtins_shared.js";

function tonumber(args: ScriptValue[]): ScriptValue {
  const v = argAt(args, 0);
  if (argAt(args, 1) === null) {
    if (isScriptNumber(v)) return v;
    return typeof v === "string" ? parseNumeral(v) : null;
  }

  const base = argInteger(args, 1, "tonumber");
  if (base < 2 || base > 36) throw badArgument(1, "tonumber", "base out of range");
  if (typeof v !== "string") throw badArgument(0, "tonumber", `string expected, got ${typeName(v)}`);
  const digits = v.trim().toLowerCase();
  const negative = digits.startsWith("-");
  const body = negative ? digits.slice(1) : digits;
  if (!body) return null;
  let n = 0n;
  for (const ch of body) {
    const d = parseInt(ch, 36);
    if (Number.isNaN(d) || d >= base) return null;
    n = wrapInteger(n * BigInt(base) + BigInt(d));
  }
  return negative ? wrapInteger(-n) : n;
}

function next(args: ScriptValue[]): ScriptValue[] {
  const entry = argTable(args, 0, "next").next(argAt(args, 1));
  return entry ?? [null];
}

/** Walks a snapshot of the keys, so fields may be cleared during the loop. */
function pairs(args: ScriptValue[]): ScriptValue[] {
  const table = argTable(args, 0, "pairs");
  const keys = table.keys();
  let i = 0;
  const step = new ScriptFunction("pairs_step", () => {
    while (i < keys.length) {
      const key = keys[i++] ?? null;
      const value = table.get(key);
      if (value !== null) return [key, value];
    }
    return [null];
  });
  return [step, table, null];
}

function ipairsStep(args: ScriptValue[]): ScriptValue[] {
  const table = argTable(args, 0, "ipairs");
  const index = BigInt(argInteger(args, 1, "ipairs")) + 1n;
  const value = table.get(index);
  return value === null ? [null] : [index, value];
}

const ipairsStepFunction = new ScriptFunction("ipairs_step", ipairsStep);

function select(args: ScriptValue[]): ScriptValue[] {
  const n = argAt(args, 0);
  const count = args.length - 1;
  if (n === "#") return [BigInt(count)];
  const i = argInteger(args, 0, "select");
  if (i < 0) {
    if (-i > count) throw badArgument(0, "select", "index out of range");
    return args.slice(count + i + 1);
  }
  if (i === 0) throw badArgument(0, "select", "index out of range");
  return args.slice(i);
}

function protectedCall(fn: ScriptFunction, args: ScriptValue[], handler: ScriptFunction | null): ScriptValue[] {
  try {
    return [true, ...fn.call(args)];
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    const value = errorValue(err);
    return [false, ...(handler ? handler.call([value]) : [value])];
  }
}

export function baseBuiltins(log: Logger): Record<string, LibraryEntry> {
  return {
    tostring: (args) => tostring(argAt(args, 0)),
    tonumber,
    type: (args) => {
      if (args.length === 0) throw badArgument(0, "type", "value expected");
      return typeName(argAt(args, 0));
    },
    error: (args) => {
      throw new ScriptError(argAt(args, 0), optInteger(args, 1, "error", 1));
    },
    assert: multiReturn((args) => {
      const v = argAt(args, 0);
      if (v === null || v === false) {
        if (args.length < 2) throw new ScriptError("assertion failed!", 1);
        throw new ScriptError(argAt(args, 1), 0);
      }
      return args;
    }),
    print: (args) => {
      log.info(args.map((a) => fromByteString(tostring(a))).join("\t"));
      return null;
    },
    select: multiReturn(select),
    pcall: multiReturn((args) => protectedCall(argFunction(args, 0, "pcall"), args.slice(1), null)),
    xpcall: multiReturn((args) =>
      protectedCall(argFunction(args, 0, "xpcall"), args.slice(2), argFunction(args, 1, "xpcall"))
    ),
    next: multiReturn(next),
    pairs: multiReturn(pairs),
    ipairs: multiReturn((args) => [ipairsStepFunction, argTable(args, 0, "ipairs"), 0n]),
    rawequal: (args) => rawEquals(argAt(args, 0), argAt(args, 1)),
    rawlen: (args) => {
      const v = argAt(args, 0);
      if (v instanceof ScriptTable) return BigInt(v.length());
      if (typeof v === "string") return BigInt(v.length);
      throw badArgument(0, "rawlen", "table or string expected");
    },
    rawget: (args) => argTable(args, 0, "rawget").get(argAt(args, 1)),
    rawset: (args) => {
      const t = argTable(args, 0, "rawset");
      t.set(argAt(args, 1), argAt(args, 2));
      return t;
    },
  };
}
