/**
 * Purpose: Provide the ThemeScript `math` library subset.
 */

import { compareNumbers, floatToInteger, MAX_INTEGER, MIN_INTEGER, type ScriptNumber, toFloat, wrapInteger } from "../themescript/numbers.js";
import type { ScriptTable, ScriptValue } from "../themescript/values.js";
import { argAt, argInt64, argNumber, argScriptNumber, badArgument, makeLibrary, multiReturn } from "./builtins_shared.js";

/** Integer result when the float is integral and in range, the float otherwise. */
function integralOrFloat(f: number): ScriptNumber {
  return floatToInteger(f) ?? f;
}

function rounding(fname: string, round: (f: number) => number): (args: ScriptValue[]) => ScriptNumber {
  return (args) => {
    const n = argScriptNumber(args, 0, fname);
    return typeof n === "bigint" ? n : integralOrFloat(round(n));
  };
}

function extreme(fname: string, better: (cmp: number) => boolean): (args: ScriptValue[]) => ScriptNumber {
  return (args) => {
    let best = argScriptNumber(args, 0, fname);
    for (let i = 1; i < args.length; i++) {
      const n = argScriptNumber(args, i, fname);
      if (better(compareNumbers(n, best))) best = n;
    }
    return best;
  };
}

function fmod(args: ScriptValue[]): ScriptNumber {
  const a = argScriptNumber(args, 0, "fmod");
  const b = argScriptNumber(args, 1, "fmod");
  if (typeof a === "bigint" && typeof b === "bigint") {
    if (b === 0n) throw badArgument(1, "fmod", "zero");
    // Truncating remainder, unlike `%`.
    return a % b;
  }
  return toFloat(a) % toFloat(b);
}

function modf(args: ScriptValue[]): ScriptValue[] {
  const f = argNumber(args, 0, "modf");
  const whole = f >= 0 ? Math.floor(f) : Math.ceil(f);
  const fraction = Number.isFinite(f) ? f - whole : 0;
  return [whole, fraction];
}

function log(args: ScriptValue[]): number {
  const x = argNumber(args, 0, "log");
  if (argAt(args, 1) === null) return Math.log(x);
  const base = argNumber(args, 1, "log");
  if (base === 2) return Math.log2(x);
  if (base === 10) return Math.log10(x);
  return Math.log(x) / Math.log(base);
}

function unary(fname: string, op: (x: number) => number): (args: ScriptValue[]) => number {
  return (args) => op(argNumber(args, 0, fname));
}

export function makeMathLibrary(): ScriptTable {
  return makeLibrary("math", {
    abs: (args) => {
      const n = argScriptNumber(args, 0, "abs");
      return typeof n === "bigint" ? wrapInteger(n < 0n ? -n : n) : Math.abs(n);
    },
    ceil: rounding("ceil", Math.ceil),
    floor: rounding("floor", Math.floor),
    max: extreme("max", (cmp) => cmp > 0),
    min: extreme("min", (cmp) => cmp < 0),
    fmod,
    modf: multiReturn(modf),
    sqrt: unary("sqrt", Math.sqrt),
    exp: unary("exp", Math.exp),
    log,
    sin: unary("sin", Math.sin),
    cos: unary("cos", Math.cos),
    tan: unary("tan", Math.tan),
    asin: unary("asin", Math.asin),
    acos: unary("acos", Math.acos),
    atan: (args) => Math.atan2(argNumber(args, 0, "atan"), argAt(args, 1) === null ? 1 : argNumber(args, 1, "atan")),
    tointeger: (args) => {
      const n = argAt(args, 0);
      if (typeof n === "bigint") return n;
      return typeof n === "number" ? floatToInteger(n) : null;
    },
    type: (args) => {
      if (args.length === 0) throw badArgument(0, "type", "value expected");
      const n = argAt(args, 0);
      if (typeof n === "bigint") return "integer";
      return typeof n === "number" ? "float" : null;
    },
    ult: (args) => BigInt.asUintN(64, argInt64(args, 0, "ult")) < BigInt.asUintN(64, argInt64(args, 1, "ult")),
    maxinteger: MAX_INTEGER,
    mininteger: MIN_INTEGER,
    huge: Infinity,
    pi: Math.PI,
  });
}
