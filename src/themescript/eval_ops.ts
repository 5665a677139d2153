/**
 * Purpose: Implement ThemeScript's arithmetic, bitwise, comparison, and concatenation operators.
 * Intent: Keep operator semantics in one place, with colors delegating to the color model.
 */

import { Color } from "../color.js";
import type { BinaryOp, UnaryOp } from "./ast.js";
import {
  compareNumbers,
  formatNumber,
  isScriptNumber,
  parseNumeral,
  type ScriptNumber,
  toFloat,
  toInteger,
  wrapInteger,
} from "./numbers.js";
import { type ScriptValue, ScriptTable, typeName } from "./values.js";

type ArithmeticOp = "+" | "-" | "*" | "/" | "//" | "%" | "^";
type BitwiseOp = "&" | "|" | "~" | "<<" | ">>";

function toArithmetic(v: ScriptValue, op: string): ScriptNumber {
  if (isScriptNumber(v)) return v;
  if (typeof v === "string") {
    const n = parseNumeral(v);
    if (n !== null) return n;
  }
  throw new Error(`attempt to perform arithmetic (${op}) on a ${typeName(v)} value`);
}

function toBitwise(v: ScriptValue, op: string): bigint {
  const n = toArithmetic(v, op);
  const i = toInteger(n);
  if (i === null) throw new Error(`number has no integer representation (${op})`);
  return i;
}

function shiftLeft(value: bigint, by: bigint): bigint {
  if (by <= -64n || by >= 64n) return 0n;
  const unsigned = BigInt.asUintN(64, value);
  return by >= 0n ? wrapInteger(unsigned << by) : wrapInteger(unsigned >> -by);
}

function floorDivide(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? q - 1n : q;
}

function floorModInteger(a: bigint, b: bigint): bigint {
  const r = a % b;
  return r !== 0n && r < 0n !== b < 0n ? r + b : r;
}

function floorModFloat(a: number, b: number): number {
  const r = a % b;
  return (r > 0 ? b < 0 : r < 0 && b !== r) ? r + b : r;
}

function integerArithmetic(op: ArithmeticOp, x: bigint, y: bigint): ScriptNumber {
  switch (op) {
    case "+":
      return wrapInteger(x + y);
    case "-":
      return wrapInteger(x - y);
    case "*":
      return wrapInteger(x * y);
    case "//":
      if (y === 0n) throw new Error("attempt to perform 'n//0'");
      return wrapInteger(floorDivide(x, y));
    case "%":
      if (y === 0n) throw new Error("attempt to perform 'n%%0'");
      return floorModInteger(x, y);
    case "/":
    case "^":
      return floatArithmetic(op, Number(x), Number(y));
    default: {
      const _exhaustive: never = op;
      throw new Error(`unsupported operator ${String(_exhaustive)}`);
    }
  }
}

function floatArithmetic(op: ArithmeticOp, x: number, y: number): number {
  switch (op) {
    case "+":
      return x + y;
    case "-":
      return x - y;
    case "*":
      return x * y;
    case "/":
      return x / y;
    case "^":
      return x ** y;
    case "//":
      return Math.floor(x / y);
    case "%":
      return floorModFloat(x, y);
    default: {
      const _exhaustive: never = op;
      throw new Error(`unsupported operator ${String(_exhaustive)}`);
    }
  }
}

function arithmetic(op: ArithmeticOp, a: ScriptValue, b: ScriptValue): ScriptValue {
  if (a instanceof Color || b instanceof Color) {
    if (a instanceof Color && b instanceof Color) {
      if (op === "+") return a.add(b);
      if (op === "-") return a.sub(b);
    }
    throw new Error(`attempt to perform arithmetic (${op}) on a color value`);
  }

  const x = toArithmetic(a, op);
  const y = toArithmetic(b, op);
  if (typeof x === "bigint" && typeof y === "bigint") return integerArithmetic(op, x, y);
  return floatArithmetic(op, toFloat(x), toFloat(y));
}

function bitwise(op: BitwiseOp, a: ScriptValue, b: ScriptValue): bigint {
  const x = toBitwise(a, op);
  const y = toBitwise(b, op);
  switch (op) {
    case "&":
      return x & y;
    case "|":
      return x | y;
    case "~":
      return x ^ y;
    case "<<":
      return shiftLeft(x, y);
    case ">>":
      return shiftLeft(x, -y);
    default: {
      const _exhaustive: never = op;
      throw new Error(`unsupported operator ${String(_exhaustive)}`);
    }
  }
}

export function rawEquals(a: ScriptValue, b: ScriptValue): boolean {
  if (a instanceof Color && b instanceof Color) return a.equals(b);
  if (isScriptNumber(a) && isScriptNumber(b)) return compareNumbers(a, b) === 0;
  return a === b;
}

/** -1, 0 or 1 for numbers or strings (NaN when unordered); throws for anything else. */
export function compareValues(a: ScriptValue, b: ScriptValue): number {
  if (isScriptNumber(a) && isScriptNumber(b)) return compareNumbers(a, b);
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  const ta = typeName(a);
  const tb = typeName(b);
  throw new Error(ta === tb ? `attempt to compare two ${ta} values` : `attempt to compare ${ta} with ${tb}`);
}

function compare(op: "<" | "<=" | ">" | ">=", a: ScriptValue, b: ScriptValue): boolean {
  // Every comparison against NaN is false.
  const cmp = compareValues(a, b);
  if (op === "<") return cmp < 0;
  if (op === "<=") return cmp <= 0;
  if (op === ">") return cmp > 0;
  return cmp >= 0;
}

function concatPart(v: ScriptValue): string {
  if (typeof v === "string") return v;
  if (isScriptNumber(v)) return formatNumber(v);
  throw new Error(`attempt to concatenate a ${typeName(v)} value`);
}

/** Every binary operator except the short-circuiting `and`/`or`. */
export function evalBinaryOp(op: Exclude<BinaryOp, "and" | "or">, a: ScriptValue, b: ScriptValue): ScriptValue {
  switch (op) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "//":
    case "%":
    case "^":
      return arithmetic(op, a, b);
    case "&":
    case "|":
    case "~":
    case "<<":
    case ">>":
      return bitwise(op, a, b);
    case "<":
    case "<=":
    case ">":
    case ">=":
      return compare(op, a, b);
    case "==":
      return rawEquals(a, b);
    case "~=":
      return !rawEquals(a, b);
    case "..":
      return concatPart(a) + concatPart(b);
    default: {
      const _exhaustive: never = op;
      throw new Error(`unsupported operator ${String(_exhaustive)}`);
    }
  }
}

export function evalUnaryOp(op: UnaryOp, v: ScriptValue): ScriptValue {
  switch (op) {
    case "not":
      return v === null || v === false;
    case "-": {
      const n = toArithmetic(v, "unm");
      return typeof n === "bigint" ? wrapInteger(-n) : -n;
    }
    case "~":
      return wrapInteger(~toBitwise(v, "bnot"));
    case "#":
      if (typeof v === "string") return BigInt(v.length);
      if (v instanceof ScriptTable) return BigInt(v.length());
      throw new Error(`attempt to get length of a ${typeName(v)} value`);
    default: {
      const _exhaustive: never = op;
      throw new Error(`unsupported operator ${String(_exhaustive)}`);
    }
  }
}
