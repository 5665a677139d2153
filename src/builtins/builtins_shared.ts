/**
 * Purpose: Provide shared helpers for building ThemeScript library tables.
 * Intent: Keep argument checking and read-only library construction consistent across modules.
 */

import { Color } from "../color.js";
import { formatNumber, isScriptNumber, parseNumeral, type ScriptNumber, toFloat, toInteger } from "../themescript/numbers.js";
import { type NativeFunction, type ScriptValue, ScriptFunction, ScriptTable, typeName } from "../themescript/values.js";

/** A library function with exactly one result. */
export type SingleResult = (args: ScriptValue[]) => ScriptValue;

/** Marks a library function that returns its full result list. */
export class MultiReturn {
  readonly call: NativeFunction;

  constructor(call: NativeFunction) {
    this.call = call;
  }
}

export function multiReturn(call: NativeFunction): MultiReturn {
  return new MultiReturn(call);
}

export type LibraryEntry = SingleResult | MultiReturn | ScriptValue;

/** Wrap a library entry as a script function; other values pass through. */
export function toScriptValue(name: string, entry: LibraryEntry): ScriptValue {
  if (entry instanceof MultiReturn) return new ScriptFunction(name, entry.call);
  if (typeof entry === "function") return new ScriptFunction(name, (args) => [entry(args)]);
  return entry;
}

/** Build a frozen library table; plain JS functions become named script functions. */
export function makeLibrary(name: string, entries: Record<string, LibraryEntry>): ScriptTable {
  const table = new ScriptTable();
  for (const [key, entry] of Object.entries(entries)) table.rawSet(key, toScriptValue(`${name}.${key}`, entry));
  return table.freeze(name);
}

export function badArgument(index: number, fname: string, detail: string): Error {
  return new Error(`bad argument #${index + 1} to '${fname}' (${detail})`);
}

function expected(kind: string, v: ScriptValue): string {
  return `${kind} expected, got ${v === null ? "no value" : typeName(v)}`;
}

export function argAt(args: ScriptValue[], index: number): ScriptValue {
  return args[index] ?? null;
}

/** A number argument with its subtype kept; numeric strings convert. */
export function argScriptNumber(args: ScriptValue[], index: number, fname: string): ScriptNumber {
  const v = argAt(args, index);
  if (isScriptNumber(v)) return v;
  if (typeof v === "string") {
    const n = parseNumeral(v);
    if (n !== null) return n;
  }
  throw badArgument(index, fname, expected("number", v));
}

export function argNumber(args: ScriptValue[], index: number, fname: string): number {
  return toFloat(argScriptNumber(args, index, fname));
}

export function optNumber(args: ScriptValue[], index: number, fname: string, fallback: number): number {
  return argAt(args, index) === null ? fallback : argNumber(args, index, fname);
}

export function argInt64(args: ScriptValue[], index: number, fname: string): bigint {
  const n = toInteger(argScriptNumber(args, index, fname));
  if (n === null) throw badArgument(index, fname, "number has no integer representation");
  return n;
}

/** An integer argument as a host number; positions and counts fit comfortably. */
export function argInteger(args: ScriptValue[], index: number, fname: string): number {
  return Number(argInt64(args, index, fname));
}

export function optInteger(args: ScriptValue[], index: number, fname: string, fallback: number): number {
  return argAt(args, index) === null ? fallback : argInteger(args, index, fname);
}

export function argString(args: ScriptValue[], index: number, fname: string): string {
  const v = argAt(args, index);
  if (typeof v === "string") return v;
  if (isScriptNumber(v)) return formatNumber(v);
  throw badArgument(index, fname, expected("string", v));
}

export function optString(args: ScriptValue[], index: number, fname: string, fallback: string): string {
  return argAt(args, index) === null ? fallback : argString(args, index, fname);
}

export function argTable(args: ScriptValue[], index: number, fname: string): ScriptTable {
  const v = argAt(args, index);
  if (v instanceof ScriptTable) return v;
  throw badArgument(index, fname, expected("table", v));
}

export function argFunction(args: ScriptValue[], index: number, fname: string): ScriptFunction {
  const v = argAt(args, index);
  if (v instanceof ScriptFunction) return v;
  throw badArgument(index, fname, expected("function", v));
}

export function argColor(args: ScriptValue[], index: number, fname: string): Color {
  const v = argAt(args, index);
  if (v instanceof Color) return v;
  throw badArgument(index, fname, expected("color", v));
}

export function argByte(args: ScriptValue[], index: number, fname: string): number {
  const n = argInteger(args, index, fname);
  if (n < 0 || n > 255) throw badArgument(index, fname, `value ${n} is out of range 0-255`);
  return n;
}

export function makeNowGetter(now?: Date): () => Date {
  if (now === undefined) return () => new Date();
  if (Number.isNaN(now.getTime())) throw new Error("invalid clock override");
  const fixed = now.getTime();
  return () => new Date(fixed);
}
