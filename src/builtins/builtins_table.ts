/**
 * Purpose: Provide the ThemeScript `table` library subset over sequence tables.
 */

import { compareValues } from "../themescript/eval_ops.js";
import { formatNumber, isScriptNumber } from "../themescript/numbers.js";
import { isTruthy, type ScriptFunction, type ScriptTable, type ScriptValue, typeName } from "../themescript/values.js";
import { argAt, argFunction, argInteger, argTable, makeLibrary, multiReturn, optInteger, optString } from "./builtins_shared.js";

const MAX_UNPACK = 1_000_000;

function slot(i: number): bigint {
  return BigInt(i);
}

function insert(args: ScriptValue[]): null {
  const t = argTable(args, 0, "insert");
  const n = t.length();
  if (args.length === 2) {
    t.set(slot(n + 1), argAt(args, 1));
    return null;
  }
  if (args.length !== 3) throw new Error("wrong number of arguments to 'insert'");

  const pos = argInteger(args, 1, "insert");
  if (pos < 1 || pos > n + 1) throw new Error("bad argument #2 to 'insert' (position out of bounds)");
  for (let i = n; i >= pos; i--) t.set(slot(i + 1), t.get(slot(i)));
  t.set(slot(pos), argAt(args, 2));
  return null;
}

function remove(args: ScriptValue[]): ScriptValue {
  const t = argTable(args, 0, "remove");
  const n = t.length();
  const pos = optInteger(args, 1, "remove", n);
  if (n === 0 && (pos === 0 || pos === n)) return t.get(slot(pos));
  if (pos < 1 || pos > n + 1) throw new Error("bad argument #2 to 'remove' (position out of bounds)");

  const removed = t.get(slot(pos));
  for (let i = pos; i < n; i++) t.set(slot(i), t.get(slot(i + 1)));
  if (pos <= n) t.set(slot(n), null);
  return removed;
}

function concat(args: ScriptValue[]): string {
  const t = argTable(args, 0, "concat");
  const sep = optString(args, 1, "concat", "");
  const first = optInteger(args, 2, "concat", 1);
  const last = optInteger(args, 3, "concat", t.length());

  const parts: string[] = [];
  for (let i = first; i <= last; i++) {
    const v = t.get(slot(i));
    if (typeof v === "string") parts.push(v);
    else if (isScriptNumber(v)) parts.push(formatNumber(v));
    else throw new Error(`invalid value (at index ${i}) in table for 'concat' (got ${typeName(v)})`);
  }
  return parts.join(sep);
}

function unpack(args: ScriptValue[]): ScriptValue[] {
  const t = argTable(args, 0, "unpack");
  const first = optInteger(args, 1, "unpack", 1);
  const last = optInteger(args, 2, "unpack", t.length());
  if (first > last) return [];
  if (last - first >= MAX_UNPACK) throw new Error("too many results to unpack");
  const values: ScriptValue[] = [];
  for (let i = first; i <= last; i++) values.push(t.get(slot(i)));
  return values;
}

function lessThan(comparator: ScriptFunction | null): (a: ScriptValue, b: ScriptValue) => boolean {
  if (comparator) return (a, b) => isTruthy(comparator.call([a, b])[0] ?? null);
  return (a, b) => compareValues(a, b) < 0;
}

function sort(args: ScriptValue[]): null {
  const t = argTable(args, 0, "sort");
  const comparator = argAt(args, 1) === null ? null : argFunction(args, 1, "sort");
  const less = lessThan(comparator);
  const n = t.length();
  const values: ScriptValue[] = [];
  for (let i = 1; i <= n; i++) values.push(t.get(slot(i)));
  values.sort((a, b) => {
    if (less(a, b)) return -1;
    return less(b, a) ? 1 : 0;
  });
  values.forEach((v, i) => t.set(slot(i + 1), v));
  return null;
}

export function makeTableLibrary(): ScriptTable {
  return makeLibrary("table", { insert, remove, concat, unpack: multiReturn(unpack), sort });
}
