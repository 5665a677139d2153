/**
 * Purpose: Model the values ThemeScript programs compute with.
 * Intent: Keep the value space a closed union so every projection out of the engine is exhaustive.
 */

import { Color } from "../color.js";
import { ThemeBuildError } from "../errors.js";
import { floatToInteger, formatNumber, formatNumberExact, type ScriptNumber } from "./numbers.js";

/**
 * Strings hold one byte per UTF-16 code unit (0-255), so lengths and
 * positions count UTF-8 bytes. Host text crosses in and out through
 * `toByteString` and `fromByteString`.
 */
export type ScriptValue = null | boolean | ScriptNumber | string | Color | ScriptTable | ScriptFunction;

export type TableKey = Exclude<ScriptValue, null>;

/** Arguments in, results out; missing trailing results read as nil. */
export type NativeFunction = (args: ScriptValue[]) => ScriptValue[];

export class ScriptFunction {
  readonly name: string;
  readonly call: NativeFunction;

  constructor(name: string, call: NativeFunction) {
    this.name = name;
    this.call = call;
  }
}

const ASCII_ONLY = /^[\x00-\x7f]*$/;
const BYTES_ONLY = /^[\x00-\xff]*$/;

export function toByteString(text: string): string {
  return ASCII_ONLY.test(text) ? text : Buffer.from(text, "utf8").toString("latin1");
}

/** Decode script bytes as UTF-8; text that is not a byte string passes through unchanged. */
export function fromByteString(bytes: string): string {
  if (ASCII_ONLY.test(bytes) || !BYTES_ONLY.test(bytes)) return bytes;
  return Buffer.from(bytes, "latin1").toString("utf8");
}

/** Integral float keys are stored as integers, so `t[1]` and `t[1.0]` are one slot. */
function normalizeKey(key: TableKey): TableKey {
  return typeof key === "number" ? floatToInteger(key) ?? key : key;
}

export class ScriptTable {
  private readonly entries = new Map<TableKey, ScriptValue>();
  private frozenAs: string | null = null;

  get readonly(): boolean {
    return this.frozenAs !== null;
  }

  /** Reject later writes; `label` names the table in the error. */
  freeze(label: string): this {
    this.frozenAs = label;
    return this;
  }

  get(key: ScriptValue): ScriptValue {
    if (key === null) return null;
    return this.entries.get(normalizeKey(key)) ?? null;
  }

  set(key: ScriptValue, value: ScriptValue): void {
    if (this.frozenAs !== null) throw new Error(`attempt to modify read-only table '${this.frozenAs}'`);
    this.rawSet(key, value);
  }

  rawSet(key: ScriptValue, value: ScriptValue): void {
    if (key === null) throw new Error("table index is nil");
    if (typeof key === "number" && Number.isNaN(key)) throw new Error("table index is NaN");
    const normalized = normalizeKey(key);
    if (value === null) {
      this.entries.delete(normalized);
      return;
    }
    this.entries.set(normalized, value);
  }

  /** Border of the array part: the largest n such that 1..n are all present. */
  length(): number {
    let n = 0;
    while (this.entries.has(BigInt(n + 1))) n++;
    return n;
  }

  keys(): TableKey[] {
    return [...this.entries.keys()];
  }

  /** The entry after `key` in traversal order, or null after the last one. */
  next(key: ScriptValue): [TableKey, ScriptValue] | null {
    const keys = this.keys();
    let index = 0;
    if (key !== null) {
      index = keys.indexOf(normalizeKey(key)) + 1;
      if (index === 0) throw new Error("invalid key to 'next'");
    }
    const nextKey = keys[index];
    return nextKey === undefined ? null : [nextKey, this.get(nextKey)];
  }

  static fromArray(values: ScriptValue[]): ScriptTable {
    const t = new ScriptTable();
    values.forEach((v, i) => t.rawSet(BigInt(i + 1), v));
    return t;
  }

  static fromRecord(record: Record<string, ScriptValue>): ScriptTable {
    const t = new ScriptTable();
    for (const [k, v] of Object.entries(record)) t.rawSet(k, v);
    return t;
  }
}

export type ScriptTypeName = "nil" | "boolean" | "number" | "string" | "color" | "table" | "function";

export function typeName(v: ScriptValue): ScriptTypeName {
  if (v === null) return "nil";
  if (typeof v === "boolean") return "boolean";
  if (typeof v === "number" || typeof v === "bigint") return "number";
  if (typeof v === "string") return "string";
  if (v instanceof Color) return "color";
  if (v instanceof ScriptTable) return "table";
  return "function";
}

export function isTruthy(v: ScriptValue): boolean {
  return v !== null && v !== false;
}

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityOf(obj: object): string {
  let id = identities.get(obj);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(obj, id);
  }
  return `0x${id.toString(16).padStart(8, "0")}`;
}

export function tostring(v: ScriptValue): string {
  if (v === null) return "nil";
  if (typeof v === "boolean") return v ? "true" : "false";
  if (typeof v === "number" || typeof v === "bigint") return formatNumber(v);
  if (typeof v === "string") return v;
  if (v instanceof Color) return v.toString();
  if (v instanceof ScriptFunction) return `function: ${v.name}`;
  return `table: ${identityOf(v)}`;
}

export type SerializeTarget = "descriptor" | "config";

export class UnsupportedValueError extends ThemeBuildError {
  readonly valueType: ScriptTypeName;

  constructor(valueType: ScriptTypeName, target: SerializeTarget) {
    super("TD_EVAL_UNSUPPORTED_VALUE", `a ${valueType} value cannot be written to the ${target} output`);
    this.name = "UnsupportedValueError";
    this.valueType = valueType;
  }
}

/**
 * Project a script result into output text. Numbers are written exactly;
 * colors are written packed in construction order for descriptor text and
 * reversed for configuration values.
 */
export function serializeValue(v: ScriptValue, target: SerializeTarget): string {
  if (v === null) return "";
  if (typeof v === "boolean") return v ? "true" : "false";
  if (typeof v === "number" || typeof v === "bigint") return formatNumberExact(v);
  if (typeof v === "string") return fromByteString(v);
  if (v instanceof Color) return String(target === "descriptor" ? v.value() : v.valueRev());
  const unsupported: ScriptTable | ScriptFunction = v;
  throw new UnsupportedValueError(typeName(unsupported), target);
}
