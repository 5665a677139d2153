/**
 * Purpose: Provide scopes, the runtime error types, and safe indexing/calling helpers for ThemeScript.
 * Intent: Centralize the rules for what a script may reach, so the evaluator stays a plain tree walk.
 */

import { Color } from "../color.js";
import { errorMessage, ThemeBuildError } from "../errors.js";
import { fromByteString, type ScriptValue, ScriptFunction, ScriptTable, toByteString, tostring, typeName } from "./values.js";

export const MAX_CALL_DEPTH = 200;

/** Raised by `error(value, level)`; carries the script value itself. */
export class ScriptError extends Error {
  readonly value: ScriptValue;
  /** 0 leaves a string message without a position prefix. */
  readonly level: number;

  constructor(value: ScriptValue, level: number) {
    super(typeof value === "string" ? fromByteString(value) : `(error object is a ${typeName(value)} value)`);
    this.name = "ScriptError";
    this.value = value;
    this.level = level;
  }
}

export class ThemeScriptRuntimeError extends ThemeBuildError {
  readonly chunkName: string;
  readonly line: number;
  /** What `pcall` hands back to the script. */
  readonly value: ScriptValue;

  constructor(detail: string, chunkName: string, line: number, cause: unknown, value?: ScriptValue) {
    super("TD_SCRIPT_RUNTIME", `${chunkName}:${line}: ${detail}`, { cause });
    this.name = "ThemeScriptRuntimeError";
    this.chunkName = chunkName;
    this.line = line;
    this.value = value === undefined ? toByteString(this.message) : value;
  }

  /** Tag a failure raised at `line` of `chunkName`; already tagged errors pass through. */
  static at(err: unknown, chunkName: string, line: number): ThemeScriptRuntimeError {
    if (err instanceof ThemeScriptRuntimeError) return err;
    if (err instanceof ScriptError) {
      const positioned = typeof err.value === "string" && err.level > 0;
      const value = positioned ? `${toByteString(`${chunkName}:${line}: `)}${tostring(err.value)}` : err.value;
      return new ThemeScriptRuntimeError(err.message, chunkName, line, err, value);
    }
    return new ThemeScriptRuntimeError(fromByteString(errorMessage(err)), chunkName, line, err);
  }
}

/** The script value an error stands for, as `pcall` reports it. */
export function errorValue(err: unknown): ScriptValue {
  if (err instanceof ThemeScriptRuntimeError || err instanceof ScriptError) return err.value;
  return errorMessage(err);
}

export interface EvalContext {
  chunkName: string;
  source: string;
  globals: Map<string, ScriptValue>;
  /** Looked up for `s:method()` and `s.name` on string values. */
  stringMethods: ScriptTable;
  colorMethods: ScriptTable;
  depth: { current: number };
}

export class Scope {
  private readonly vars = new Map<string, ScriptValue>();
  private readonly parent: Scope | null;
  /** Set on the outermost scope of a function call; block scopes inherit it. */
  private readonly ownVarargs: ScriptValue[] | null;

  constructor(parent: Scope | null, varargs: ScriptValue[] | null = null) {
    this.parent = parent;
    this.ownVarargs = varargs;
  }

  declare(name: string, value: ScriptValue): void {
    this.vars.set(name, value);
  }

  /** The scope that declares `name`, or null when it is global. */
  resolve(name: string): Scope | null {
    let scope: Scope | null = this;
    while (scope) {
      if (scope.vars.has(name)) return scope;
      scope = scope.parent;
    }
    return null;
  }

  read(name: string): ScriptValue {
    return this.vars.get(name) ?? null;
  }

  write(name: string, value: ScriptValue): void {
    this.vars.set(name, value);
  }

  varargs(): ScriptValue[] {
    let scope: Scope | null = this;
    while (scope) {
      if (scope.ownVarargs) return scope.ownVarargs;
      scope = scope.parent;
    }
    return [];
  }
}

function describeKey(key: ScriptValue): string {
  return typeof key === "string" ? `'${key}'` : typeName(key);
}

export function indexValue(obj: ScriptValue, key: ScriptValue, ctx: EvalContext): ScriptValue {
  if (obj instanceof ScriptTable) return obj.get(key);
  if (typeof obj === "string") return ctx.stringMethods.get(key);
  if (obj instanceof Color) {
    const method = ctx.colorMethods.get(key);
    if (method === null) throw new Error(`color has no member ${describeKey(key)}`);
    return method;
  }
  throw new Error(`attempt to index a ${typeName(obj)} value (key ${describeKey(key)})`);
}

export function assignIndex(obj: ScriptValue, key: ScriptValue, value: ScriptValue): void {
  if (!(obj instanceof ScriptTable)) {
    throw new Error(`attempt to index a ${typeName(obj)} value (key ${describeKey(key)})`);
  }
  obj.set(key, value);
}

export function callValue(fn: ScriptValue, args: ScriptValue[], ctx: EvalContext, label: string): ScriptValue[] {
  if (!(fn instanceof ScriptFunction)) throw new Error(`attempt to call a ${typeName(fn)} value (${label})`);
  if (ctx.depth.current >= MAX_CALL_DEPTH) throw new Error("stack overflow");
  ctx.depth.current++;
  try {
    return fn.call(args);
  } finally {
    ctx.depth.current--;
  }
}
