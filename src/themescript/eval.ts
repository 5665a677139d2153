/**
 * Purpose: Evaluate ThemeScript statements and expressions by walking the AST.
 * Intent: Execute deterministically against an explicit scope chain and globals map, with line-tagged errors.
 */

import type { Block, Expr, FunctionBody, MultiExpr, Stmt } from "./ast.js";
import { evalBinaryOp, evalUnaryOp } from "./eval_ops.js";
import {
  assignIndex,
  callValue,
  type EvalContext,
  indexValue,
  Scope,
  ThemeScriptRuntimeError,
} from "./eval_runtime.js";
import { isScriptNumber, type ScriptNumber, toFloat } from "./numbers.js";
import { lineColFromOffset } from "./tokenizer.js";
import { isTruthy, type ScriptValue, ScriptFunction, ScriptTable } from "./values.js";

export type Completion = { type: "normal" } | { type: "break" } | { type: "return"; values: ScriptValue[] };

const NORMAL: Completion = { type: "normal" };

function lineOf(pos: number, ctx: EvalContext): number {
  return lineColFromOffset(ctx.source, pos).line;
}

function runtimeError(err: unknown, pos: number, ctx: EvalContext): ThemeScriptRuntimeError {
  return ThemeScriptRuntimeError.at(err, ctx.chunkName, lineOf(pos, ctx));
}

/** Run one operation of the node at `pos`; its failures report that node's line. */
function at<T>(pos: number, ctx: EvalContext, run: () => T): T {
  try {
    return run();
  } catch (err) {
    throw runtimeError(err, pos, ctx);
  }
}

function describeCallee(expr: Expr): string {
  if (expr.kind === "identifier") return `global or local '${expr.name}'`;
  if (expr.kind === "index" && expr.key.kind === "string") return `field '${expr.key.value}'`;
  return "expression";
}

function readName(name: string, scope: Scope, ctx: EvalContext): ScriptValue {
  const owner = scope.resolve(name);
  if (owner) return owner.read(name);
  return ctx.globals.get(name) ?? null;
}

function writeName(name: string, value: ScriptValue, scope: Scope, ctx: EvalContext): void {
  const owner = scope.resolve(name);
  if (owner) {
    owner.write(name, value);
    return;
  }
  if (value === null) ctx.globals.delete(name);
  else ctx.globals.set(name, value);
}

export function makeClosure(fn: FunctionBody, scope: Scope, ctx: EvalContext): ScriptFunction {
  return new ScriptFunction(fn.name, (args) => {
    const local = new Scope(scope, fn.isVararg ? args.slice(fn.params.length) : null);
    fn.params.forEach((param, i) => local.declare(param, args[i] ?? null));
    const done = execBlock(fn.body, local, ctx);
    if (done.type === "break") throw new Error("break outside a loop");
    return done.type === "return" ? done.values : [];
  });
}

function evalTable(expr: Extract<Expr, { kind: "table" }>, scope: Scope, ctx: EvalContext): ScriptTable {
  const table = new ScriptTable();
  let next = 1n;
  const last = expr.fields.length - 1;
  expr.fields.forEach((field, i) => {
    switch (field.kind) {
      case "positional":
        if (i === last) {
          for (const value of evalMulti(field.value, scope, ctx)) table.rawSet(next++, value);
        } else {
          table.rawSet(next++, evalExpr(field.value, scope, ctx));
        }
        break;
      case "named":
        table.rawSet(field.key, evalExpr(field.value, scope, ctx));
        break;
      case "keyed": {
        const key = evalExpr(field.key, scope, ctx);
        const value = evalExpr(field.value, scope, ctx);
        at(expr.pos, ctx, () => table.rawSet(key, value));
        break;
      }
      default: {
        const _exhaustive: never = field;
        throw new Error(`unsupported table field ${String(_exhaustive)}`);
      }
    }
  });
  return table;
}

function evalCall(expr: Extract<MultiExpr, { kind: "call" } | { kind: "method" }>, scope: Scope, ctx: EvalContext): ScriptValue[] {
  if (expr.kind === "call") {
    const fn = evalExpr(expr.callee, scope, ctx);
    const args = evalList(expr.args, scope, ctx);
    const label = describeCallee(expr.callee);
    return at(expr.pos, ctx, () => callValue(fn, args, ctx, label));
  }
  const name = expr.name;
  const self = evalExpr(expr.object, scope, ctx);
  const fn = at(expr.pos, ctx, () => indexValue(self, name, ctx));
  const args = evalList(expr.args, scope, ctx);
  return at(expr.pos, ctx, () => callValue(fn, [self, ...args], ctx, `method '${name}'`));
}

/** Every value an expression produces; only calls and `...` produce other than one. */
export function evalMulti(expr: Expr, scope: Scope, ctx: EvalContext): ScriptValue[] {
  switch (expr.kind) {
    case "call":
    case "method":
      return evalCall(expr, scope, ctx);
    case "vararg":
      return [...scope.varargs()];
    default:
      return [evalExpr(expr, scope, ctx)];
  }
}

/** Values of an expression list; the last expression contributes all of its values. */
export function evalList(exprs: Expr[], scope: Scope, ctx: EvalContext): ScriptValue[] {
  const values: ScriptValue[] = [];
  exprs.forEach((expr, i) => {
    if (i === exprs.length - 1) values.push(...evalMulti(expr, scope, ctx));
    else values.push(evalExpr(expr, scope, ctx));
  });
  return values;
}

export function evalExpr(expr: Expr, scope: Scope, ctx: EvalContext): ScriptValue {
  switch (expr.kind) {
    case "nil":
      return null;
    case "boolean":
    case "number":
    case "string":
      return expr.value;
    case "identifier":
      return readName(expr.name, scope, ctx);
    case "index": {
      const obj = evalExpr(expr.object, scope, ctx);
      const key = evalExpr(expr.key, scope, ctx);
      return at(expr.pos, ctx, () => indexValue(obj, key, ctx));
    }
    case "call":
    case "method":
    case "vararg":
      return evalMulti(expr, scope, ctx)[0] ?? null;
    case "paren":
      return evalExpr(expr.expr, scope, ctx);
    case "function":
      return makeClosure(expr.fn, scope, ctx);
    case "table":
      return evalTable(expr, scope, ctx);
    case "unary": {
      const op = expr.op;
      const operand = evalExpr(expr.expr, scope, ctx);
      return at(expr.pos, ctx, () => evalUnaryOp(op, operand));
    }
    case "binary": {
      if (expr.op === "and") {
        const left = evalExpr(expr.left, scope, ctx);
        return isTruthy(left) ? evalExpr(expr.right, scope, ctx) : left;
      }
      if (expr.op === "or") {
        const left = evalExpr(expr.left, scope, ctx);
        return isTruthy(left) ? left : evalExpr(expr.right, scope, ctx);
      }
      const op = expr.op;
      const a = evalExpr(expr.left, scope, ctx);
      const b = evalExpr(expr.right, scope, ctx);
      return at(expr.pos, ctx, () => evalBinaryOp(op, a, b));
    }
    default: {
      const _exhaustive: never = expr;
      throw new Error(`unsupported expression ${String(_exhaustive)}`);
    }
  }
}

function forNumber(v: ScriptValue, what: string): ScriptNumber {
  if (!isScriptNumber(v)) throw new Error(`'for' ${what} must be a number`);
  return v;
}

/** Integer limit for an integer loop; null when the loop runs zero times. */
function integerLimit(limit: ScriptNumber, start: bigint, step: bigint): bigint | null {
  let bound: bigint;
  if (typeof limit === "bigint") {
    bound = limit;
  } else {
    if (Number.isNaN(limit)) return null;
    if (!Number.isFinite(limit)) {
      if (step > 0n ? limit < 0 : limit > 0) return null;
      return step > 0n ? start + (1n << 64n) : start - (1n << 64n);
    }
    bound = BigInt(step > 0n ? Math.floor(limit) : Math.ceil(limit));
  }
  return (step > 0n ? start > bound : start < bound) ? null : bound;
}

function runLoopBody(body: Block, scope: Scope, ctx: EvalContext): Completion | null {
  const done = execBlock(body, scope, ctx);
  if (done.type === "break") return NORMAL;
  if (done.type === "return") return done;
  return null;
}

function runIteration(name: string, value: ScriptValue, body: Block, scope: Scope, ctx: EvalContext): Completion | null {
  const inner = new Scope(scope);
  inner.declare(name, value);
  return runLoopBody(body, inner, ctx);
}

function execNumericFor(stmt: Extract<Stmt, { kind: "numericFor" }>, scope: Scope, ctx: EvalContext): Completion {
  const start = forNumber(evalExpr(stmt.start, scope, ctx), "initial value");
  const limit = forNumber(evalExpr(stmt.limit, scope, ctx), "limit");
  const step = stmt.step ? forNumber(evalExpr(stmt.step, scope, ctx), "step") : 1n;
  if (step === 0n || step === 0) throw new Error("'for' step is zero");

  if (typeof start === "bigint" && typeof step === "bigint") {
    const bound = integerLimit(limit, start, step);
    if (bound === null) return NORMAL;
    // The iteration count is fixed up front, so the control variable never overflows.
    let remaining = (bound - start) / step;
    for (let i = start; ; i += step) {
      const exit = runIteration(stmt.name, i, stmt.body, scope, ctx);
      if (exit) return exit;
      if (remaining-- === 0n) return NORMAL;
    }
  }

  const fstep = toFloat(step);
  const flimit = toFloat(limit);
  for (let i = toFloat(start); fstep > 0 ? i <= flimit : i >= flimit; i += fstep) {
    const exit = runIteration(stmt.name, i, stmt.body, scope, ctx);
    if (exit) return exit;
  }
  return NORMAL;
}

function execGenericFor(stmt: Extract<Stmt, { kind: "genericFor" }>, scope: Scope, ctx: EvalContext): Completion {
  const [fn = null, state = null, initial = null] = evalList(stmt.iterators, scope, ctx);
  let control = initial;
  while (true) {
    const values = callValue(fn, [state, control], ctx, "for iterator");
    const first = values[0] ?? null;
    if (first === null) return NORMAL;
    control = first;
    const inner = new Scope(scope);
    stmt.names.forEach((name, i) => inner.declare(name, values[i] ?? null));
    const exit = runLoopBody(stmt.body, inner, ctx);
    if (exit) return exit;
  }
}

function execStmtInner(stmt: Stmt, scope: Scope, ctx: EvalContext): Completion {
  switch (stmt.kind) {
    case "local": {
      const values = evalList(stmt.values, scope, ctx);
      stmt.names.forEach((name, i) => scope.declare(name, values[i] ?? null));
      return NORMAL;
    }
    case "localFunction": {
      // Declared before the closure is built so the body can recurse.
      scope.declare(stmt.name, null);
      scope.write(stmt.name, makeClosure(stmt.fn, scope, ctx));
      return NORMAL;
    }
    case "assign": {
      const targets = stmt.targets.map((target) =>
        target.kind === "index"
          ? { kind: "index" as const, object: evalExpr(target.object, scope, ctx), key: evalExpr(target.key, scope, ctx), pos: target.pos }
          : { kind: "name" as const, name: target.name }
      );
      const values = evalList(stmt.values, scope, ctx);
      targets.forEach((target, i) => {
        const value = values[i] ?? null;
        if (target.kind === "index") {
          const { object, key } = target;
          at(target.pos, ctx, () => assignIndex(object, key, value));
        } else {
          writeName(target.name, value, scope, ctx);
        }
      });
      return NORMAL;
    }
    case "call":
      evalCall(stmt.expr, scope, ctx);
      return NORMAL;
    case "do":
      return execBlock(stmt.body, new Scope(scope), ctx);
    case "while": {
      while (isTruthy(evalExpr(stmt.test, scope, ctx))) {
        const exit = runLoopBody(stmt.body, new Scope(scope), ctx);
        if (exit) return exit;
      }
      return NORMAL;
    }
    case "repeat": {
      while (true) {
        // `until` sees the body's locals.
        const inner = new Scope(scope);
        const exit = runLoopBody(stmt.body, inner, ctx);
        if (exit) return exit;
        if (isTruthy(evalExpr(stmt.test, inner, ctx))) return NORMAL;
      }
    }
    case "if": {
      for (const clause of stmt.clauses) {
        if (isTruthy(evalExpr(clause.test, scope, ctx))) return execBlock(clause.body, new Scope(scope), ctx);
      }
      return stmt.orElse ? execBlock(stmt.orElse, new Scope(scope), ctx) : NORMAL;
    }
    case "numericFor":
      return execNumericFor(stmt, scope, ctx);
    case "genericFor":
      return execGenericFor(stmt, scope, ctx);
    case "return":
      return { type: "return", values: evalList(stmt.values, scope, ctx) };
    case "break":
      return { type: "break" };
    default: {
      const _exhaustive: never = stmt;
      throw new Error(`unsupported statement ${String(_exhaustive)}`);
    }
  }
}

function execStmt(stmt: Stmt, scope: Scope, ctx: EvalContext): Completion {
  try {
    return execStmtInner(stmt, scope, ctx);
  } catch (err) {
    throw runtimeError(err, stmt.pos, ctx);
  }
}

export function execBlock(block: Block, scope: Scope, ctx: EvalContext): Completion {
  for (const stmt of block) {
    const done = execStmt(stmt, scope, ctx);
    if (done.type !== "normal") return done;
  }
  return NORMAL;
}

/** Run a whole chunk; the first value of its top-level `return`, or nil. */
export function runChunk(block: Block, ctx: EvalContext): ScriptValue {
  const done = execBlock(block, new Scope(null, []), ctx);
  if (done.type === "break") throw new ThemeScriptRuntimeError("break outside a loop", ctx.chunkName, 1, null);
  return done.type === "return" ? done.values[0] ?? null : null;
}

/** Evaluate a lone expression to its first value; failures report the line of the failing node. */
export function runExpression(expr: Expr, ctx: EvalContext): ScriptValue {
  try {
    return evalExpr(expr, new Scope(null, []), ctx);
  } catch (err) {
    throw runtimeError(err, 0, ctx);
  }
}
