/**
 * Purpose: Host a persistent ThemeScript environment for one build.
 * Intent: Parse, locate, and run expressions and chunks against globals that outlive each call.
 */

import { createGlobals } from "../builtins/globals.js";
import type { EnvLookup, ResourceSink } from "../builtins/builtins_theme.js";
import { createModuleLogger, type Logger } from "../logger.js";
import type { Block, Expr } from "./ast.js";
import { runChunk, runExpression } from "./eval.js";
import type { EvalContext } from "./eval_runtime.js";
import { fromHostNumber } from "./numbers.js";
import { parseChunk, tryParseExpression } from "./parser.js";
import { ThemeScriptSyntaxError } from "./tokenizer.js";
import { type ScriptValue, toByteString } from "./values.js";

export type ScriptGlobalValue = string | number | boolean;

export interface ScriptEngineOptions {
  themeName: string;
  globals?: Record<string, ScriptGlobalValue>;
  /** Defaults to the process environment. */
  env?: EnvLookup;
  now?: Date;
  resources?: ResourceSink;
  logger?: Logger;
}

function fromHostValue(value: ScriptGlobalValue): ScriptValue {
  if (typeof value === "string") return toByteString(value);
  return typeof value === "number" ? fromHostNumber(value) : value;
}

/** Own environment entries only; inherited members such as `toString` are not variables. */
export function processEnvLookup(name: string): string | undefined {
  return Object.hasOwn(process.env, name) ? process.env[name] : undefined;
}

function parseLocated(source: string, chunkName: string): Block {
  try {
    return parseChunk(source);
  } catch (err) {
    if (err instanceof ThemeScriptSyntaxError) throw err.locate(source, chunkName);
    throw err;
  }
}

export class ScriptEngine {
  private readonly globals: Map<string, ScriptValue>;
  private readonly contextBase: Omit<EvalContext, "chunkName" | "source">;
  private readonly log: Logger;

  constructor(options: ScriptEngineOptions) {
    this.log = options.logger ?? createModuleLogger("themescript");
    const libraries = createGlobals({
      env: options.env ?? processEnvLookup,
      resources: options.resources ?? null,
      now: options.now,
      logger: this.log,
    });
    this.globals = libraries.globals;
    for (const [name, value] of Object.entries(options.globals ?? {})) this.globals.set(name, fromHostValue(value));
    this.globals.set("theme_name", toByteString(options.themeName));

    this.contextBase = {
      globals: this.globals,
      stringMethods: libraries.stringMethods,
      colorMethods: libraries.colorMethods,
      depth: { current: 0 },
    };
  }

  private context(source: string, chunkName: string): EvalContext {
    return { ...this.contextBase, source, chunkName };
  }

  /**
   * Evaluate `source` as a single expression when it is one; otherwise run it
   * as a chunk and return its `return` value.
   */
  evaluate(source: string, chunkName = "expression"): ScriptValue {
    const expr: Expr | null = tryParseExpression(source);
    if (expr) {
      this.log.debug({ chunk: chunkName }, "evaluating expression");
      return runExpression(expr, this.context(source, chunkName));
    }
    return this.execute(source, chunkName);
  }

  /** Run `source` as a chunk of statements. */
  execute(source: string, chunkName = "chunk"): ScriptValue {
    const block = parseLocated(source, chunkName);
    this.log.debug({ chunk: chunkName, statements: block.length }, "running chunk");
    return runChunk(block, this.context(source, chunkName));
  }

  setGlobal(name: string, value: ScriptValue): void {
    if (value === null) this.globals.delete(name);
    else this.globals.set(name, value);
  }

  getGlobal(name: string): ScriptValue {
    return this.globals.get(name) ?? null;
  }
}
