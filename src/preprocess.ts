/**
 * Purpose: Expand a theme descriptor into descriptor text, configuration, and a resource manifest.
 * Intent: Walk includes depth-first with one shared BuildState and script engine for the whole build.
 */

import fs from "node:fs";
import path from "node:path";
import { type BuildOptionsInput, parseBuildOptions } from "./build_options.js";
import { BuildState } from "./build_state.js";
import { type ConfigTable, readConfigTable } from "./config_table.js";
import { parseConfigValue } from "./config_value_parse.js";
import { parseDescriptor } from "./descriptor_parse.js";
import { DescriptorSyntaxError, EvaluationError, FileReadError, IncludeError } from "./errors.js";
import { createModuleLogger } from "./logger.js";
import { isWithinRoot } from "./paths.js";
import { type RegisterContext, registerResources } from "./resources.js";
import { ThemeScriptRuntimeError } from "./themescript/eval_runtime.js";
import { ThemeScriptSyntaxError } from "./themescript/tokenizer.js";
import { serializeValue, type SerializeTarget, UnsupportedValueError } from "./themescript/values.js";
import type { BuildMessage, ConfigValuePart, ContentItem, ResourceManifest, Span } from "./types.js";

export interface BuildResult {
  descriptor: string;
  config: ConfigTable;
  resources: ResourceManifest;
  messages: BuildMessage[];
}

type IncludeKind = "config" | "script" | "descriptor";

function displayPath(state: BuildState, file: string): string {
  const rel = path.relative(state.root, file);
  return rel && !rel.startsWith("..") ? rel.split(path.sep).join("/") : file;
}

function readText(file: string): string {
  try {
    return fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new FileReadError(file, err);
  }
}

function includeKind(state: BuildState, file: string): IncludeKind {
  const ext = path.extname(file).slice(1).toLowerCase();
  if (state.options.configExtensions.includes(ext)) return "config";
  if (state.options.scriptExtensions.includes(ext)) return "script";
  return "descriptor";
}

function registerContext(state: BuildState): RegisterContext {
  return {
    manifest: state.resources,
    warn: (message) => state.warn(message),
    log: state.log,
    confineTo: state.options.confineToRoot ? state.root : null,
  };
}

/** Register resources staged by scripts, resolving them against `baseDir`. */
function drainPendingResources(state: BuildState, baseDir: string, file: string): void {
  const pending = state.takePendingResources();
  if (pending.length === 0) return;
  const ctx = registerContext(state);
  for (const request of pending) registerResources(ctx, request, baseDir, displayPath(state, file));
}

function evaluateSpan(state: BuildState, source: string, span: Span, file: string, target: SerializeTarget): string {
  const site = { file: displayPath(state, file), line: span.line, column: span.column, source };
  try {
    const value = state.engine.evaluate(source, `#{${source.trim()}}`);
    return serializeValue(value, target);
  } catch (err) {
    if (err instanceof UnsupportedValueError) throw new EvaluationError("TD_EVAL_UNSUPPORTED_VALUE", site, err);
    if (err instanceof ThemeScriptSyntaxError || err instanceof ThemeScriptRuntimeError) {
      throw new EvaluationError("TD_EVAL", site, err);
    }
    throw err;
  }
}

/** Indent every line after the first so a multi-line value lines up under its `#{`. */
function reindent(text: string, column: number): string {
  if (!text.includes("\n")) return text;
  const indent = " ".repeat(Math.max(column - 1, 0));
  return text
    .split("\n")
    .map((line, i) => (i === 0 || line === "" ? line : indent + line))
    .join("\n");
}

function importConfig(state: BuildState, file: string): void {
  const display = displayPath(state, file);
  state.log.debug({ file: display }, "importing configuration");
  const table = readConfigTable(readText(file), display);

  for (const [section, key, raw] of table.entries()) {
    let parts: ConfigValuePart[];
    try {
      parts = parseConfigValue(raw);
    } catch (err) {
      if (err instanceof DescriptorSyntaxError) throw err.withFile(`${display} [${section}] ${key}`);
      throw err;
    }

    let value = "";
    for (const part of parts) {
      if (part.kind === "text") {
        value += part.text;
        continue;
      }
      // The span points just inside `#{`.
      const exprColumn = part.span.column - 2;
      value += reindent(evaluateSpan(state, part.text, part.span, file, "config"), exprColumn);
    }
    state.config.set(section, key, value);
  }

  drainPendingResources(state, path.dirname(file), file);
}

function runScript(state: BuildState, file: string): void {
  const display = displayPath(state, file);
  state.log.debug({ file: display }, "running script");
  state.engine.execute(readText(file), display);
  drainPendingResources(state, path.dirname(file), file);
}

function resolveInclude(state: BuildState, from: string, target: string): string {
  const resolved = path.resolve(path.dirname(from), target);
  if (state.options.confineToRoot && !isWithinRoot(state.root, resolved)) {
    throw new IncludeError(
      "TD_INCLUDE_OUTSIDE_ROOT",
      `include \`${target}\` in ${displayPath(state, from)} resolves outside the theme root \`${state.root}\``,
      resolved
    );
  }
  return resolved;
}

function feedInclude(state: BuildState, from: string, target: string): void {
  const resolved = resolveInclude(state, from, target);
  const kind = includeKind(state, resolved);
  switch (kind) {
    case "config":
      importConfig(state, resolved);
      break;
    case "script":
      runScript(state, resolved);
      break;
    case "descriptor":
      expandDescriptor(state, resolved);
      break;
    default: {
      const _exhaustive: never = kind;
      throw new Error(`unknown include kind ${String(_exhaustive)}`);
    }
  }
}

function feed(state: BuildState, item: ContentItem, file: string): void {
  const suppressNewline = state.suppressNewline;
  state.suppressNewline = false;

  switch (item.kind) {
    case "newline":
      if (!suppressNewline) state.fragments.push("\n");
      return;
    case "code":
    case "comment":
      state.fragments.push(item.text);
      return;
    case "expression":
      state.fragments.push(evaluateSpan(state, item.text, item.span, file, "descriptor"));
      drainPendingResources(state, path.dirname(file), file);
      return;
    case "directive": {
      const directive = item.directive;
      switch (directive.kind) {
        case "include":
          feedInclude(state, file, directive.path);
          state.suppressNewline = true;
          return;
        case "resource":
          registerResources(registerContext(state), directive, path.dirname(file), displayPath(state, file));
          state.suppressNewline = true;
          return;
        case "unknown":
          state.fragments.push(`; #${directive.name}${directive.rest}`);
          return;
        default: {
          const _exhaustive: never = directive;
          throw new Error(`unknown directive ${String(_exhaustive)}`);
        }
      }
    }
    default: {
      const _exhaustive: never = item;
      throw new Error(`unknown content item ${String(_exhaustive)}`);
    }
  }
}

function expandDescriptor(state: BuildState, file: string): void {
  const display = displayPath(state, file);
  if (state.includeStack.includes(file)) {
    const chain = [...state.includeStack, file].map((f) => displayPath(state, f)).join(" -> ");
    throw new IncludeError("TD_INCLUDE_CYCLE", `include cycle detected: ${chain}`, file);
  }

  state.log.debug({ file: display, depth: state.includeStack.length }, "expanding descriptor");
  const text = readText(file);
  let items: ContentItem[];
  try {
    items = parseDescriptor(text);
  } catch (err) {
    if (err instanceof DescriptorSyntaxError) throw err.withFile(display);
    throw err;
  }

  state.includeStack.push(file);
  try {
    for (const item of items) feed(state, item, file);
  } finally {
    state.includeStack.pop();
  }
}

/** Build the theme whose entry descriptor is `entryPath`. */
export function buildTheme(entryPath: string, options: BuildOptionsInput): BuildResult {
  const parsed = parseBuildOptions(options);
  const entry = path.resolve(entryPath);
  const log = createModuleLogger("preprocess", parsed.logLevel);
  const state = new BuildState(parsed, path.dirname(entry), log);

  log.debug({ entry, theme: parsed.themeName }, "building theme");
  expandDescriptor(state, entry);

  return {
    descriptor: state.fragments.join(""),
    config: state.config,
    resources: state.resources,
    messages: state.messages,
  };
}
