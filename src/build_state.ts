/**
 * Purpose: Carry everything one theme build accumulates.
 * Intent: Thread a single explicit state object through the recursive expansion instead of ambient globals.
 */

import type { BuildOptions } from "./build_options.js";
import { ConfigTable } from "./config_table.js";
import type { Logger } from "./logger.js";
import { ScriptEngine } from "./themescript/engine.js";
import type { BuildMessage, ResourceManifest, ResourceRequest } from "./types.js";

export class BuildState {
  readonly engine: ScriptEngine;
  readonly fragments: string[] = [];
  readonly config = new ConfigTable();
  readonly resources: ResourceManifest = new Map();
  readonly messages: BuildMessage[] = [];
  /** Resources registered from scripts, waiting for the base directory of the code that staged them. */
  readonly pendingResources: ResourceRequest[] = [];
  /** Absolute paths of the descriptors currently being expanded, outermost first. */
  readonly includeStack: string[] = [];
  readonly options: BuildOptions;
  readonly root: string;
  readonly log: Logger;
  suppressNewline = false;

  constructor(options: BuildOptions, root: string, log: Logger) {
    this.options = options;
    this.root = root;
    this.log = log;
    const env = options.env;
    this.engine = new ScriptEngine({
      themeName: options.themeName,
      globals: options.globals,
      env: env ? (name) => (Object.hasOwn(env, name) ? env[name] : undefined) : undefined,
      now: options.now,
      resources: { push: (request) => this.pendingResources.push(request) },
      logger: log.child({ module: "themescript" }),
    });
  }

  /** Take every staged resource request, leaving the queue empty. */
  takePendingResources(): ResourceRequest[] {
    return this.pendingResources.splice(0, this.pendingResources.length);
  }

  warn(message: BuildMessage): void {
    this.messages.push(message);
    this.log.warn({ code: message.code, file: message.file }, message.message);
  }
}
