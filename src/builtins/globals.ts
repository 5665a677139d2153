/**
 * Purpose: Assemble the complete ThemeScript global environment.
 * Intent: Build it from an explicit allow-list; a name not registered here does not exist for scripts.
 */

import type { Logger } from "../logger.js";
import type { ScriptTable, ScriptValue } from "../themescript/values.js";
import { baseBuiltins } from "./builtins_base.js";
import { makeMathLibrary } from "./builtins_math.js";
import { makeOsLibrary } from "./builtins_os.js";
import { makeNowGetter, toScriptValue } from "./builtins_shared.js";
import { makeStringLibrary } from "./builtins_string.js";
import { makeTableLibrary } from "./builtins_table.js";
import { type EnvLookup, makeColorMethods, type ResourceSink, themeBuiltins } from "./builtins_theme.js";

export interface GlobalsOptions {
  env: EnvLookup;
  resources: ResourceSink | null;
  now?: Date;
  logger: Logger;
}

export interface ScriptLibraries {
  globals: Map<string, ScriptValue>;
  stringMethods: ScriptTable;
  colorMethods: ScriptTable;
}

export function createGlobals(options: GlobalsOptions): ScriptLibraries {
  const globals = new Map<string, ScriptValue>();
  const functions = {
    ...baseBuiltins(options.logger),
    ...themeBuiltins({ env: options.env, resources: options.resources }),
  };
  for (const [name, entry] of Object.entries(functions)) globals.set(name, toScriptValue(name, entry));

  const stringMethods = makeStringLibrary();
  globals.set("string", stringMethods);
  globals.set("math", makeMathLibrary());
  globals.set("table", makeTableLibrary());
  globals.set("os", makeOsLibrary(makeNowGetter(options.now)));

  return { globals, stringMethods, colorMethods: makeColorMethods() };
}
