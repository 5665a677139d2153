export { buildTheme, type BuildResult } from "./preprocess.js";
export { parseBuildOptions, buildOptionsSchema, type BuildOptions, type BuildOptionsInput } from "./build_options.js";
export { parseDescriptor, renderContent } from "./descriptor_parse.js";
export { parseConfigValue } from "./config_value_parse.js";
export { ConfigTable, GENERAL_SECTION, readConfigTable, writeConfigTable } from "./config_table.js";
export { Color, ColorError, type ColorErrorCode, type ColorKind } from "./color.js";
export { encodeBlend, BLEND_MODES, type BlendMode } from "./builtins/builtins_theme.js";
export { processEnvLookup, ScriptEngine, type ScriptEngineOptions, type ScriptGlobalValue } from "./themescript/engine.js";
export { ScriptError, ThemeScriptRuntimeError } from "./themescript/eval_runtime.js";
export { formatNumber, formatNumberExact, type ScriptNumber } from "./themescript/numbers.js";
export { ThemeScriptSyntaxError } from "./themescript/tokenizer.js";
export {
  fromByteString,
  ScriptFunction,
  ScriptTable,
  serializeValue,
  toByteString,
  tostring,
  typeName,
  UnsupportedValueError,
  type ScriptValue,
  type SerializeTarget,
} from "./themescript/values.js";
export {
  BuildOptionsError,
  ConfigSyntaxError,
  DescriptorSyntaxError,
  errorMessage,
  EvaluationError,
  FileReadError,
  IncludeError,
  ThemeBuildError,
} from "./errors.js";
export { createModuleLogger, LOG_LEVEL_ENV, type LogLevel } from "./logger.js";
export type {
  BuildMessage,
  BuildSeverity,
  ConfigValuePart,
  ContentItem,
  DirectiveKind,
  ResourceManifest,
  ResourceRequest,
  Span,
} from "./types.js";
