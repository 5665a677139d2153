/**
 * Purpose: Define the structured errors raised by every build stage.
 * Intent: Give each failure a stable code so callers can format and classify it.
 */

import type { Span } from "./types.js";

export class ThemeBuildError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ThemeBuildError";
    this.code = code;
  }
}

export type DescriptorSyntaxCode =
  | "TD_SYNTAX_UNTERMINATED_STRING"
  | "TD_SYNTAX_INVALID_ESCAPE"
  | "TD_SYNTAX_UNTERMINATED_EXPRESSION"
  | "TD_SYNTAX_INCLUDE"
  | "TD_SYNTAX_RESOURCE"
  | "TD_SYNTAX_NON_RELATIVE_PATH"
  | "TD_SYNTAX_INVALID_GLOB";

export class DescriptorSyntaxError extends ThemeBuildError {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly fragment: string;
  file?: string;

  constructor(code: DescriptorSyntaxCode, message: string, at: Span) {
    super(code, `${message} at line ${at.line}, column ${at.column}: \`${at.fragment}\``);
    this.name = "DescriptorSyntaxError";
    this.offset = at.offset;
    this.line = at.line;
    this.column = at.column;
    this.fragment = at.fragment;
  }

  withFile(file: string): this {
    this.file = file;
    this.message = `${file}: ${this.message}`;
    return this;
  }
}

export class ConfigSyntaxError extends ThemeBuildError {
  readonly line: number;

  constructor(message: string, line: number, file?: string) {
    super("TD_CONFIG_SYNTAX", `${file ? `${file}: ` : ""}${message} (line ${line})`);
    this.name = "ConfigSyntaxError";
    this.line = line;
  }
}

export class FileReadError extends ThemeBuildError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("TD_READ", `failed to read file \`${path}\`: ${detail}`, { cause });
    this.name = "FileReadError";
    this.path = path;
  }
}

export interface EvaluationSite {
  file: string;
  line: number;
  column: number;
  source: string;
}

export class EvaluationError extends ThemeBuildError {
  readonly site: EvaluationSite;

  constructor(code: "TD_EVAL" | "TD_EVAL_UNSUPPORTED_VALUE", site: EvaluationSite, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      code,
      `failed to evaluate \`${site.source.trim()}\` (${site.file}, line ${site.line}, column ${site.column}): ${detail}`,
      { cause }
    );
    this.name = "EvaluationError";
    this.site = site;
  }
}

export type IncludeErrorCode = "TD_INCLUDE_CYCLE" | "TD_INCLUDE_OUTSIDE_ROOT" | "TD_RESOURCE_OUTSIDE_ROOT";

export class IncludeError extends ThemeBuildError {
  readonly path: string;

  constructor(code: IncludeErrorCode, message: string, path: string) {
    super(code, message);
    this.name = "IncludeError";
    this.path = path;
  }
}

export class BuildOptionsError extends ThemeBuildError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("TD_OPTIONS", `invalid build options: ${issues.join("; ")}`);
    this.name = "BuildOptionsError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
