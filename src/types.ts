/**
 * Purpose: Declare shared descriptor, manifest, and diagnostic types.
 * Intent: Keep cross-module contracts explicit and stable.
 */

export type BuildSeverity = "error" | "warning";

export interface BuildMessage {
  severity: BuildSeverity;
  code: string;
  message: string;
  file?: string;
}

/** A located slice of source text. `column` counts code points, starting at 1. */
export interface Span {
  offset: number; // UTF-8 byte offset
  line: number;
  column: number;
  fragment: string;
}

export type DirectiveKind =
  | { kind: "include"; path: string }
  | { kind: "resource"; pattern: string; dest: string }
  | { kind: "unknown"; name: string; rest: string };

export type ContentItem =
  | { kind: "newline" }
  | { kind: "code"; text: string }
  | { kind: "comment"; text: string }
  | { kind: "expression"; text: string; span: Span }
  | { kind: "directive"; directive: DirectiveKind; span: Span };

export type ConfigValuePart = { kind: "text"; text: string } | { kind: "expression"; text: string; span: Span };

/** Destination-relative path → source OS path, in registration order. */
export type ResourceManifest = Map<string, string>;

export interface ResourceRequest {
  pattern: string;
  dest: string;
}
