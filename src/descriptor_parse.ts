/**
 * Purpose: Parse theme descriptor text into an ordered content sequence.
 * Intent: Preserve every byte of non-directive text and fail hard on malformed directives.
 */

import {
  isIdentStart,
  scanExpressionSpan,
  scanIdentifier,
  scanStringLiteral,
  type ScanMark,
  SourceScanner,
} from "./descriptor_scan.js";
import { DescriptorSyntaxError } from "./errors.js";
import { globProblem, normalizeRelativePath, relativePathProblem } from "./paths.js";
import type { ContentItem, DirectiveKind, Span } from "./types.js";

function isDirectiveAhead(s: SourceScanner): boolean {
  let i = 0;
  while (s.peek(i) === " " || s.peek(i) === "\t") i++;
  return s.peek(i) === "#" && isIdentStart(s.peek(i + 1));
}

function readPathLiteral(s: SourceScanner): { value: string; span: Span } {
  const lit = scanStringLiteral(s);
  const problem = relativePathProblem(lit.value);
  if (problem) throw new DescriptorSyntaxError("TD_SYNTAX_NON_RELATIVE_PATH", problem, lit.span);
  return lit;
}

/** Trailing blanks and an optional `;` comment may follow a directive's arguments. */
function atDirectiveEnd(s: SourceScanner): boolean {
  s.skipBlanks();
  if (s.peek() === ";") s.advanceToLineEnd();
  if (s.peek() === "\r" && s.peek(1) === "\n") s.advance();
  return s.atEnd || s.peek() === "\n";
}

function parseInclude(s: SourceScanner, keyword: ScanMark): DirectiveKind {
  s.skipBlanks();
  if (s.peek() !== '"') {
    throw new DescriptorSyntaxError("TD_SYNTAX_INCLUDE", 'expected `#include "relative/path"`', s.lineSpanAt(keyword));
  }
  const lit = readPathLiteral(s);
  if (!atDirectiveEnd(s)) {
    throw new DescriptorSyntaxError("TD_SYNTAX_INCLUDE", "unexpected text after #include path", s.lineSpanAt(keyword));
  }
  return { kind: "include", path: normalizeRelativePath(lit.value) };
}

function parseResource(s: SourceScanner, keyword: ScanMark): DirectiveKind {
  const usage = 'expected `#resource "glob"` or `#resource "dest":"glob"`';
  s.skipBlanks();
  if (s.peek() !== '"') throw new DescriptorSyntaxError("TD_SYNTAX_RESOURCE", usage, s.lineSpanAt(keyword));

  const first = readPathLiteral(s);
  let dest = ".";
  let glob = first;

  s.skipBlanks();
  if (s.peek() === ":") {
    s.advance();
    s.skipBlanks();
    if (s.peek() !== '"') throw new DescriptorSyntaxError("TD_SYNTAX_RESOURCE", usage, s.lineSpanAt(keyword));
    dest = normalizeRelativePath(first.value);
    glob = readPathLiteral(s);
  }

  if (!atDirectiveEnd(s)) throw new DescriptorSyntaxError("TD_SYNTAX_RESOURCE", usage, s.lineSpanAt(keyword));

  const problem = globProblem(glob.value);
  if (problem) throw new DescriptorSyntaxError("TD_SYNTAX_INVALID_GLOB", `invalid glob pattern: ${problem}`, glob.span);

  return { kind: "resource", pattern: glob.value, dest };
}

function parseDirective(s: SourceScanner): ContentItem {
  const start = s.mark();
  s.skipBlanks();
  const keyword = s.mark();
  s.advance(); // '#'
  const name = scanIdentifier(s);

  let directive: DirectiveKind;
  if (name === "include") {
    directive = parseInclude(s, keyword);
  } else if (name === "resource") {
    directive = parseResource(s, keyword);
  } else {
    const restStart = s.mark();
    s.advanceToLineEnd();
    directive = { kind: "unknown", name, rest: s.sliceFrom(restStart) };
  }

  return { kind: "directive", directive, span: s.spanFrom(start) };
}

export function parseDescriptor(text: string): ContentItem[] {
  const s = new SourceScanner(text);
  const items: ContentItem[] = [];
  let codeStart: ScanMark | null = null;

  const flushCode = (): void => {
    if (codeStart === null) return;
    const code = s.sliceFrom(codeStart);
    if (code) items.push({ kind: "code", text: code });
    codeStart = null;
  };

  while (!s.atEnd) {
    if (s.atLineStart && isDirectiveAhead(s)) {
      flushCode();
      items.push(parseDirective(s));
      continue;
    }

    const ch = s.peek();
    if (ch === "\n") {
      flushCode();
      s.advance();
      items.push({ kind: "newline" });
      continue;
    }
    if (ch === ";") {
      flushCode();
      const start = s.mark();
      s.advanceToLineEnd();
      items.push({ kind: "comment", text: s.sliceFrom(start) });
      continue;
    }
    if (s.startsWith("#{")) {
      flushCode();
      const { text: exprText, span } = scanExpressionSpan(s);
      items.push({ kind: "expression", text: exprText, span });
      continue;
    }

    if (codeStart === null) codeStart = s.mark();
    s.advance();
  }
  flushCode();

  return items;
}

/** Re-assemble a content sequence into descriptor text; directives are rendered from their spans. */
export function renderContent(items: readonly ContentItem[]): string {
  let out = "";
  for (const item of items) {
    switch (item.kind) {
      case "newline":
        out += "\n";
        break;
      case "code":
      case "comment":
        out += item.text;
        break;
      case "expression":
        out += `#{${item.text}}`;
        break;
      case "directive":
        out += item.span.fragment;
        break;
      default: {
        const _exhaustive: never = item;
        return _exhaustive;
      }
    }
  }
  return out;
}
