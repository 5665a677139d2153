/**
 * Purpose: Provide a position-tracking cursor and the shared lexical scanners.
 * Intent: Every span carries byte offset, line, and code-point column without re-scanning.
 */

import { DescriptorSyntaxError } from "./errors.js";
import type { Span } from "./types.js";

export interface ScanMark {
  pos: number; // UTF-16 index into the source
  offset: number; // UTF-8 byte offset
  line: number;
  column: number;
}

function utf8Width(cp: number): number {
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

export class SourceScanner {
  readonly src: string;
  private pos = 0;
  private offset = 0;
  private line = 1;
  private column = 1;
  private lineStart = 0;

  constructor(src: string) {
    this.src = src;
  }

  get atEnd(): boolean {
    return this.pos >= this.src.length;
  }

  get index(): number {
    return this.pos;
  }

  /** True when the cursor sits at the first character of a physical line. */
  get atLineStart(): boolean {
    return this.pos === this.lineStart;
  }

  peek(ahead = 0): string | undefined {
    return this.src[this.pos + ahead];
  }

  startsWith(text: string): boolean {
    return this.src.startsWith(text, this.pos);
  }

  advance(count = 1): void {
    for (let i = 0; i < count && this.pos < this.src.length; i++) {
      const cp = this.src.codePointAt(this.pos) ?? 0;
      this.pos += cp > 0xffff ? 2 : 1;
      this.offset += utf8Width(cp);
      if (cp === 0x0a) {
        this.line++;
        this.column = 1;
        this.lineStart = this.pos;
      } else {
        this.column++;
      }
    }
  }

  skipBlanks(): void {
    while (this.peek() === " " || this.peek() === "\t") this.advance();
  }

  advanceToLineEnd(): void {
    while (!this.atEnd && this.peek() !== "\n") this.advance();
  }

  mark(): ScanMark {
    return { pos: this.pos, offset: this.offset, line: this.line, column: this.column };
  }

  reset(mark: ScanMark): void {
    this.pos = mark.pos;
    this.offset = mark.offset;
    this.line = mark.line;
    this.column = mark.column;
    this.lineStart = mark.pos === 0 ? 0 : this.src.lastIndexOf("\n", mark.pos - 1) + 1;
  }

  sliceFrom(mark: ScanMark): string {
    return this.src.slice(mark.pos, this.pos);
  }

  spanFrom(mark: ScanMark): Span {
    return { offset: mark.offset, line: mark.line, column: mark.column, fragment: this.sliceFrom(mark) };
  }

  /** Span from `mark` to the end of its physical line, for error reports. */
  lineSpanAt(mark: ScanMark): Span {
    const nl = this.src.indexOf("\n", mark.pos);
    const end = nl === -1 ? this.src.length : nl;
    return { offset: mark.offset, line: mark.line, column: mark.column, fragment: this.src.slice(mark.pos, end).trimEnd() };
  }
}

export function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

export function isIdentPart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

export function scanIdentifier(s: SourceScanner): string {
  const start = s.mark();
  while (isIdentPart(s.peek())) s.advance();
  return s.sliceFrom(start);
}

/** Scan a JSON-style `"…"` literal at the cursor and return its decoded value and raw span. */
export function scanStringLiteral(s: SourceScanner): { value: string; span: Span } {
  const start = s.mark();
  s.advance(); // opening quote
  while (true) {
    const ch = s.peek();
    if (ch === undefined || ch === "\n") {
      throw new DescriptorSyntaxError("TD_SYNTAX_UNTERMINATED_STRING", "unterminated string literal", s.lineSpanAt(start));
    }
    if (ch === "\\") {
      const next = s.peek(1);
      if (next === undefined || next === "\n") {
        throw new DescriptorSyntaxError("TD_SYNTAX_UNTERMINATED_STRING", "unterminated string literal", s.lineSpanAt(start));
      }
      s.advance(2);
      continue;
    }
    s.advance();
    if (ch === '"') break;
  }

  const span = s.spanFrom(start);
  let decoded: unknown;
  try {
    decoded = JSON.parse(span.fragment);
  } catch {
    throw new DescriptorSyntaxError("TD_SYNTAX_INVALID_ESCAPE", "invalid escape sequence in string literal", span);
  }
  if (typeof decoded !== "string") {
    throw new DescriptorSyntaxError("TD_SYNTAX_INVALID_ESCAPE", "invalid string literal", span);
  }
  return { value: decoded, span };
}

function skipQuoted(s: SourceScanner, quote: string): void {
  s.advance();
  while (!s.atEnd) {
    const ch = s.peek();
    if (ch === "\n") return;
    if (ch === "\\") {
      s.advance(2);
      continue;
    }
    s.advance();
    if (ch === quote) return;
  }
}

/**
 * Scan a `#{ … }` span at the cursor. Braces nest; quoted strings inside the
 * span are skipped so their braces do not count.
 */
export function scanExpressionSpan(s: SourceScanner): { text: string; span: Span } {
  const open = s.mark();
  s.advance(2);
  const inner = s.mark();
  let depth = 1;

  while (!s.atEnd) {
    const ch = s.peek();
    if (ch === '"' || ch === "'") {
      skipQuoted(s, ch);
      continue;
    }
    if (ch === "{") depth++;
    if (ch === "}") {
      depth--;
      if (depth === 0) {
        const span = s.spanFrom(inner);
        s.advance();
        return { text: span.fragment, span };
      }
    }
    s.advance();
  }

  throw new DescriptorSyntaxError("TD_SYNTAX_UNTERMINATED_EXPRESSION", "unterminated expression", s.lineSpanAt(open));
}
