/**
 * Purpose: Tokenize ThemeScript source.
 * Intent: Produce a position-annotated token stream with lookahead, marks, and resets.
 */

import { ThemeBuildError } from "../errors.js";
import { parseNumeral, type ScriptNumber } from "./numbers.js";
import { toByteString } from "./values.js";

export class ThemeScriptSyntaxError extends ThemeBuildError {
  readonly pos: number;
  line?: number;
  column?: number;

  constructor(message: string, pos: number) {
    super("TD_SCRIPT_SYNTAX", message);
    this.name = "ThemeScriptSyntaxError";
    this.pos = pos;
  }

  /** Resolve `pos` against the chunk it came from and prefix the message with the location. */
  locate(source: string, chunkName: string): this {
    const { line, column } = lineColFromOffset(source, this.pos);
    this.line = line;
    this.column = column;
    this.message = `${chunkName}:${line}:${column}: ${this.message}`;
    return this;
  }
}

export function lineColFromOffset(text: string, offset: number): { line: number; column: number } {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let column = 1;
  for (let i = 0; i < clamped; i++) {
    if (text[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

export const KEYWORDS = [
  "and",
  "break",
  "do",
  "else",
  "elseif",
  "end",
  "false",
  "for",
  "function",
  "if",
  "in",
  "local",
  "nil",
  "not",
  "or",
  "repeat",
  "return",
  "then",
  "true",
  "until",
  "while",
] as const;

export type Keyword = (typeof KEYWORDS)[number];

const keywordSet: ReadonlySet<string> = new Set(KEYWORDS);

function isKeyword(word: string): word is Keyword {
  return keywordSet.has(word);
}

// Longest first, so `...` wins over `..` and `..` over `.`.
const PUNCTUATORS = [
  "...",
  "..",
  "//",
  "<<",
  ">>",
  "==",
  "~=",
  "<=",
  ">=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "^",
  "#",
  "&",
  "~",
  "|",
  "<",
  ">",
  "=",
  "(",
  ")",
  "{",
  "}",
  "[",
  "]",
  ";",
  ":",
  ",",
  ".",
] as const;

export type Punct = (typeof PUNCTUATORS)[number];

export type Token =
  | { type: "eof"; pos: number }
  | { type: "name"; value: string; pos: number }
  | { type: "keyword"; value: Keyword; pos: number }
  | { type: "number"; value: ScriptNumber; pos: number }
  | { type: "string"; value: string; pos: number }
  | { type: "punct"; value: Punct; pos: number };

const SIMPLE_ESCAPES: Record<string, string> = {
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
  "\\": "\\",
  '"': '"',
  "'": "'",
  "\n": "\n",
};

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isNameStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isNamePart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

class Lexer {
  private readonly src: string;
  private i = 0;

  constructor(src: string) {
    this.src = src;
  }

  tokenize(): Token[] {
    const out: Token[] = [];
    while (true) {
      this.skipTrivia();
      if (this.i >= this.src.length) {
        out.push({ type: "eof", pos: this.i });
        return out;
      }
      out.push(this.readToken());
    }
  }

  private skipTrivia(): void {
    while (this.i < this.src.length) {
      const ch = this.src[this.i];
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n" || ch === "\f" || ch === "\v") {
        this.i++;
        continue;
      }
      if (ch === "-" && this.src[this.i + 1] === "-") {
        this.i += 2;
        const level = this.longBracketLevel();
        if (level !== null) {
          this.readLongBracket(level, this.i - 2, "comment");
        } else {
          while (this.i < this.src.length && this.src[this.i] !== "\n") this.i++;
        }
        continue;
      }
      return;
    }
  }

  /** Level of a `[==[` opener at the cursor, or null when there is none. */
  private longBracketLevel(): number | null {
    if (this.src[this.i] !== "[") return null;
    let j = this.i + 1;
    while (this.src[j] === "=") j++;
    return this.src[j] === "[" ? j - this.i - 1 : null;
  }

  private readLongBracket(level: number, start: number, what: string): string {
    this.i += level + 2;
    if (this.src[this.i] === "\r") this.i++;
    if (this.src[this.i] === "\n") this.i++;
    const close = `]${"=".repeat(level)}]`;
    const end = this.src.indexOf(close, this.i);
    if (end === -1) throw new ThemeScriptSyntaxError(`unfinished long ${what}`, start);
    const body = this.src.slice(this.i, end);
    this.i = end + close.length;
    return body;
  }

  private readToken(): Token {
    const start = this.i;
    const ch = this.src[this.i];

    if (isNameStart(ch)) {
      while (isNamePart(this.src[this.i])) this.i++;
      const word = this.src.slice(start, this.i);
      return isKeyword(word) ? { type: "keyword", value: word, pos: start } : { type: "name", value: word, pos: start };
    }

    if (isDigit(ch) || (ch === "." && isDigit(this.src[this.i + 1]))) {
      return { type: "number", value: this.readNumber(), pos: start };
    }

    if (ch === '"' || ch === "'") {
      return { type: "string", value: this.readShortString(ch), pos: start };
    }

    if (ch === "[") {
      const level = this.longBracketLevel();
      if (level !== null) {
        return { type: "string", value: toByteString(this.readLongBracket(level, start, "string")), pos: start };
      }
    }

    for (const p of PUNCTUATORS) {
      if (this.src.startsWith(p, this.i)) {
        this.i += p.length;
        return { type: "punct", value: p, pos: start };
      }
    }

    throw new ThemeScriptSyntaxError(`unexpected symbol near '${ch ?? ""}'`, start);
  }

  /** Scan the longest numeral-looking run, then validate it as a whole. */
  private readNumber(): ScriptNumber {
    const start = this.i;
    const hex = this.src[this.i] === "0" && (this.src[this.i + 1] === "x" || this.src[this.i + 1] === "X");
    const exponentMarks = hex ? "pP" : "eE";
    if (hex) this.i += 2;

    while (this.i < this.src.length) {
      const ch = this.src.charAt(this.i);
      if (exponentMarks.includes(ch) && (this.src[this.i + 1] === "+" || this.src[this.i + 1] === "-")) {
        this.i += 2;
      } else if (isNamePart(ch) || ch === ".") {
        this.i++;
      } else {
        break;
      }
    }

    const text = this.src.slice(start, this.i);
    const value = parseNumeral(text);
    if (value === null) throw new ThemeScriptSyntaxError(`malformed number near '${text}'`, start);
    return value;
  }

  private readShortString(quote: string): string {
    const start = this.i;
    this.i++;
    let out = "";

    while (true) {
      const ch = this.src[this.i];
      if (ch === undefined || ch === "\n") throw new ThemeScriptSyntaxError("unfinished string", start);
      if (ch === quote) {
        this.i++;
        return out;
      }
      if (ch !== "\\") {
        const cp = this.src.codePointAt(this.i) ?? 0;
        const char = String.fromCodePoint(cp);
        out += toByteString(char);
        this.i += char.length;
        continue;
      }

      const esc = this.src[this.i + 1];
      const escPos = this.i;
      this.i += 2;
      if (esc === undefined) throw new ThemeScriptSyntaxError("unfinished string", start);

      const simple = SIMPLE_ESCAPES[esc];
      if (simple !== undefined) {
        out += simple;
        continue;
      }
      if (esc === "z") {
        while (/\s/.test(this.src[this.i] ?? "")) this.i++;
        continue;
      }
      if (esc === "x") {
        const hex = this.src.slice(this.i, this.i + 2);
        if (!/^[0-9a-fA-F]{2}$/.test(hex)) throw new ThemeScriptSyntaxError("hexadecimal digit expected", escPos);
        out += String.fromCharCode(parseInt(hex, 16));
        this.i += 2;
        continue;
      }
      if (esc === "u") {
        const m = /^\{([0-9a-fA-F]+)\}/.exec(this.src.slice(this.i));
        if (!m || m[1] === undefined) throw new ThemeScriptSyntaxError("missing '{' or '}' in \\u{xxxx}", escPos);
        const cp = parseInt(m[1], 16);
        if (cp > 0x10ffff) throw new ThemeScriptSyntaxError("UTF-8 value too large", escPos);
        out += toByteString(String.fromCodePoint(cp));
        this.i += m[0].length;
        continue;
      }
      if (isDigit(esc)) {
        let digits = esc;
        while (digits.length < 3 && isDigit(this.src[this.i])) digits += this.src[this.i++];
        const code = Number(digits);
        if (code > 255) throw new ThemeScriptSyntaxError("decimal escape too large", escPos);
        out += String.fromCharCode(code);
        continue;
      }
      throw new ThemeScriptSyntaxError(`invalid escape sequence '\\${esc}'`, escPos);
    }
  }
}

export class Tokenizer {
  private readonly tokens: Token[];
  private index = 0;

  constructor(src: string) {
    this.tokens = new Lexer(src).tokenize();
  }

  peek(ahead = 0): Token {
    const last = this.tokens[this.tokens.length - 1];
    const tok = this.tokens[this.index + ahead] ?? last;
    if (!tok) throw new ThemeScriptSyntaxError("empty token stream", 0);
    return tok;
  }

  next(): Token {
    const tok = this.peek();
    if (this.index < this.tokens.length - 1) this.index++;
    return tok;
  }

  mark(): number {
    return this.index;
  }

  reset(mark: number): void {
    this.index = mark;
  }
}
