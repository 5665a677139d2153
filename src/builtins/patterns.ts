/**
 * Purpose: Match ThemeScript patterns (character classes, quantifiers, captures, `%b`, `%f`) and provide find, match, gmatch and gsub.
 * Intent: Work on byte strings with a backtracking matcher whose recursion is bounded.
 */

import { formatNumber, isScriptNumber } from "../themescript/numbers.js";
import { type ScriptValue, ScriptFunction, ScriptTable, tostring, typeName } from "../themescript/values.js";
import { argAt, argString, badArgument, optInteger } from "./builtins_shared.js";

const MAX_CAPTURES = 32;
const MAX_DEPTH = 200;
const CAP_UNFINISHED = -1;
const CAP_POSITION = -2;
const NO_MATCH = -1;
const SPECIALS = /[\^$*+?.([%-]/;

interface Capture {
  init: number;
  /** Captured length, or CAP_UNFINISHED / CAP_POSITION. */
  len: number;
}

function isAlpha(c: number): boolean {
  return (c >= 65 && c <= 90) || (c >= 97 && c <= 122);
}

function isDigit(c: number): boolean {
  return c >= 48 && c <= 57;
}

function isGraph(c: number): boolean {
  return c >= 33 && c <= 126;
}

function classMatches(cls: string, c: number): boolean | null {
  switch (cls.toLowerCase()) {
    case "a":
      return isAlpha(c);
    case "c":
      return c < 32 || c === 127;
    case "d":
      return isDigit(c);
    case "g":
      return isGraph(c);
    case "l":
      return c >= 97 && c <= 122;
    case "p":
      return isGraph(c) && !isAlpha(c) && !isDigit(c);
    case "s":
      return c === 32 || (c >= 9 && c <= 13);
    case "u":
      return c >= 65 && c <= 90;
    case "w":
      return isAlpha(c) || isDigit(c);
    case "x":
      return isDigit(c) || (c >= 65 && c <= 70) || (c >= 97 && c <= 102);
    default:
      return null;
  }
}

/** `%x` class test; an upper-case class letter negates it, any other character matches itself. */
function matchClass(c: number, cls: string): boolean {
  const res = classMatches(cls, c);
  if (res === null) return cls.charCodeAt(0) === c;
  return cls === cls.toUpperCase() ? !res : res;
}

export class PatternMatcher {
  private readonly src: string;
  private readonly pattern: string;
  private level = 0;
  private depth = MAX_DEPTH;
  private readonly capture: Capture[] = [];

  constructor(src: string, pattern: string) {
    this.src = src;
    this.pattern = pattern;
  }

  /** End of a match of the pattern from `p` starting at `s`, or -1. */
  matchAt(s: number, p: number): number {
    this.level = 0;
    this.depth = MAX_DEPTH;
    return this.doMatch(s, p);
  }

  /** Values of the captures, or of the whole match `[s, e)` when the pattern has none and `s` is given. */
  captures(s: number | null, e: number): ScriptValue[] {
    const n = this.level === 0 && s !== null ? 1 : this.level;
    const out: ScriptValue[] = [];
    for (let i = 0; i < n; i++) out.push(this.oneCapture(i, s ?? 0, e));
    return out;
  }

  oneCapture(i: number, s: number, e: number): ScriptValue {
    if (i >= this.level) {
      if (i !== 0) throw new Error(`invalid capture index %${i + 1}`);
      return this.src.slice(s, e);
    }
    const cap = this.capture[i];
    if (!cap || cap.len === CAP_UNFINISHED) throw new Error("unfinished capture");
    if (cap.len === CAP_POSITION) return BigInt(cap.init + 1);
    return this.src.slice(cap.init, cap.init + cap.len);
  }

  private classEnd(p: number): number {
    const pat = this.pattern;
    const ch = pat.charAt(p++);
    if (ch === "%") {
      if (p >= pat.length) throw new Error("malformed pattern (ends with '%')");
      return p + 1;
    }
    if (ch === "[") {
      if (pat.charAt(p) === "^") p++;
      // The first character after `[` or `[^` is a member even when it is `]`.
      do {
        if (p >= pat.length) throw new Error("malformed pattern (missing ']')");
        const c = pat.charAt(p++);
        if (c === "%" && p < pat.length) p++;
      } while (pat.charAt(p) !== "]");
      return p + 1;
    }
    return p;
  }

  /** `p` is the `[`, `ec` the closing `]`. */
  private matchBracketClass(c: number, p: number, ec: number): boolean {
    const pat = this.pattern;
    let sig = true;
    if (pat.charAt(p + 1) === "^") {
      sig = false;
      p++;
    }
    while (++p < ec) {
      if (pat.charAt(p) === "%") {
        p++;
        if (matchClass(c, pat.charAt(p))) return sig;
      } else if (pat.charAt(p + 1) === "-" && p + 2 < ec) {
        p += 2;
        if (pat.charCodeAt(p - 2) <= c && c <= pat.charCodeAt(p)) return sig;
      } else if (pat.charCodeAt(p) === c) {
        return sig;
      }
    }
    return !sig;
  }

  private singleMatch(s: number, p: number, ep: number): boolean {
    if (s >= this.src.length) return false;
    const c = this.src.charCodeAt(s);
    switch (this.pattern.charAt(p)) {
      case ".":
        return true;
      case "%":
        return matchClass(c, this.pattern.charAt(p + 1));
      case "[":
        return this.matchBracketClass(c, p, ep - 1);
      default:
        return this.pattern.charCodeAt(p) === c;
    }
  }

  private doMatch(s: number, p: number): number {
    if (this.depth-- === 0) throw new Error("pattern too complex");
    try {
      return this.matchLoop(s, p);
    } finally {
      this.depth++;
    }
  }

  private matchLoop(s: number, p: number): number {
    const pat = this.pattern;
    while (true) {
      if (p >= pat.length) return s;
      const ch = pat.charAt(p);

      if (ch === "(") {
        return pat.charAt(p + 1) === ")" ? this.startCapture(s, p + 2, CAP_POSITION) : this.startCapture(s, p + 1, CAP_UNFINISHED);
      }
      if (ch === ")") return this.endCapture(s, p + 1);
      if (ch === "$" && p + 1 === pat.length) return s === this.src.length ? s : NO_MATCH;
      if (ch === "%") {
        const next = pat.charAt(p + 1);
        if (next === "b") {
          s = this.matchBalance(s, p + 2);
          if (s === NO_MATCH) return NO_MATCH;
          p += 4;
          continue;
        }
        if (next === "f") {
          p += 2;
          if (pat.charAt(p) !== "[") throw new Error("missing '[' after '%f' in pattern");
          const ep = this.classEnd(p);
          const prev = s === 0 ? 0 : this.src.charCodeAt(s - 1);
          const cur = s < this.src.length ? this.src.charCodeAt(s) : 0;
          if (this.matchBracketClass(prev, p, ep - 1) || !this.matchBracketClass(cur, p, ep - 1)) return NO_MATCH;
          p = ep;
          continue;
        }
        if (/^[0-9]$/.test(next)) {
          s = this.matchCapture(s, next);
          if (s === NO_MATCH) return NO_MATCH;
          p += 2;
          continue;
        }
      }

      const ep = this.classEnd(p);
      const quantifier = pat.charAt(ep);
      if (!this.singleMatch(s, p, ep)) {
        // `*`, `?` and `-` accept zero occurrences.
        if (quantifier === "*" || quantifier === "?" || quantifier === "-") {
          p = ep + 1;
          continue;
        }
        return NO_MATCH;
      }
      switch (quantifier) {
        case "?": {
          const res = this.doMatch(s + 1, ep + 1);
          if (res !== NO_MATCH) return res;
          p = ep + 1;
          continue;
        }
        case "+":
          return this.maxExpand(s + 1, p, ep);
        case "*":
          return this.maxExpand(s, p, ep);
        case "-":
          return this.minExpand(s, p, ep);
        default:
          s++;
          p = ep;
      }
    }
  }

  private maxExpand(s: number, p: number, ep: number): number {
    let i = 0;
    while (this.singleMatch(s + i, p, ep)) i++;
    for (; i >= 0; i--) {
      const res = this.doMatch(s + i, ep + 1);
      if (res !== NO_MATCH) return res;
    }
    return NO_MATCH;
  }

  private minExpand(s: number, p: number, ep: number): number {
    while (true) {
      const res = this.doMatch(s, ep + 1);
      if (res !== NO_MATCH) return res;
      if (!this.singleMatch(s, p, ep)) return NO_MATCH;
      s++;
    }
  }

  private startCapture(s: number, p: number, what: number): number {
    if (this.level >= MAX_CAPTURES) throw new Error("too many captures");
    this.capture[this.level] = { init: s, len: what };
    this.level++;
    const res = this.doMatch(s, p);
    if (res === NO_MATCH) this.level--;
    return res;
  }

  private endCapture(s: number, p: number): number {
    const cap = this.captureToClose();
    cap.len = s - cap.init;
    const res = this.doMatch(s, p);
    if (res === NO_MATCH) cap.len = CAP_UNFINISHED;
    return res;
  }

  private captureToClose(): Capture {
    for (let level = this.level - 1; level >= 0; level--) {
      const cap = this.capture[level];
      if (cap && cap.len === CAP_UNFINISHED) return cap;
    }
    throw new Error("invalid pattern capture");
  }

  private matchBalance(s: number, p: number): number {
    const pat = this.pattern;
    if (p + 1 >= pat.length) throw new Error("malformed pattern (missing arguments to '%b')");
    const open = pat.charAt(p);
    const close = pat.charAt(p + 1);
    if (s >= this.src.length || this.src.charAt(s) !== open) return NO_MATCH;
    let depth = 1;
    while (++s < this.src.length) {
      const c = this.src.charAt(s);
      if (c === close) {
        if (--depth === 0) return s + 1;
      } else if (c === open) {
        depth++;
      }
    }
    return NO_MATCH;
  }

  private matchCapture(s: number, digit: string): number {
    const index = Number(digit) - 1;
    const cap = this.capture[index];
    if (index < 0 || index >= this.level || !cap || cap.len === CAP_UNFINISHED) {
      throw new Error(`invalid capture index %${index + 1}`);
    }
    if (cap.len < 0) return NO_MATCH;
    const captured = this.src.slice(cap.init, cap.init + cap.len);
    return this.src.startsWith(captured, s) ? s + cap.len : NO_MATCH;
  }
}

/** 1-based start position; negative counts from the end, out-of-range values clamp to 1. */
function startPosition(pos: number, len: number): number {
  if (pos > 0) return pos;
  if (pos === 0 || pos < -len) return 1;
  return len + pos + 1;
}

function findOrMatch(args: ScriptValue[], find: boolean): ScriptValue[] {
  const fname = find ? "find" : "match";
  const src = argString(args, 0, fname);
  const pattern = argString(args, 1, fname);
  const init = startPosition(optInteger(args, 2, fname, 1), src.length);
  if (init > src.length + 1) return [null];

  const plain = argAt(args, 3);
  if (find && ((plain !== null && plain !== false) || !SPECIALS.test(pattern))) {
    const at = src.indexOf(pattern, init - 1);
    return at === -1 ? [null] : [BigInt(at + 1), BigInt(at + pattern.length)];
  }

  const matcher = new PatternMatcher(src, pattern);
  const anchor = pattern.startsWith("^");
  const p = anchor ? 1 : 0;
  for (let s = init - 1; s <= src.length; s++) {
    const e = matcher.matchAt(s, p);
    if (e !== NO_MATCH) {
      return find ? [BigInt(s + 1), BigInt(e), ...matcher.captures(null, e)] : matcher.captures(s, e);
    }
    if (anchor) break;
  }
  return [null];
}

export function find(args: ScriptValue[]): ScriptValue[] {
  return findOrMatch(args, true);
}

export function match(args: ScriptValue[]): ScriptValue[] {
  return findOrMatch(args, false);
}

export function gmatch(args: ScriptValue[]): ScriptValue[] {
  const src = argString(args, 0, "gmatch");
  const pattern = argString(args, 1, "gmatch");
  let pos = startPosition(optInteger(args, 2, "gmatch", 1), src.length) - 1;
  let lastMatch = NO_MATCH;
  const matcher = new PatternMatcher(src, pattern);

  const step = new ScriptFunction("gmatch_step", () => {
    for (; pos <= src.length; pos++) {
      const e = matcher.matchAt(pos, 0);
      // An empty match right after the previous match is skipped.
      if (e !== NO_MATCH && e !== lastMatch) {
        const start = pos;
        pos = lastMatch = e;
        return matcher.captures(start, e);
      }
    }
    return [null];
  });
  return [step];
}

/** `%0` is the whole match, `%1`-`%9` captures, `%%` a percent sign. */
function expandReplacement(matcher: PatternMatcher, repl: string, s: number, e: number, src: string): string {
  let out = "";
  for (let i = 0; i < repl.length; i++) {
    const ch = repl.charAt(i);
    if (ch !== "%") {
      out += ch;
      continue;
    }
    const next = repl.charAt(++i);
    if (next === "%") out += "%";
    else if (next === "0") out += src.slice(s, e);
    else if (/^[1-9]$/.test(next)) out += tostring(matcher.oneCapture(Number(next) - 1, s, e));
    else throw new Error("invalid use of '%' in replacement string");
  }
  return out;
}

function replacementFor(matcher: PatternMatcher, repl: ScriptValue, s: number, e: number, src: string): string {
  let value: ScriptValue;
  if (repl instanceof ScriptTable) value = repl.get(matcher.oneCapture(0, s, e));
  else if (repl instanceof ScriptFunction) value = repl.call(matcher.captures(s, e))[0] ?? null;
  else return expandReplacement(matcher, tostring(repl), s, e, src);

  if (value === null || value === false) return src.slice(s, e);
  if (typeof value === "string") return value;
  if (isScriptNumber(value)) return formatNumber(value);
  throw new Error(`invalid replacement value (a ${typeName(value)})`);
}

export function gsub(args: ScriptValue[]): ScriptValue[] {
  const src = argString(args, 0, "gsub");
  const pattern = argString(args, 1, "gsub");
  const repl = argAt(args, 2);
  if (!(typeof repl === "string" || isScriptNumber(repl) || repl instanceof ScriptTable || repl instanceof ScriptFunction)) {
    throw badArgument(2, "gsub", `string/function/table expected, got ${repl === null ? "no value" : typeName(repl)}`);
  }
  const maxReplacements = optInteger(args, 3, "gsub", src.length + 1);

  const matcher = new PatternMatcher(src, pattern);
  const anchor = pattern.startsWith("^");
  const p = anchor ? 1 : 0;
  let s = 0;
  let lastMatch = NO_MATCH;
  let count = 0;
  let out = "";
  while (count < maxReplacements) {
    const e = matcher.matchAt(s, p);
    if (e !== NO_MATCH && e !== lastMatch) {
      count++;
      out += replacementFor(matcher, repl, s, e, src);
      s = lastMatch = e;
    } else if (s < src.length) {
      out += src.charAt(s++);
    } else {
      break;
    }
    if (anchor) break;
  }
  return [out + src.slice(s), BigInt(count)];
}
