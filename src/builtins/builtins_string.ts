/**
 * Purpose: Provide the ThemeScript `string` library subset, including `string.format`.
 * Intent: Operate on UTF-8 bytes where positions matter, matching how lengths are reported.
 */

import { tostring, type ScriptTable, type ScriptValue } from "../themescript/values.js";
import {
  argAt,
  argByte,
  argInt64,
  argInteger,
  argNumber,
  argString,
  makeLibrary,
  multiReturn,
  optInteger,
  optString,
} from "./builtins_shared.js";
import { find, gmatch, gsub, match } from "./patterns.js";

const MAX_STRING_LENGTH = 2 ** 28;

/** 1-based start position; negative counts from the end, out-of-range values clamp to 1. */
function startPosition(pos: number, len: number): number {
  if (pos > 0) return pos;
  if (pos === 0 || pos < -len) return 1;
  return len + pos + 1;
}

/** 1-based end position; negative counts from the end, clamped to [0, len]. */
function endPosition(pos: number, len: number): number {
  if (pos > len) return len;
  if (pos >= 0) return pos;
  if (pos < -len) return 0;
  return len + pos + 1;
}

function sub(args: ScriptValue[]): string {
  const s = argString(args, 0, "sub");
  const start = startPosition(argInteger(args, 1, "sub"), s.length);
  const end = endPosition(optInteger(args, 2, "sub", -1), s.length);
  return start > end ? "" : s.slice(start - 1, end);
}

function asciiCase(s: string, upper: boolean): string {
  return upper ? s.replace(/[a-z]+/g, (m) => m.toUpperCase()) : s.replace(/[A-Z]+/g, (m) => m.toLowerCase());
}

function rep(args: ScriptValue[]): string {
  const s = argString(args, 0, "rep");
  const n = argInteger(args, 1, "rep");
  const sep = optString(args, 2, "rep", "");
  if (n <= 0) return "";
  if ((s.length + sep.length) * n > MAX_STRING_LENGTH) throw new Error("resulting string too large");
  return new Array<string>(n).fill(s).join(sep);
}

function byte(args: ScriptValue[]): ScriptValue[] {
  const s = argString(args, 0, "byte");
  const start = startPosition(optInteger(args, 1, "byte", 1), s.length);
  const end = endPosition(optInteger(args, 2, "byte", start), s.length);
  const codes: ScriptValue[] = [];
  for (let i = start; i <= end; i++) codes.push(BigInt(s.charCodeAt(i - 1)));
  return codes;
}

function char(args: ScriptValue[]): string {
  const codes: number[] = [];
  for (let i = 0; i < args.length; i++) codes.push(argByte(args, i, "char"));
  return String.fromCharCode(...codes);
}

interface FormatSpec {
  flags: string;
  width: number;
  precision: number | null;
  conversion: string;
}

const SPEC_PATTERN = /%([-+ #0]*)(\d*)(?:\.(\d*))?([a-zA-Z%])/y;

function pad(text: string, spec: FormatSpec, numeric: boolean): string {
  if (text.length >= spec.width) return text;
  if (spec.flags.includes("-")) return text.padEnd(spec.width, " ");
  if (numeric && spec.flags.includes("0") && /^[-+ ]?(0x|0X)?[0-9a-fA-F.]/.test(text)) {
    const sign = /^[-+ ]/.test(text) ? text.charAt(0) : "";
    const rest = text.slice(sign.length);
    const prefix = /^0[xX]/.test(rest) ? rest.slice(0, 2) : "";
    const digits = rest.slice(prefix.length);
    return sign + prefix + digits.padStart(spec.width - sign.length - prefix.length, "0");
  }
  return text.padStart(spec.width, " ");
}

function signed(text: string, negative: boolean, flags: string): string {
  if (negative) return `-${text}`;
  if (flags.includes("+")) return `+${text}`;
  if (flags.includes(" ")) return ` ${text}`;
  return text;
}

function formatInteger(n: bigint, spec: FormatSpec): string {
  let digits = (n < 0n ? -n : n).toString();
  if (spec.precision !== null) digits = digits.padStart(spec.precision, "0");
  return signed(digits, n < 0n, spec.flags);
}

function formatHex(n: bigint, spec: FormatSpec): string {
  let digits = BigInt.asUintN(64, n).toString(16);
  if (spec.precision !== null) digits = digits.padStart(spec.precision, "0");
  if (spec.flags.includes("#") && n !== 0n) digits = `0x${digits}`;
  return spec.conversion === "X" ? digits.toUpperCase() : digits;
}

function expWithTwoDigits(text: string): string {
  return text.replace(/e([-+])(\d)$/, "e$10$2");
}

function formatGeneral(v: number, spec: FormatSpec): string {
  const p = spec.precision === null ? 6 : Math.max(spec.precision, 1);
  const abs = Math.abs(v);
  let body: string;
  if (abs === 0) {
    body = (0).toFixed(p - 1);
  } else {
    const exp = Number(abs.toExponential(p - 1).split("e")[1]);
    body = exp < -4 || exp >= p ? expWithTwoDigits(abs.toExponential(p - 1)) : abs.toFixed(p - 1 - exp);
  }
  if (!spec.flags.includes("#")) {
    body = body.replace(/\.0*(e|$)/, "$1").replace(/(\.\d*?)0+(e|$)/, "$1$2");
  }
  return signed(body, v < 0 || Object.is(v, -0), spec.flags);
}

function formatFloat(v: number, spec: FormatSpec): string {
  if (!Number.isFinite(v)) return signed(Number.isNaN(v) ? "nan" : "inf", v < 0, spec.flags);
  if (spec.conversion === "g" || spec.conversion === "G") {
    const out = formatGeneral(v, spec);
    return spec.conversion === "G" ? out.toUpperCase() : out;
  }
  if (spec.conversion === "e" || spec.conversion === "E") {
    const out = signed(expWithTwoDigits(Math.abs(v).toExponential(spec.precision ?? 6)), v < 0, spec.flags);
    return spec.conversion === "E" ? out.toUpperCase() : out;
  }
  const text = Math.abs(v).toFixed(spec.precision ?? 6);
  return signed(text, v < 0, spec.flags);
}

export function formatString(fmt: string, args: ScriptValue[]): string {
  let out = "";
  let argIndex = 0;
  let i = 0;

  while (i < fmt.length) {
    const pct = fmt.indexOf("%", i);
    if (pct === -1) {
      out += fmt.slice(i);
      break;
    }
    out += fmt.slice(i, pct);

    SPEC_PATTERN.lastIndex = pct;
    const m = SPEC_PATTERN.exec(fmt);
    if (!m) throw new Error("invalid conversion at end of format string");
    i = SPEC_PATTERN.lastIndex;

    const spec: FormatSpec = {
      flags: m[1] ?? "",
      width: m[2] ? Number(m[2]) : 0,
      precision: m[3] === undefined ? null : Number(m[3] || "0"),
      conversion: m[4] ?? "",
    };

    switch (spec.conversion) {
      case "%":
        out += "%";
        break;
      case "d":
      case "i":
        out += pad(formatInteger(argInt64(args, argIndex++, "format"), spec), spec, true);
        break;
      case "x":
      case "X":
        out += pad(formatHex(argInt64(args, argIndex++, "format"), spec), spec, true);
        break;
      case "c":
        out += pad(String.fromCharCode(argByte(args, argIndex++, "format")), spec, false);
        break;
      case "f":
      case "F":
      case "e":
      case "E":
      case "g":
      case "G":
        out += pad(formatFloat(argNumber(args, argIndex++, "format"), spec), spec, true);
        break;
      case "s": {
        const text = tostring(argAt(args, argIndex++));
        out += pad(spec.precision === null ? text : text.slice(0, spec.precision), spec, false);
        break;
      }
      default:
        throw new Error(`invalid conversion '%${spec.conversion}' to 'format'`);
    }
  }

  return out;
}

export function makeStringLibrary(): ScriptTable {
  return makeLibrary("string", {
    len: (args) => BigInt(argString(args, 0, "len").length),
    sub,
    upper: (args) => asciiCase(argString(args, 0, "upper"), true),
    lower: (args) => asciiCase(argString(args, 0, "lower"), false),
    rep,
    reverse: (args) => argString(args, 0, "reverse").split("").reverse().join(""),
    byte: multiReturn(byte),
    char,
    format: (args) => formatString(argString(args, 0, "format"), args.slice(1)),
    find: multiReturn(find),
    match: multiReturn(match),
    gmatch: multiReturn(gmatch),
    gsub: multiReturn(gsub),
  });
}
