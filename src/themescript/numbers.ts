/**
 * Purpose: Represent ThemeScript numbers as two subtypes: 64-bit integers (bigint) and floats (number).
 * Intent: Keep integer results exact through arithmetic, bitwise operators, and output.
 */

export type ScriptNumber = number | bigint;

export const MAX_INTEGER = (1n << 63n) - 1n;
export const MIN_INTEGER = -(1n << 63n);

const TWO_POW_63 = 2 ** 63;

export function isScriptNumber(v: unknown): v is ScriptNumber {
  return typeof v === "number" || typeof v === "bigint";
}

/** Wrap around to the signed 64-bit range. */
export function wrapInteger(b: bigint): bigint {
  return BigInt.asIntN(64, b);
}

export function toFloat(n: ScriptNumber): number {
  return typeof n === "bigint" ? Number(n) : n;
}

/** The integer a float represents exactly, or null when it has a fraction or is out of range. */
export function floatToInteger(f: number): bigint | null {
  if (!Number.isInteger(f) || f < -TWO_POW_63 || f >= TWO_POW_63) return null;
  return BigInt(f);
}

/** Integer view of a number, or null when it has no exact integer representation. */
export function toInteger(n: ScriptNumber): bigint | null {
  return typeof n === "bigint" ? n : floatToInteger(n);
}

/** Host numbers enter as integers when integral and in range, floats otherwise. */
export function fromHostNumber(n: number): ScriptNumber {
  return floatToInteger(n) ?? n;
}

/** -1, 0 or 1; NaN when unordered. Mixed subtypes compare by mathematical value. */
export function compareNumbers(a: ScriptNumber, b: ScriptNumber): number {
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "number" && typeof b === "number") return a < b ? -1 : a > b ? 1 : a === b ? 0 : NaN;
  if (typeof a === "bigint" && typeof b === "number") return -compareFloatWithInteger(b, a);
  if (typeof a === "number" && typeof b === "bigint") return compareFloatWithInteger(a, b);
  return NaN;
}

function compareFloatWithInteger(f: number, i: bigint): number {
  if (Number.isNaN(f)) return NaN;
  if (f === Infinity) return 1;
  if (f === -Infinity) return -1;
  const floor = BigInt(Math.floor(f));
  if (floor < i) return -1;
  if (floor > i) return 1;
  return Number.isInteger(f) ? 0 : 1;
}

const DECIMAL_NUMERAL = /^(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const HEX_NUMERAL = /^0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?(?:[pP]([-+]?\d+))?$/;

function parseUnsigned(text: string): ScriptNumber | null {
  const hex = HEX_NUMERAL.exec(text);
  if (hex) {
    const [, intDigits = "", fracDigits, exponent] = hex;
    if (intDigits === "" && !fracDigits) return null;
    if (fracDigits === undefined && exponent === undefined) return wrapInteger(BigInt(`0x${intDigits}`));
    let value = intDigits === "" ? 0 : parseInt(intDigits, 16);
    const frac = fracDigits ?? "";
    for (let i = 0; i < frac.length; i++) value += parseInt(frac.charAt(i), 16) / 16 ** (i + 1);
    return value * 2 ** Number(exponent ?? "0");
  }

  if (!DECIMAL_NUMERAL.test(text)) return null;
  if (/^\d+$/.test(text)) {
    const big = BigInt(text);
    // Decimal integers that overflow become floats.
    return big <= MAX_INTEGER ? big : Number(text);
  }
  return Number(text);
}

/** Read a numeral as the language does: surrounding whitespace and a sign are allowed. */
export function parseNumeral(s: string): ScriptNumber | null {
  const trimmed = s.trim();
  const negative = trimmed.startsWith("-");
  const body = /^[-+]/.test(trimmed) ? trimmed.slice(1) : trimmed;
  const value = parseUnsigned(body);
  if (value === null || !negative) return value;
  return typeof value === "bigint" ? wrapInteger(-value) : -value;
}

function stripZeros(text: string): string {
  return text.includes(".") ? text.replace(/\.?0+$/, "") : text;
}

/** C `%.<precision>g` for a finite float, without flags. */
export function formatGeneral(n: number, precision: number): string {
  if (n === 0) return Object.is(n, -0) ? "-0" : "0";
  const [mantissa = "0", expText = "0"] = n.toExponential(precision - 1).split("e");
  const exp = Number(expText);
  if (exp < -4 || exp >= precision) {
    const sign = exp < 0 ? "-" : "+";
    return `${stripZeros(mantissa)}e${sign}${String(Math.abs(exp)).padStart(2, "0")}`;
  }
  return stripZeros(n.toFixed(precision - 1 - exp));
}

/**
 * Text for `tostring` and concatenation: integers in full, floats with 14
 * significant digits and a `.0` when they would otherwise read as integers.
 */
export function formatNumber(n: ScriptNumber): string {
  if (typeof n === "bigint") return n.toString();
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  const text = formatGeneral(n, 14);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

function expandExponent(text: string): string {
  const m = /^(-?)(\d+)(?:\.(\d+))?e([-+]\d+)$/.exec(text);
  if (!m) return text;
  const [, sign = "", intDigits = "", fracDigits = "", expText = "0"] = m;
  const digits = intDigits + fracDigits;
  const point = intDigits.length + Number(expText);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + "0".repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Output text: integers exactly, floats as the shortest text that reads back
 * to the same value, never in exponent form.
 */
export function formatNumberExact(n: ScriptNumber): string {
  if (typeof n === "bigint") return n.toString();
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0";
  return expandExponent(String(n));
}
