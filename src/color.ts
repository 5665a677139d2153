/**
 * Purpose: Model 3- and 4-channel colors and their legacy integer encodings.
 * Intent: Keep channel arithmetic checked and every packed encoding bit-exact.
 */

import { ThemeBuildError } from "./errors.js";

export type ColorErrorCode =
  | "TD_COLOR_INVALID_VALUE"
  | "TD_COLOR_OUT_OF_BOUNDS"
  | "TD_COLOR_INVALID_CHANNELS"
  | "TD_COLOR_INVALID_BYTE"
  | "TD_COLOR_NEGATIVE_RGBA"
  | "TD_COLOR_CHANNEL_MISMATCH"
  | "TD_COLOR_OVERFLOW"
  | "TD_COLOR_UNDERFLOW";

export class ColorError extends ThemeBuildError {
  constructor(code: ColorErrorCode, message: string) {
    super(code, message);
    this.name = "ColorError";
  }
}

export type ColorKind = "rgb" | "rgba";

const MAX_RGB = 0xffffff;
const MAX_RGBA = 0xffffffff;
const NEGATIVE_OFFSET = 0x1000000;

function assertByte(v: number, label: string): number {
  if (!Number.isInteger(v) || v < 0 || v > 255) {
    throw new ColorError("TD_COLOR_INVALID_BYTE", `${label} \`${v}\` must be an integer between 0 and 255`);
  }
  return v;
}

function hexByte(v: number): string {
  return v.toString(16).toUpperCase().padStart(2, "0");
}

export class Color {
  readonly kind: ColorKind;
  readonly channels: readonly number[];

  private constructor(kind: ColorKind, channels: number[]) {
    this.kind = kind;
    this.channels = Object.freeze(channels);
  }

  static rgb(r: number, g: number, b: number): Color {
    return new Color("rgb", [assertByte(r, "red"), assertByte(g, "green"), assertByte(b, "blue")]);
  }

  static rgba(r: number, g: number, b: number, a: number): Color {
    return new Color("rgba", [assertByte(r, "red"), assertByte(g, "green"), assertByte(b, "blue"), assertByte(a, "alpha")]);
  }

  /**
   * Unpack `0xRRGGBB` or `0xRRGGBBAA`. Without `channels`, values above 0xFFFFFF
   * are read as four channels.
   */
  static fromValue(value: number, channels?: number): Color {
    if (!Number.isInteger(value) || value < 0 || value > MAX_RGBA) {
      throw new ColorError("TD_COLOR_INVALID_VALUE", `value \`${value}\` is not an unsigned 32-bit integer`);
    }
    const count = channels ?? (value <= MAX_RGB ? 3 : 4);
    if (count === 3) {
      if (value > MAX_RGB) {
        throw new ColorError("TD_COLOR_OUT_OF_BOUNDS", `value \`${value}\` does not fit within 3 channels`);
      }
      return new Color("rgb", [(value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff]);
    }
    if (count === 4) {
      return new Color("rgba", [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff]);
    }
    throw new ColorError("TD_COLOR_INVALID_CHANNELS", `invalid channel count \`${count}\``);
  }

  get channelCount(): 3 | 4 {
    return this.kind === "rgb" ? 3 : 4;
  }

  value(): number {
    let out = 0;
    for (const c of this.channels) out = out * 256 + c;
    return out;
  }

  /** Packed with the channel order reversed, as the config format stores colors on disk. */
  valueRev(): number {
    let out = 0;
    for (let i = this.channels.length - 1; i >= 0; i--) out = out * 256 + (this.channels[i] ?? 0);
    return out;
  }

  add(other: Color): Color {
    return this.combine(other, (a, b) => a + b);
  }

  sub(other: Color): Color {
    return this.combine(other, (a, b) => a - b);
  }

  private combine(other: Color, op: (a: number, b: number) => number): Color {
    if (other.kind !== this.kind) {
      throw new ColorError("TD_COLOR_CHANNEL_MISMATCH", "cannot perform arithmetic on two colors with different channels");
    }
    const out = new Array<number>(this.channels.length);
    for (let i = 0; i < this.channels.length; i++) {
      const v = op(this.channels[i] ?? 0, other.channels[i] ?? 0);
      if (v > 255) {
        throw new ColorError("TD_COLOR_OVERFLOW", "color addition caused one of the channels to overflow past 255");
      }
      if (v < 0) {
        throw new ColorError("TD_COLOR_UNDERFLOW", "color subtraction caused one of the channels to underflow below 0");
      }
      out[i] = v;
    }
    return new Color(this.kind, out);
  }

  withAlpha(alpha: number): Color {
    const [r = 0, g = 0, b = 0] = this.channels;
    return Color.rgba(r, g, b, alpha);
  }

  toRgb(): Color {
    const [r = 0, g = 0, b = 0] = this.channels;
    return Color.rgb(r, g, b);
  }

  /** Toggle-state encoding used by some config keys: `valueRev() - 0x1000000`. */
  negative(): number {
    if (this.kind !== "rgb") throw new ColorError("TD_COLOR_NEGATIVE_RGBA", "cannot apply negative() to RGBA color");
    return this.valueRev() - NEGATIVE_OFFSET;
  }

  hex(): string {
    let out = "";
    for (let i = this.channels.length - 1; i >= 0; i--) out += hexByte(this.channels[i] ?? 0);
    return out;
  }

  arr(): string {
    return this.channels.join(" ");
  }

  equals(other: Color): boolean {
    if (other.kind !== this.kind) return false;
    return this.channels.every((c, i) => c === other.channels[i]);
  }

  toString(): string {
    return this.hex();
  }
}
