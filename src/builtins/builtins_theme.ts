/**
 * Purpose: Provide the theme vocabulary: color construction, blend encoding, environment lookup, and resource staging.
 * Intent: Expose only these operations to scripts; everything host-facing arrives through injected handles.
 */

import { Color } from "../color.js";
import { globProblem, normalizeRelativePath, relativePathProblem } from "../paths.js";
import { fromByteString, type ScriptTable, type ScriptValue, toByteString } from "../themescript/values.js";
import type { ResourceRequest } from "../types.js";
import { argAt, argColor, argInteger, argNumber, argString, type LibraryEntry, makeLibrary } from "./builtins_shared.js";

export type EnvLookup = (name: string) => string | undefined;

/** Receives resources registered from scripts; owned by the build. */
export interface ResourceSink {
  push(request: ResourceRequest): void;
}

export const BLEND_MODES = {
  normal: 0x00,
  add: 0x01,
  dodge: 0x02,
  multiply: 0x03,
  overlay: 0x04,
  hsv: 0xfe,
} as const;

export type BlendMode = keyof typeof BLEND_MODES;

function isBlendMode(mode: string): mode is BlendMode {
  return Object.hasOwn(BLEND_MODES, mode);
}

/**
 * Encode a blend setting as the packed 18-bit value themes store:
 * a marker bit, the fraction as n/256, and the mode byte.
 */
export function encodeBlend(mode: string, fraction: number): number {
  const f = Math.fround(fraction);
  if (!(f >= 0 && f <= 1)) throw new Error(`fraction \`${fraction}\` must be a value between 0.0 and 1.0`);
  if (!isBlendMode(mode)) {
    const valid = Object.keys(BLEND_MODES)
      .map((m) => `"${m}"`)
      .join(", ");
    throw new Error(`mode \`${mode}\` must be one of: ${valid}`);
  }
  const numerator = Math.round(f * 256);
  return 0x20000 + (numerator << 8) + BLEND_MODES[mode];
}

function colorFromArgs(args: ScriptValue[]): Color {
  const value = argNumber(args, 0, "color");
  const channels = argAt(args, 1) === null ? undefined : argInteger(args, 1, "color");
  return Color.fromValue(value, channels);
}

export function makeColorMethods(): ScriptTable {
  return makeLibrary("color", {
    arr: (args) => argColor(args, 0, "arr").arr(),
    hex: (args) => argColor(args, 0, "hex").hex(),
    with_alpha: (args) => argColor(args, 0, "with_alpha").withAlpha(argNumber(args, 1, "with_alpha")),
    negative: (args) => BigInt(argColor(args, 0, "negative").negative()),
    to_rgb: (args) => argColor(args, 0, "to_rgb").toRgb(),
  });
}

function stageResource(args: ScriptValue[], sink: ResourceSink | null): ScriptValue {
  if (args.length !== 1 && args.length !== 2) {
    throw new Error("resource(...) can only be called with 1 or 2 arguments");
  }
  if (!sink) throw new Error("resource(...) is only available while building a theme");

  const pattern = fromByteString(argString(args, args.length - 1, "resource"));
  const problem = globProblem(pattern);
  if (problem) throw new Error(toByteString(`invalid glob pattern \`${pattern}\`: ${problem}`));

  let dest = ".";
  if (args.length === 2) {
    const rawDest = fromByteString(argString(args, 0, "resource"));
    const destProblem = relativePathProblem(rawDest);
    if (destProblem) throw new Error(toByteString(`invalid resource destination: ${destProblem}`));
    dest = normalizeRelativePath(rawDest);
  }

  sink.push({ pattern, dest });
  return null;
}

export interface ThemeBuiltinOptions {
  env: EnvLookup;
  resources: ResourceSink | null;
}

export function themeBuiltins(options: ThemeBuiltinOptions): Record<string, LibraryEntry> {
  return {
    color: (args) => colorFromArgs(args),
    rgb: (args) => Color.rgb(argNumber(args, 0, "rgb"), argNumber(args, 1, "rgb"), argNumber(args, 2, "rgb")),
    rgba: (args) =>
      Color.rgba(argNumber(args, 0, "rgba"), argNumber(args, 1, "rgba"), argNumber(args, 2, "rgba"), argNumber(args, 3, "rgba")),
    blend: (args) => BigInt(encodeBlend(argString(args, 0, "blend"), argNumber(args, 1, "blend"))),
    env: (args) => {
      // Error messages carry script bytes; the lookup takes host text.
      const name = argString(args, 0, "env");
      const value = options.env(fromByteString(name));
      if (value === undefined) throw new Error(`environment variable \`${name}\` is not set`);
      return toByteString(value);
    },
    resource: (args) => stageResource(args, options.resources),
  };
}
