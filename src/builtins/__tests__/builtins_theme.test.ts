import { describe, expect, it } from "vitest";
import { BLEND_MODES, encodeBlend } from "../builtins_theme.js";

describe("encodeBlend", () => {
  it("packs the marker, fraction and mode", () => {
    expect(encodeBlend("add", 0)).toBe(0x20001);
    expect(encodeBlend("overlay", 1)).toBe(0x20000 + (256 << 8) + BLEND_MODES.overlay);
    expect(encodeBlend("dodge", 0.5)).toBe(0x28002);
  });

  it("matches the documented bit patterns", () => {
    expect(encodeBlend("normal", 0)).toBe(0b100000000000000000);
    expect(encodeBlend("normal", 1)).toBe(0b110000000000000000);
    expect(encodeBlend("hsv", 0.12)).toBe(0b100001111111111110);
  });

  it("rounds the fraction to 1/256 steps", () => {
    expect(encodeBlend("normal", 0.1)).toBe(0x20000 + (26 << 8));
  });

  it("checks the fraction before the mode", () => {
    expect(() => encodeBlend("screen", 1.5)).toThrow("fraction `1.5` must be a value between 0.0 and 1.0");
    expect(() => encodeBlend("normal", Number.NaN)).toThrow("must be a value between 0.0 and 1.0");
  });

  it("lists the valid modes", () => {
    expect(() => encodeBlend("screen", 0.5)).toThrow(
      'mode `screen` must be one of: "normal", "add", "dodge", "multiply", "overlay", "hsv"'
    );
  });
});
