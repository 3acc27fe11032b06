import { describe, expect, it } from "vitest";
import { BUILTIN_PRESETS, findPreset, hexToRgb, rgbToHex } from "./presets.js";

describe("presets", () => {
  it("finds built-ins case-insensitively", () => {
    expect(findPreset("  sunset ")).toEqual({ name: "Sunset", params: { r: 255, g: 120, b: 40, dimming: 55 } });
    expect(findPreset("disco")).toBeUndefined();
  });

  it("ships the seven built-ins in display order", () => {
    expect(BUILTIN_PRESETS.map((p) => p.name)).toEqual(["Warm", "Cool", "Focus", "Relax", "Sunset", "Forest", "Night"]);
  });
});

describe("hex colours", () => {
  it("formats RGB as upper-case #RRGGBB, clamping out-of-range channels", () => {
    expect(rgbToHex({ r: 255, g: 120, b: 48 })).toBe("#FF7830");
    expect(rgbToHex({ r: -4, g: 300, b: 9.6 })).toBe("#00FF0A");
  });

  it("parses 3- and 6-digit forms with or without #", () => {
    expect(hexToRgb("#ff7830")).toEqual({ r: 255, g: 120, b: 48 });
    expect(hexToRgb("0A0")).toEqual({ r: 0, g: 170, b: 0 });
    expect(hexToRgb("#12345")).toBeNull();
    expect(hexToRgb("zzzzzz")).toBeNull();
  });
});
