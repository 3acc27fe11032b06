import type { LightState, RGB } from "./types.js";

export type Preset = { name: string; params: LightState };

export const BUILTIN_PRESETS: readonly Preset[] = [
  { name: "Warm", params: { temp: 2700, dimming: 65 } },
  { name: "Cool", params: { temp: 5000, dimming: 75 } },
  { name: "Focus", params: { temp: 6500, dimming: 100 } },
  { name: "Relax", params: { temp: 2200, dimming: 40 } },
  { name: "Sunset", params: { r: 255, g: 120, b: 40, dimming: 55 } },
  { name: "Forest", params: { r: 0, g: 180, b: 80, dimming: 60 } },
  { name: "Night", params: { temp: 2200, dimming: 10 } },
];

export const PRESET_FADE_MS = 900;

export function findPreset(name: string): Preset | undefined {
  const needle = name.trim().toLowerCase();
  return BUILTIN_PRESETS.find((p) => p.name.toLowerCase() === needle);
}

export function rgbToHex({ r, g, b }: RGB): string {
  const hex = (v: number) => Math.max(0, Math.min(255, Math.round(v))).toString(16).toUpperCase().padStart(2, "0");
  return `#${hex(r)}${hex(g)}${hex(b)}`;
}

/** Accepts "#RGB", "#RRGGBB" or the same without "#". */
export function hexToRgb(input: string): RGB | null {
  const m = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(input.trim());
  if (!m) return null;
  let digits = m[1];
  if (digits.length === 3) digits = digits.split("").map((c) => c + c).join("");
  const n = parseInt(digits, 16);
  return { r: (n >> 16) & 255, g: (n >> 8) & 255, b: n & 255 };
}
