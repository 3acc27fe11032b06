import type { LanSession } from "./adapters/lan.js";
import { assertAddress } from "./adapters/transport.js";
import type { FadeEngine, FadeOptions } from "./engine/fade.js";
import type { TokenBucketLimiter } from "./util/limiter.js";
import { BUILTIN_PRESETS, findPreset, hexToRgb, PRESET_FADE_MS, rgbToHex, type Preset } from "./util/presets.js";
import type { DeviceDescriptor, FadeOutcome, LightLevels, LightState, Logger, RGB } from "./util/types.js";

export const NO_DEVICE = "No device selected.";

export type ColorRequest = {
  hex?: string;
  r?: number;
  g?: number;
  b?: number;
  dimming?: number;
  fadeMs?: number;
};

export type Frame = LightLevels & { hex: string };

export type FadeReport = {
  outcome: FadeOutcome;
  frames: Frame[];
};

export type DeviceInfo = {
  config: Record<string, unknown> | null;
  pilot: LightState | null;
};

type Deps = {
  session: LanSession;
  engine: FadeEngine;
  limiter: TokenBucketLimiter;
  allowlist?: Set<string>;
  log?: Logger;
};

/**
 * What the MCP tools call. Enforces the allowlist and rate limit, then routes to
 * the session or the fade engine. Frames of the running fade are collected from
 * the engine's onStep hook via recordStep().
 */
export class WizController {
  private session: LanSession;
  private engine: FadeEngine;
  private limiter: TokenBucketLimiter;
  private allowlist: Set<string>;
  private log: Logger;
  private frames: Frame[] = [];

  constructor(deps: Deps) {
    this.session = deps.session;
    this.engine = deps.engine;
    this.limiter = deps.limiter;
    this.allowlist = deps.allowlist ?? new Set();
    this.log = deps.log ?? ((m) => console.error(m));
  }

  isAllowed(address: string): boolean {
    return this.allowlist.size === 0 || this.allowlist.has(address);
  }

  recordStep(levels: LightLevels, index: number): void {
    if (index === 0) this.frames = [];
    this.frames.push({ ...levels, hex: rgbToHex(levels) });
  }

  async discover(timeoutMs?: number): Promise<DeviceDescriptor[]> {
    await this.limiter.take();
    const found = await this.session.rescan(timeoutMs);
    const visible = found.filter((d) => this.isAllowed(d.address));
    if (visible.length === 0) {
      this.log("No WiZ bulbs found. Check Wi-Fi and rescan.");
      this.session.select(null);
    } else if (!visible.some((d) => d.address === this.session.address)) {
      this.session.select(visible[0].address);
    }
    return visible;
  }

  select(by: { address?: string; index?: number }): DeviceDescriptor | null {
    if (by.address !== undefined) {
      assertAddress(by.address);
      if (!this.isAllowed(by.address)) throw new Error("Device not allowed");
      this.session.select(by.address);
      return this.session.devices.find((d) => d.address === by.address) ?? null;
    }
    if (by.index !== undefined) {
      const d = this.session.devices[by.index];
      if (!d) throw new Error(`No device at index ${by.index}`);
      if (!this.isAllowed(d.address)) throw new Error("Device not allowed");
      return this.session.selectIndex(by.index);
    }
    throw new Error("Pass an address or an index");
  }

  async power(on: boolean): Promise<string> {
    if (!(await this.gate())) return NO_DEVICE;
    await this.session.power(on);
    return `Power ${on ? "on" : "off"} sent.`;
  }

  async setPilot(params: LightState): Promise<string> {
    if (!(await this.gate())) return NO_DEVICE;
    await this.session.setParams(params);
    return `setPilot sent: ${JSON.stringify({ state: true, ...params })}`;
  }

  async setColor(req: ColorRequest): Promise<string> {
    const rgb = req.hex !== undefined ? hexToRgb(req.hex) : pickRgb(req);
    if (!rgb) throw new Error("Give a valid hex colour or all of r, g and b");
    const params: LightState = { ...rgb, dimming: req.dimming ?? this.session.lastKnown.dimming };
    const label = `RGB -> ${rgb.r},${rgb.g},${rgb.b} (${rgbToHex(rgb)}) dim=${params.dimming}`;
    if (req.fadeMs !== undefined) {
      const report = await this.fade(params, { durationMs: req.fadeMs });
      return `${label}: ${describeOutcome(report.outcome)}`;
    }
    const sent = await this.setPilot(params);
    if (sent === NO_DEVICE) return sent;
    this.log(label);
    return label;
  }

  async getState(): Promise<LightState | string> {
    if (!(await this.gate())) return NO_DEVICE;
    const state = await this.session.getState();
    if (state) return state;
    const power = this.session.lastPower;
    return `No response (last known power: ${power === null ? "unknown" : power ? "on" : "off"})`;
  }

  /** System config plus the current pilot; "No response" only when both are silent. */
  async deviceInfo(): Promise<DeviceInfo | string> {
    if (!(await this.gate())) return NO_DEVICE;
    const config = await this.session.getSystemConfig();
    const pilot = await this.session.getState();
    if (!config && !pilot) return "No response";
    return { config, pilot };
  }

  async fade(target: LightState, opts: FadeOptions = {}): Promise<FadeReport> {
    await this.gate();
    const outcome = await this.engine.fade(target, opts);
    const frames = outcome.status === "completed" ? [...this.frames] : [];
    return { outcome, frames };
  }

  stopFade(): string {
    return this.engine.stop() ? "Fade stopped." : "No fade running.";
  }

  listPresets(): readonly Preset[] {
    return BUILTIN_PRESETS;
  }

  async applyPreset(name: string, fade = true): Promise<string> {
    const preset = findPreset(name);
    if (!preset) throw new Error(`Unknown preset: ${name}`);
    if (fade) {
      this.log(`Fading to preset: ${preset.name}`);
      const report = await this.fade(preset.params, { durationMs: PRESET_FADE_MS });
      return `Preset ${preset.name}: ${describeOutcome(report.outcome)}`;
    }
    const sent = await this.setPilot(preset.params);
    if (sent === NO_DEVICE) return sent;
    this.log(`Applied preset: ${preset.name}`);
    return `Applied preset: ${preset.name}`;
  }

  /** False when nothing is selected; throws when the selection is not allowed. */
  private async gate(): Promise<boolean> {
    const address = this.session.address;
    if (!address) return false;
    if (!this.isAllowed(address)) throw new Error("Device not allowed");
    await this.limiter.take();
    return true;
  }
}

function pickRgb(req: ColorRequest): RGB | null {
  if (req.r === undefined || req.g === undefined || req.b === undefined) return null;
  return { r: req.r, g: req.g, b: req.b };
}

export function describeOutcome(outcome: FadeOutcome): string {
  switch (outcome.status) {
    case "completed":
      return `fade completed in ${outcome.elapsedMs} ms (${outcome.steps} steps)`;
    case "cancelled":
      return `fade cancelled after ${outcome.stepsSent} step(s)`;
    case "skipped":
      return NO_DEVICE;
  }
}
