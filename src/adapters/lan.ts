import { z } from "zod";
import type { DeviceDescriptor, LightLevels, LightState, Logger } from "../util/types.js";
import { LEVEL_KEYS } from "../util/types.js";
import { DEFAULT_REPLY_TIMEOUT_MS, type PilotTransport } from "./transport.js";

// Values shown before anything has been observed from a bulb.
export const DEFAULT_LEVELS: LightLevels = { dimming: 60, temp: 3500, r: 255, g: 120, b: 40 };

const num = z.number().optional().catch(undefined);

const PilotSchema = z.object({
  state: z.boolean().optional().catch(undefined),
  dimming: num,
  temp: num,
  r: num,
  g: num,
  b: num,
});

/** Picks the LightState fields out of a getPilot result, dropping anything malformed. */
export function parsePilot(result: Record<string, unknown>): LightState {
  const parsed = PilotSchema.parse(result);
  const out: LightState = {};
  if (parsed.state !== undefined) out.state = parsed.state;
  for (const key of LEVEL_KEYS) {
    const v = parsed[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}

export type Scanner = (timeoutMs?: number) => Promise<DeviceDescriptor[]>;

export type SessionOptions = {
  transport: PilotTransport;
  scan?: Scanner;
  replyTimeoutMs?: number;
  log?: Logger;
  initialLevels?: LightLevels;
};

/**
 * The selected bulb plus what we last knew about it. Holds no socket: every
 * operation is an independent transport call against the current address.
 */
export class LanSession {
  lastKnown: LightLevels;
  lastPower: boolean | null = null;

  private transport: PilotTransport;
  private scan: Scanner | undefined;
  private replyTimeoutMs: number;
  private log: Logger;
  private selected: string | null = null;
  private known: readonly DeviceDescriptor[] = [];

  constructor(opts: SessionOptions) {
    this.transport = opts.transport;
    this.scan = opts.scan;
    this.replyTimeoutMs = opts.replyTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    this.log = opts.log ?? ((m) => console.error(m));
    this.lastKnown = { ...(opts.initialLevels ?? DEFAULT_LEVELS) };
  }

  get address(): string | null {
    return this.selected;
  }

  get devices(): readonly DeviceDescriptor[] {
    return this.known;
  }

  select(address: string | null): void {
    this.selected = address;
    this.log(`Selected: ${address ?? "none"}`);
  }

  selectIndex(index: number): DeviceDescriptor | null {
    const d = this.known[index];
    this.select(d ? d.address : null);
    return d ?? null;
  }

  /** Replaces the known device set; keeps the selection only if it is still present. */
  async rescan(timeoutMs?: number): Promise<readonly DeviceDescriptor[]> {
    if (!this.scan) throw new Error("Session has no scanner configured");
    this.log("Rescanning…");
    const found = await this.scan(timeoutMs);
    this.known = found;
    this.log(`Found ${found.length} device(s).`);
    if (!found.some((d) => d.address === this.selected)) {
      this.selectIndex(0);
    }
    return found;
  }

  async power(on: boolean): Promise<boolean> {
    const ip = this.requireAddress();
    if (!ip) return false;
    await this.transport.send(ip, { method: "setPilot", params: { state: on } });
    this.lastPower = on;
    return true;
  }

  /**
   * Sends setPilot with state=true under the given params. `address` pins the
   * call to a bulb other than the current selection (a running fade does this).
   */
  async setParams(params: LightState, address: string | null = this.selected): Promise<boolean> {
    const ip = this.requireAddress(address);
    if (!ip) return false;
    const merged: LightState = { state: true, ...params };
    await this.transport.send(ip, { method: "setPilot", params: merged });
    this.remember(merged);
    return true;
  }

  async getState(address: string | null = this.selected): Promise<LightState | null> {
    const ip = this.requireAddress(address);
    if (!ip) return null;
    const reply = await this.transport.send(
      ip,
      { method: "getPilot", params: {} },
      { waitForReply: true, timeoutMs: this.replyTimeoutMs },
    );
    if (!reply?.result) return null;
    const state = parsePilot(reply.result);
    this.remember(state);
    return state;
  }

  async getSystemConfig(): Promise<Record<string, unknown> | null> {
    const ip = this.requireAddress();
    if (!ip) return null;
    const reply = await this.transport.send(
      ip,
      { method: "getSystemConfig", params: {} },
      { waitForReply: true, timeoutMs: this.replyTimeoutMs },
    );
    return reply?.result ?? null;
  }

  private remember(state: LightState): void {
    if (state.state !== undefined) this.lastPower = state.state;
    for (const key of LEVEL_KEYS) {
      const v = state[key];
      if (v !== undefined) this.lastKnown[key] = v;
    }
  }

  private requireAddress(address: string | null = this.selected): string | null {
    if (!address) this.log("No device selected.");
    return address;
  }
}
