import { z } from "zod";
import { BROADCAST_ADDRESS, DEFAULT_DISCOVERY_TIMEOUT_MS } from "./adapters/discovery.js";
import { DEFAULT_REPLY_TIMEOUT_MS, WIZ_PORT } from "./adapters/transport.js";

export interface WizConfig {
  port: number;
  broadcastAddress: string;
  discoveryTimeoutMs: number;
  replyTimeoutMs: number;
  fade: {
    durationMs: number;
    steps: number;
  };
  rateRps: number;
  allowlist: Set<string>;
  dryRun: boolean;
}

const EnvSchema = z.object({
  WIZ_PORT: z.coerce.number().int().min(1).max(65535).default(WIZ_PORT),
  WIZ_BROADCAST_ADDRESS: z.string().ip({ version: "v4" }).default(BROADCAST_ADDRESS),
  WIZ_DISCOVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_DISCOVERY_TIMEOUT_MS),
  WIZ_REPLY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REPLY_TIMEOUT_MS),
  WIZ_FADE_MS: z.coerce.number().int().nonnegative().default(1000),
  WIZ_FADE_STEPS: z.coerce.number().int().min(1).default(20),
  WIZ_RATE_RPS: z.coerce.number().positive().default(10),
  WIZ_ALLOWLIST: z.string().default(""),
  WIZ_DRY_RUN: z.string().default("false"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WizConfig {
  // Blank variables count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.WIZ_PORT,
    broadcastAddress: e.WIZ_BROADCAST_ADDRESS,
    discoveryTimeoutMs: e.WIZ_DISCOVERY_TIMEOUT_MS,
    replyTimeoutMs: e.WIZ_REPLY_TIMEOUT_MS,
    fade: { durationMs: e.WIZ_FADE_MS, steps: e.WIZ_FADE_STEPS },
    rateRps: e.WIZ_RATE_RPS,
    allowlist: new Set(
      e.WIZ_ALLOWLIST.split(/[,\s]+/)
        .map((s) => s.trim())
        .filter(Boolean),
    ),
    dryRun: /^true$/i.test(e.WIZ_DRY_RUN),
  };
}
