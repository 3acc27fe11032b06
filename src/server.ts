#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { describeDevice, discover } from "./adapters/discovery.js";
import { LanSession } from "./adapters/lan.js";
import { UdpTransport } from "./adapters/transport.js";
import { loadConfig } from "./config.js";
import { describeOutcome, WizController } from "./controller.js";
import { FadeEngine } from "./engine/fade.js";
import { TokenBucketLimiter } from "./util/limiter.js";

const config = loadConfig();
const log = (message: string) => console.error(`[wiz] ${message}`);

const transport = new UdpTransport({ port: config.port, dryRun: config.dryRun, log });
const session = new LanSession({
  transport,
  replyTimeoutMs: config.replyTimeoutMs,
  log,
  scan: (timeoutMs) =>
    discover({
      timeoutMs: timeoutMs ?? config.discoveryTimeoutMs,
      broadcastAddress: config.broadcastAddress,
      port: config.port,
      log,
    }),
});

let controller: WizController;
const engine = new FadeEngine(session, {
  defaults: config.fade,
  log,
  onStep: (levels, index) => controller.recordStep(levels, index),
  onFinish: (outcome) => log(describeOutcome(outcome)),
});
controller = new WizController({
  session,
  engine,
  limiter: new TokenBucketLimiter({ ratePerSec: config.rateRps }),
  allowlist: config.allowlist,
  log,
});

const server = new McpServer({ name: "wiz-mcp", version: "0.1.0" });

const text = (value: unknown) => ({
  content: [{ type: "text" as const, text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }],
});

const Dimming = z.number().int().min(10).max(100).describe("Brightness % (10-100)");
const Temp = z.number().int().min(1000).max(10000).describe("White temperature in Kelvin (typ. 2000-6500)");
const Channel = z.number().int().min(0).max(255);

const PilotShape = {
  dimming: Dimming.optional(),
  temp: Temp.optional(),
  r: Channel.optional(),
  g: Channel.optional(),
  b: Channel.optional(),
};

// ---- TOOLS ----
server.registerTool("wiz_discover", {
  description: "Broadcast for WiZ bulbs on the LAN. Replaces the known device list.",
  inputSchema: { timeoutMs: z.number().int().min(100).max(30000).optional() }
}, async ({ timeoutMs }) => {
  const found = await controller.discover(timeoutMs);
  if (found.length === 0) return text("No devices found.");
  const lines = found.map((d, i) => `${i}: ${describeDevice(d)}`);
  return text(`${lines.join("\n")}\nSelected: ${session.address ?? "none"}`);
});

server.registerTool("wiz_select_device", {
  description: "Select the bulb later commands go to, by address or by index from wiz_discover.",
  inputSchema: { address: z.string().optional(), index: z.number().int().min(0).optional() }
}, async ({ address, index }) => {
  const d = controller.select({ address, index });
  return text(`Selected: ${d ? describeDevice(d) : session.address}`);
});

server.registerTool("wiz_power", {
  description: "Turn the selected bulb on/off.",
  inputSchema: { on: z.boolean() }
}, async ({ on }) => text(await controller.power(on)));

server.registerTool("wiz_set_pilot", {
  description: "Set brightness, white temperature and/or RGB at once. The bulb is switched on.",
  inputSchema: PilotShape
}, async (params) => text(await controller.setPilot(params)));

server.registerTool("wiz_set_color", {
  description: "Set an RGB colour from hex or r/g/b, optionally fading to it.",
  inputSchema: {
    hex: z.string().optional().describe("e.g. #FF7830"),
    r: Channel.optional(),
    g: Channel.optional(),
    b: Channel.optional(),
    dimming: Dimming.optional(),
    fadeMs: z.number().int().min(0).max(60000).optional(),
  }
}, async (req) => text(await controller.setColor(req)));

server.registerTool("wiz_get_state", {
  description: "Query the selected bulb's current pilot state.",
  inputSchema: {}
}, async () => text(await controller.getState()));

server.registerTool("wiz_device_info", {
  description: "Query the selected bulb's system config (module, MAC, firmware) and its current pilot state.",
  inputSchema: {}
}, async () => text(await controller.deviceInfo()));

server.registerTool("wiz_fade", {
  description: "Smoothly fade the selected bulb to the given values. A new fade replaces a running one.",
  inputSchema: {
    ...PilotShape,
    durationMs: z.number().int().min(0).max(600000).optional(),
    steps: z.number().int().min(1).max(500).optional(),
  }
}, async ({ durationMs, steps, ...target }) => {
  const report = await controller.fade(target, { durationMs, steps });
  return text({ result: describeOutcome(report.outcome), outcome: report.outcome, frames: report.frames });
});

server.registerTool("wiz_stop_fade", {
  description: "Stop the running fade, leaving the bulb where it is.",
  inputSchema: {}
}, async () => text(controller.stopFade()));

server.registerTool("wiz_list_presets", {
  description: "List built-in presets.",
  inputSchema: {}
}, async () => text(controller.listPresets()));

server.registerTool("wiz_apply_preset", {
  description: "Apply a built-in preset; fades by default.",
  inputSchema: { name: z.string(), fade: z.boolean().optional() }
}, async ({ name, fade }) => text(await controller.applyPreset(name, fade ?? true)));

async function main() {
  await controller.discover();
  const stdio = new StdioServerTransport();
  await server.connect(stdio);
  console.error("wiz-mcp server running (stdio)");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
