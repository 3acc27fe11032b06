import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LanSession } from "../adapters/lan.js";
import type { SendOptions } from "../adapters/transport.js";
import { FakeTransport } from "../test/fake-transport.js";
import type { CommandRequest, FadeOutcome, LightLevels, TransitionPlan, WizReply } from "../util/types.js";
import { FadeEngine } from "./fade.js";

const BULB = "192.168.1.20";

/** Answers getPilot only after a delay, like a slow bulb. */
class SlowTransport extends FakeTransport {
  async send(address: string, command: CommandRequest, opts: SendOptions = {}): Promise<WizReply | null> {
    if (command.method === "getPilot") await new Promise((r) => setTimeout(r, 500));
    return super.send(address, command, opts);
  }
}

function setup(transport: FakeTransport = new FakeTransport()) {
  const logs: string[] = [];
  const log = (m: string) => logs.push(m);
  const session = new LanSession({ transport, log });
  session.select(BULB);
  const steps: Array<{ levels: LightLevels; index: number; plan: TransitionPlan }> = [];
  const finished: FadeOutcome[] = [];
  const engine = new FadeEngine(session, {
    log,
    onStep: (levels, index, plan) => steps.push({ levels, index, plan }),
    onFinish: (outcome) => finished.push(outcome),
  });
  return { transport, session, engine, logs, steps, finished };
}

describe("FadeEngine", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("queries the bulb, then sends every interpolated step at the plan interval", async () => {
    const { transport, engine, logs } = setup();
    const done = engine.fade({ temp: 6500, dimming: 100 }, { durationMs: 1000, steps: 4 });
    expect(engine.status).toBe("running");

    await vi.advanceTimersByTimeAsync(0);
    expect(transport.sent[0]).toEqual({
      address: BULB,
      command: { method: "getPilot", params: {} },
      opts: { waitForReply: true, timeoutMs: 1000 },
    });
    expect(transport.setPilotParams()).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(249);
    expect(transport.setPilotParams()).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(transport.setPilotParams()).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(750);
    const outcome = await done;

    const sent = transport.setPilotParams().map((s) => s.params);
    expect(sent.map((p) => p.dimming)).toEqual([60, 66, 80, 94, 100]);
    expect(sent.map((p) => p.temp)).toEqual([3500, 3939, 5000, 6061, 6500]);
    expect(sent[4]).toEqual({ state: true, dimming: 100, temp: 6500, r: 0, g: 0, b: 0 });
    expect(outcome).toEqual({
      status: "completed",
      steps: 4,
      elapsedMs: 1000,
      final: { dimming: 100, temp: 6500, r: 0, g: 0, b: 0 },
    });
    expect(engine.status).toBe("idle");
    expect(logs).toContain("Fade done in 1000 ms");
  });

  it("falls back to last known values when the bulb does not answer", async () => {
    const transport = new FakeTransport();
    transport.pilot = null;
    const { engine, session } = setup(transport);

    const done = engine.fade({ dimming: 100 }, { durationMs: 100, steps: 2 });
    await vi.advanceTimersByTimeAsync(100);
    const outcome = await done;

    expect(outcome.status).toBe("completed");
    expect(transport.setPilotParams().map((s) => s.params)).toEqual([
      { state: true, dimming: 60, temp: 3500, r: 255, g: 120, b: 40 },
      { state: true, dimming: 80, temp: 3500, r: 255, g: 120, b: 40 },
      { state: true, dimming: 100, temp: 3500, r: 255, g: 120, b: 40 },
    ]);
    expect(session.lastKnown).toEqual({ dimming: 100, temp: 3500, r: 255, g: 120, b: 40 });
  });

  it("cancels a running fade so none of its steps follow the new plan's first step", async () => {
    const { engine, steps, finished } = setup();
    const first = engine.fade({ dimming: 100 }, { durationMs: 1000, steps: 4 });
    await vi.advanceTimersByTimeAsync(300);

    const second = engine.fade({ dimming: 10 }, { durationMs: 400, steps: 2 });
    await expect(first).resolves.toEqual({ status: "cancelled", stepsSent: 2 });

    await vi.advanceTimersByTimeAsync(2000);
    await expect(second).resolves.toMatchObject({ status: "completed", steps: 2 });

    const firstPlan = steps[0].plan;
    const switchAt = steps.findIndex((s) => s.plan !== firstPlan);
    expect(switchAt).toBe(2);
    expect(steps.slice(switchAt).every((s) => s.plan !== firstPlan)).toBe(true);
    expect(steps.slice(switchAt).map((s) => s.index)).toEqual([0, 1, 2]);
    expect(finished.map((f) => f.status)).toEqual(["cancelled", "completed"]);
  });

  it("abandons a plan that is superseded while its baseline query is in flight", async () => {
    const { transport, engine, steps } = setup(new SlowTransport());
    const first = engine.fade({ dimming: 100 }, { durationMs: 200, steps: 2 });
    await vi.advanceTimersByTimeAsync(100);

    const second = engine.fade({ dimming: 20 }, { durationMs: 200, steps: 2 });
    await expect(first).resolves.toEqual({ status: "cancelled", stepsSent: 0 });

    await vi.advanceTimersByTimeAsync(1000);
    await expect(second).resolves.toMatchObject({ status: "completed" });
    expect(transport.setPilotParams().map((s) => s.params.dimming)).toEqual([60, 40, 20]);
    expect(new Set(steps.map((s) => s.plan)).size).toBe(1);
  });

  it("stop() cancels the running fade and reports whether one was running", async () => {
    const { transport, engine, logs } = setup();
    const done = engine.fade({ dimming: 100 }, { durationMs: 1000, steps: 10 });
    await vi.advanceTimersByTimeAsync(0);

    expect(engine.stop()).toBe(true);
    await expect(done).resolves.toEqual({ status: "cancelled", stepsSent: 1 });
    await vi.advanceTimersByTimeAsync(5000);
    expect(transport.setPilotParams()).toHaveLength(1);
    expect(engine.stop()).toBe(false);
    expect(logs).toContain("Fade stopped.");
  });

  it("skips without I/O when no device is selected", async () => {
    const { transport, session, engine, logs } = setup();
    session.select(null);
    await expect(engine.fade({ dimming: 50 })).resolves.toEqual({ status: "skipped", reason: "no-device" });
    expect(transport.sent).toEqual([]);
    expect(logs).toContain("No device selected.");
  });

  it("keeps sending to the bulb it started on when the selection changes", async () => {
    const { transport, session, engine } = setup();
    const done = engine.fade({ dimming: 90 }, { durationMs: 300, steps: 3 });
    await vi.advanceTimersByTimeAsync(0);
    session.select("192.168.1.21");
    await vi.advanceTimersByTimeAsync(300);
    await done;
    expect(transport.setPilotParams().map((s) => s.address)).toEqual([BULB, BULB, BULB, BULB]);
  });

  it("holds steady for a fade with no target fields", async () => {
    const { transport, engine } = setup();
    const done = engine.fade({}, { durationMs: 100, steps: 2 });
    await vi.advanceTimersByTimeAsync(100);
    await expect(done).resolves.toMatchObject({ status: "completed" });
    for (const { params } of transport.setPilotParams()) {
      expect(params).toEqual({ state: true, dimming: 60, temp: 3500, r: 0, g: 0, b: 0 });
    }
  });

  it("rejects invalid step counts without touching a running fade", async () => {
    const { engine } = setup();
    const running = engine.fade({ dimming: 100 }, { durationMs: 100, steps: 2 });
    await expect(engine.fade({ dimming: 10 }, { steps: 0 })).rejects.toBeInstanceOf(RangeError);
    expect(engine.status).toBe("running");
    await vi.advanceTimersByTimeAsync(100);
    await expect(running).resolves.toMatchObject({ status: "completed" });
  });
});
