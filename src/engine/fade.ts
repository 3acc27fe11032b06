import type { LanSession } from "../adapters/lan.js";
import type { FadeOutcome, LightLevels, LightState, Logger, TransitionPlan } from "../util/types.js";
import { assertFadeOptions, createPlan, interpolate, resolveBaseline } from "./plan.js";

export type FadeOptions = {
  durationMs?: number;
  steps?: number;
};

export type FadeEngineOptions = {
  defaults?: { durationMs: number; steps: number };
  log?: Logger;
  onStep?: (levels: LightLevels, index: number, plan: TransitionPlan) => void;
  onFinish?: (outcome: FadeOutcome) => void;
};

type ActiveFade = {
  epoch: number;
  address: string;
  timer: NodeJS.Timeout | null;
  stepsSent: number;
  settle: (outcome: FadeOutcome) => void;
};

/**
 * Drives one transition at a time against a session. Each plan carries the
 * epoch it was started under; a tick whose epoch is no longer current does
 * nothing, so a superseded plan can never send another step.
 */
export class FadeEngine {
  private epoch = 0;
  private active: ActiveFade | null = null;
  private defaults: { durationMs: number; steps: number };
  private log: Logger;

  constructor(private session: LanSession, private opts: FadeEngineOptions = {}) {
    this.defaults = opts.defaults ?? { durationMs: 1000, steps: 20 };
    this.log = opts.log ?? ((m) => console.error(m));
  }

  get status(): "idle" | "running" {
    return this.active ? "running" : "idle";
  }

  fade(target: LightState, opts: FadeOptions = {}): Promise<FadeOutcome> {
    const durationMs = opts.durationMs ?? this.defaults.durationMs;
    const steps = opts.steps ?? this.defaults.steps;
    try {
      assertFadeOptions(durationMs, steps);
    } catch (err) {
      return Promise.reject(err);
    }

    const address = this.session.address;
    if (!address) {
      this.log("No device selected.");
      return Promise.resolve({ status: "skipped", reason: "no-device" });
    }

    // Runs before fade() returns: the old plan is dead before the new one exists.
    this.cancelActive();
    const epoch = ++this.epoch;

    return new Promise<FadeOutcome>((resolve) => {
      const fade: ActiveFade = { epoch, address, timer: null, stepsSent: 0, settle: resolve };
      this.active = fade;
      this.run(fade, target, durationMs, steps).catch((err: unknown) => {
        this.log(`Fade failed: ${err instanceof Error ? err.message : String(err)}`);
        if (this.active === fade) this.cancelActive();
      });
    });
  }

  /** Cancels the running fade, if any. */
  stop(): boolean {
    const stopped = this.cancelActive();
    if (stopped) this.log("Fade stopped.");
    return stopped;
  }

  private async run(fade: ActiveFade, target: LightState, durationMs: number, steps: number): Promise<void> {
    const observed = await this.session.getState(fade.address);
    if (fade.epoch !== this.epoch) return;

    const start = resolveBaseline(observed, this.session.lastKnown);
    const plan = createPlan(start, target, durationMs, steps);
    const t0 = Date.now();

    const tick = (index: number) => {
      if (fade.epoch !== this.epoch) return;
      fade.timer = null;

      const levels = interpolate(plan, index);
      this.session.setParams(levels, fade.address).catch((err: unknown) => {
        this.log(`Fade step ${index} failed: ${err instanceof Error ? err.message : String(err)}`);
      });
      fade.stepsSent = index + 1;
      this.opts.onStep?.(levels, index, plan);

      if (index < plan.steps) {
        fade.timer = setTimeout(() => tick(index + 1), plan.intervalMs);
        return;
      }

      this.active = null;
      const elapsedMs = Date.now() - t0;
      this.log(`Fade done in ${elapsedMs} ms`);
      this.finish(fade, { status: "completed", steps: plan.steps, elapsedMs, final: levels });
    };

    tick(0);
  }

  private cancelActive(): boolean {
    const fade = this.active;
    if (!fade) return false;
    this.epoch++;
    if (fade.timer) clearTimeout(fade.timer);
    fade.timer = null;
    this.active = null;
    this.finish(fade, { status: "cancelled", stepsSent: fade.stepsSent });
    return true;
  }

  private finish(fade: ActiveFade, outcome: FadeOutcome): void {
    fade.settle(outcome);
    this.opts.onFinish?.(outcome);
  }
}
