import type { LightLevels, LightState, TransitionPlan } from "../util/types.js";
import { LEVEL_KEYS } from "../util/types.js";

/** Raised-cosine ease: 0 at alpha=0, 1 at alpha=1, slow at both ends. */
export function easeInOut(alpha: number): number {
  return 0.5 - 0.5 * Math.cos(Math.PI * alpha);
}

export function assertFadeOptions(durationMs: number, steps: number): void {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new RangeError(`steps must be a positive integer, got ${steps}`);
  }
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new RangeError(`durationMs must be a non-negative number, got ${durationMs}`);
  }
}

/** Observed value per field where the bulb reported one, otherwise the fallback. */
export function resolveBaseline(observed: LightState | null, fallback: LightLevels): LightLevels {
  const out = { ...fallback };
  if (!observed) return out;
  for (const key of LEVEL_KEYS) {
    const v = observed[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}

/** Fields the target leaves out hold at the start value. */
export function resolveEndpoint(target: LightState, start: LightLevels): LightLevels {
  const out = { ...start };
  for (const key of LEVEL_KEYS) {
    const v = target[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}

export function createPlan(start: LightLevels, target: LightState, durationMs: number, steps: number): TransitionPlan {
  assertFadeOptions(durationMs, steps);
  return {
    start: { ...start },
    end: resolveEndpoint(target, start),
    steps,
    durationMs,
    intervalMs: Math.max(1, Math.floor(durationMs / steps)),
  };
}

export function interpolate(plan: TransitionPlan, index: number): LightLevels {
  if (index >= plan.steps) return { ...plan.end };
  const w = easeInOut(index / plan.steps);
  const out = { ...plan.start };
  for (const key of LEVEL_KEYS) {
    out[key] = Math.round(plan.start[key] + (plan.end[key] - plan.start[key]) * w);
  }
  return out;
}
