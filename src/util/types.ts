export type RGB = { r: number; g: number; b: number };

export type LightState = {
  state?: boolean;
  dimming?: number; // 10–100 on most bulbs
  temp?: number; // Kelvin, typ. 2000–6500
  r?: number;
  g?: number;
  b?: number;
};

export const LEVEL_KEYS = ["dimming", "temp", "r", "g", "b"] as const;

export type LevelKey = (typeof LEVEL_KEYS)[number];

/** The fields a fade interpolates, all present. */
export type LightLevels = Record<LevelKey, number>;

export type DeviceDescriptor = {
  readonly address: string;
  readonly moduleName?: string;
  readonly mac?: string;
  readonly result: Readonly<Record<string, unknown>>;
};

export type CommandRequest =
  | { method: "getSystemConfig"; params: Record<string, never> }
  | { method: "getPilot"; params: Record<string, never> }
  | { method: "setPilot"; params: LightState };

export type WizReply = {
  method?: string;
  env?: string;
  result?: Record<string, unknown>;
  error?: { code?: number; message?: string };
};

export type TransitionPlan = {
  start: LightLevels;
  end: LightLevels;
  steps: number;
  durationMs: number;
  intervalMs: number;
};

export type FadeOutcome =
  | { status: "completed"; steps: number; elapsedMs: number; final: LightLevels }
  | { status: "cancelled"; stepsSent: number }
  | { status: "skipped"; reason: "no-device" };

export type Logger = (message: string) => void;
