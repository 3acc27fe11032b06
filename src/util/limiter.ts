export type LimiterOptions = {
  ratePerSec?: number;
  now?: () => number;
  pollMs?: number;
};

/** Token bucket gating how often tool calls may hit the bulbs. */
export class TokenBucketLimiter {
  private capacity: number;
  private tokens: number;
  private refillRatePerSec: number;
  private last: number;
  private now: () => number;
  private pollMs: number;

  constructor(opts: LimiterOptions = {}) {
    const rps = opts.ratePerSec ?? 10;
    this.capacity = Math.max(1, rps);
    this.tokens = this.capacity;
    this.refillRatePerSec = rps;
    this.now = opts.now ?? Date.now;
    this.pollMs = opts.pollMs ?? 50;
    this.last = this.now();
  }

  tryTake(): boolean {
    const now = this.now();
    const elapsed = (now - this.last) / 1000;
    this.last = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRatePerSec);
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  async take(): Promise<void> {
    while (!this.tryTake()) {
      await new Promise((r) => setTimeout(r, this.pollMs));
    }
  }
}
