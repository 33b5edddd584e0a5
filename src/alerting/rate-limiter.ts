/**
 * In-process alert throttling state.
 *
 * Both structures are plain keyed maps; entries past their window are
 * dropped by sweep(), which the Alert Manager calls once per batch.
 */

interface WindowState {
  windowStart: number;
  count: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  /** Slots left in the current window after this decision */
  remaining: number;
  /** Epoch ms at which the current window closes */
  resetAt: number;
}

/**
 * Fixed-window limiter: at most `quota` acquisitions per key per `windowMs`.
 */
export class FixedWindowRateLimiter {
  private readonly windows = new Map<string, WindowState>();

  constructor(
    private readonly windowMs: number,
    private readonly quota: number
  ) {}

  tryAcquire(key: string, now: number): RateLimitDecision {
    let state = this.windows.get(key);

    if (!state || now - state.windowStart >= this.windowMs) {
      state = { windowStart: now, count: 0 };
      this.windows.set(key, state);
    }

    const resetAt = state.windowStart + this.windowMs;

    if (state.count >= this.quota) {
      return { allowed: false, remaining: 0, resetAt };
    }

    state.count++;
    return { allowed: true, remaining: this.quota - state.count, resetAt };
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [key, state] of this.windows) {
      if (now - state.windowStart >= this.windowMs) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.windows.size;
  }
}

/**
 * Tracks the last time a key fired; a key is cooling down for `cooldownMs` after that.
 */
export class CooldownTracker {
  private readonly lastFired = new Map<string, number>();

  constructor(private readonly cooldownMs: number) {}

  isCoolingDown(key: string, now: number): boolean {
    const last = this.lastFired.get(key);
    return last !== undefined && now - last < this.cooldownMs;
  }

  record(key: string, now: number): void {
    this.lastFired.set(key, now);
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [key, last] of this.lastFired) {
      if (now - last >= this.cooldownMs) {
        this.lastFired.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.lastFired.size;
  }
}
