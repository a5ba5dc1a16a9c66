export interface RateLimitDecision {
  allowed: boolean;
  /** Seconds until the caller's window resets; 0 when allowed. */
  retryAfterSeconds: number;
}

export interface RateLimiter {
  consume(key: string): RateLimitDecision;
}

interface Window {
  count: number;
  resetAt: number;
}

/**
 * Fixed-window counter per key. Single instance only: each API process
 * keeps its own windows.
 */
export class InMemoryRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, Window>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  consume(key: string): RateLimitDecision {
    const now = this.clock();
    let window = this.windows.get(key);

    if (!window || now >= window.resetAt) {
      window = { count: 0, resetAt: now + this.windowMs };
      this.windows.set(key, window);
    }

    if (window.count >= this.maxPerWindow) {
      return { allowed: false, retryAfterSeconds: Math.ceil((window.resetAt - now) / 1000) };
    }

    window.count++;
    return { allowed: true, retryAfterSeconds: 0 };
  }

  /** Drops windows that have already reset. */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
