import { createLogger } from "./logger.ts";

const log = createLogger("governor");

export const DEFAULT_DAILY_QUOTA = 10_000;
export const QUOTA_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * Who is asking. Routine polling stops at the reserve threshold so that user
 * commands always find headroom; commands may drain the budget to zero.
 */
export type CallPriority = "poll" | "command";

export type Grant =
  | { granted: true; remaining: number }
  | { granted: false; retryAfterMs: number };

export interface RateLedger {
  quota: number;
  used: number;
  remaining: number;
  reserve: number;
  windowStart: number;
  resetsAt: number;
}

export interface RateGovernorOptions {
  quota?: number;
  reserve?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * Fixed call budget shared by every outbound API call, replenished on a
 * rolling window anchored at construction time
 */
export class RateGovernor {
  private readonly quota: number;
  private readonly reserve: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private windowStart: number;
  private used = 0;

  constructor({
    quota = DEFAULT_DAILY_QUOTA,
    reserve = 0,
    windowMs = QUOTA_WINDOW_MS,
    now = Date.now,
  }: RateGovernorOptions = {}) {
    if (quota < 1) {
      throw new RangeError(`Quota must be positive, got ${quota}`);
    }
    this.quota = quota;
    this.reserve = Math.min(Math.max(reserve, 0), quota);
    this.windowMs = windowMs;
    this.now = now;
    this.windowStart = now();
  }

  /**
   * Takes one call from the budget, or tells the caller how long until the
   * window resets. Check and decrement happen in one synchronous step.
   */
  tryAcquire = (priority: CallPriority = "command"): Grant => {
    this.roll();
    const floor = priority === "poll" ? this.reserve : 0;
    const remaining = this.quota - this.used;

    if (remaining <= floor) {
      const retryAfterMs = this.resetsAt() - this.now();
      log.debug("quota.denied", { priority, remaining, retryAfterMs });
      return { granted: false, retryAfterMs };
    }

    this.used += 1;
    return { granted: true, remaining: remaining - 1 };
  };

  /**
   * The API answered 429: whatever we counted, the remote budget is gone
   * until the window resets.
   */
  exhaust = (): void => {
    this.roll();
    if (this.used < this.quota) {
      log.warn("quota.exhausted_remotely", {
        counted: this.used,
        quota: this.quota,
      });
    }
    this.used = this.quota;
  };

  get remaining(): number {
    this.roll();
    return this.quota - this.used;
  }

  ledger = (): RateLedger => {
    this.roll();
    return {
      quota: this.quota,
      used: this.used,
      remaining: this.quota - this.used,
      reserve: this.reserve,
      windowStart: this.windowStart,
      resetsAt: this.resetsAt(),
    };
  };

  private resetsAt = () => this.windowStart + this.windowMs;

  private roll(): void {
    const elapsed = this.now() - this.windowStart;
    if (elapsed < this.windowMs) {
      return;
    }
    const windows = Math.floor(elapsed / this.windowMs);
    this.windowStart += windows * this.windowMs;
    log.info("quota.reset", { used: this.used, quota: this.quota });
    this.used = 0;
  }
}
