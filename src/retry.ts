// src/retry.ts
import { isRetryable } from "./classifier.js";
import type { FailureClass, RetryOptions } from "./types.js";

/** Bookkeeping for one logical call. Never shared across calls. */
export interface RetryState {
  attempt: number;
  startedAtMs: number;
  lastDelayMs: number;
}

/**
 * Bounded retries with exponential backoff and jitter.
 *
 * Delays never decrease: each one is clamped to at least the previous
 * delay, so jitter and a Retry-After hint cannot shorten the sequence.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly multiplier: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(opts: RetryOptions, random: () => number = Math.random) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts <= 0) {
      throw new Error(`maxAttempts must be a positive integer (got ${opts.maxAttempts})`);
    }
    if (!Number.isFinite(opts.baseDelayMs) || opts.baseDelayMs < 0) {
      throw new Error(`baseDelayMs must be >= 0 (got ${opts.baseDelayMs})`);
    }
    if (!Number.isFinite(opts.maxDelayMs) || opts.maxDelayMs < opts.baseDelayMs) {
      throw new Error(`maxDelayMs must be >= baseDelayMs (got ${opts.maxDelayMs})`);
    }
    const multiplier = opts.multiplier ?? 2;
    if (!Number.isFinite(multiplier) || multiplier < 1) throw new Error("multiplier must be >= 1");
    const jitterRatio = opts.jitterRatio ?? 0.2;
    if (!Number.isFinite(jitterRatio) || jitterRatio < 0) throw new Error("jitterRatio must be >= 0");

    this.maxAttempts = opts.maxAttempts;
    this.baseDelayMs = opts.baseDelayMs;
    this.maxDelayMs = opts.maxDelayMs;
    this.multiplier = multiplier;
    this.jitterRatio = jitterRatio;
    this.random = random;
  }

  start(nowMs: number = Date.now()): RetryState {
    return { attempt: 0, startedAtMs: nowMs, lastDelayMs: 0 };
  }

  /** True when `cls` is worth another attempt and the budget allows one. */
  shouldRetry(cls: FailureClass, state: RetryState): boolean {
    return isRetryable(cls) && state.attempt < this.maxAttempts;
  }

  /**
   * Delay before the attempt following `state.attempt`. Records the result
   * on `state`.
   */
  nextDelay(state: RetryState, retryAfterMs?: number): number {
    const exponent = Math.max(0, state.attempt - 1);
    const raw = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(this.multiplier, exponent));
    let delay = Math.min(this.maxDelayMs, raw * (1 + this.jitterRatio * this.random()));

    if (retryAfterMs !== undefined) {
      delay = Math.max(delay, Math.min(retryAfterMs, this.maxDelayMs));
    }

    delay = Math.round(Math.max(delay, state.lastDelayMs));
    state.lastDelayMs = delay;
    return delay;
  }
}
