// src/breaker.ts
import type { BreakerSnapshot } from "./snapshot.js";
import type { BreakerOptions, BreakerState } from "./types.js";
import { RollingWindow } from "./utils/rollingWindow.js";

export interface BreakerTransition {
  from: BreakerState;
  to: BreakerState;
}

/**
 * Proof of admission. Results are only counted against the state
 * generation that admitted the call.
 */
export interface BreakerPermit {
  readonly generation: number;
}

export type BreakerDecision =
  | { allowed: true; state: BreakerState; permit: BreakerPermit; transition?: BreakerTransition }
  | {
      allowed: false;
      state: BreakerState;
      retryAfterMs: number;
      transition?: BreakerTransition; // OPEN -> HALF_OPEN happens inside allow()
    };

/**
 * Circuit breaker for one upstream dependency.
 * - CLOSED: allow; record results in a count-based rolling window. After a
 *   failure, OPEN once the window holds >= minRequests calls and the
 *   failure rate is >= failureThreshold.
 * - OPEN: block until cooldownMs has passed, then HALF_OPEN.
 * - HALF_OPEN: at most halfOpenProbeCount trials in flight; CLOSED after that
 *   many successes, OPEN again (fresh cooldown) on any failure.
 *
 * Every method is synchronous, so each read-modify-write completes within
 * one turn of the event loop. Each transition starts a new generation; a
 * result reported with a permit from an older generation is ignored.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly opts: BreakerOptions;

  private current: BreakerState = "CLOSED";
  private generation = 0;
  private openedAtMs?: number;
  private readonly window: RollingWindow;

  // HALF_OPEN bookkeeping
  private halfOpenInFlight = 0;
  private halfOpenSuccesses = 0;

  constructor(opts: BreakerOptions) {
    if (!Number.isInteger(opts.windowSize) || opts.windowSize <= 0) throw new Error("windowSize must be > 0");
    if (!Number.isInteger(opts.minRequests) || opts.minRequests < 0) throw new Error("minRequests must be >= 0");
    if (opts.failureThreshold < 0 || opts.failureThreshold > 1) throw new Error("failureThreshold must be 0..1");
    if (!Number.isFinite(opts.cooldownMs) || opts.cooldownMs <= 0) throw new Error("cooldownMs must be > 0");
    if (!Number.isInteger(opts.halfOpenProbeCount) || opts.halfOpenProbeCount <= 0)
      throw new Error("halfOpenProbeCount must be > 0");
    this.opts = opts;
    this.name = opts.name;
    this.window = new RollingWindow(opts.windowSize);
  }

  /**
   * Decide whether an outbound call may start now.
   * If allowed, the caller MUST later pass the permit to exactly one of
   * `onSuccess`, `onFailure` or `release`.
   */
  allow(nowMs: number = Date.now()): BreakerDecision {
    let transition: BreakerTransition | undefined;

    if (this.current === "OPEN") {
      const elapsed = nowMs - (this.openedAtMs ?? nowMs);
      const remaining = this.opts.cooldownMs - elapsed;

      if (remaining > 0) {
        return { allowed: false, state: "OPEN", retryAfterMs: remaining };
      }

      this.toHalfOpen();
      transition = { from: "OPEN", to: "HALF_OPEN" };
    }

    if (this.current === "HALF_OPEN") {
      if (this.halfOpenInFlight >= this.opts.halfOpenProbeCount) {
        return { allowed: false, state: "HALF_OPEN", retryAfterMs: 0, transition };
      }
      this.halfOpenInFlight += 1;
      return { allowed: true, state: "HALF_OPEN", permit: this.permit(), transition };
    }

    return { allowed: true, state: "CLOSED", permit: this.permit() };
  }

  onSuccess(permit: BreakerPermit): BreakerTransition | undefined {
    if (this.isStale(permit)) return undefined;

    if (this.current === "HALF_OPEN") {
      this.halfOpenInFlight = Math.max(0, this.halfOpenInFlight - 1);
      this.halfOpenSuccesses += 1;

      if (this.halfOpenSuccesses >= this.opts.halfOpenProbeCount) {
        this.toClosed();
        return { from: "HALF_OPEN", to: "CLOSED" };
      }
      return undefined;
    }

    if (this.current === "CLOSED") this.window.record("success");
    return undefined;
  }

  onFailure(permit: BreakerPermit, nowMs: number = Date.now()): BreakerTransition | undefined {
    if (this.isStale(permit)) return undefined;

    if (this.current === "HALF_OPEN") {
      this.toOpen(nowMs);
      return { from: "HALF_OPEN", to: "OPEN" };
    }

    if (this.current === "CLOSED") {
      this.window.record("failure");

      if (this.window.count() >= this.opts.minRequests && this.window.failureRate() >= this.opts.failureThreshold) {
        this.toOpen(nowMs);
        return { from: "CLOSED", to: "OPEN" };
      }
    }

    return undefined;
  }

  /** Give back a permit whose call ended without a verdict (caller abort). */
  release(permit: BreakerPermit): void {
    if (this.isStale(permit)) return;

    if (this.current === "HALF_OPEN") {
      this.halfOpenInFlight = Math.max(0, this.halfOpenInFlight - 1);
    }
  }

  state(): BreakerState {
    return this.current;
  }

  snapshot(): BreakerSnapshot {
    return {
      name: this.name,
      state: this.current,
      openedAtMs: this.openedAtMs,
      halfOpenInFlight: this.halfOpenInFlight,
      windowCount: this.window.count(),
      windowFailures: this.window.failures(),
    };
  }

  private permit(): BreakerPermit {
    return { generation: this.generation };
  }

  // A late result from a call admitted under an earlier state.
  private isStale(permit: BreakerPermit): boolean {
    return permit.generation !== this.generation;
  }

  private toOpen(nowMs: number): void {
    this.generation += 1;
    this.current = "OPEN";
    this.openedAtMs = nowMs;

    // Keep rolling window intact, reset HALF_OPEN stats
    this.halfOpenInFlight = 0;
    this.halfOpenSuccesses = 0;
  }

  private toHalfOpen(): void {
    this.generation += 1;
    this.current = "HALF_OPEN";
    this.openedAtMs = undefined;

    this.halfOpenInFlight = 0;
    this.halfOpenSuccesses = 0;
  }

  private toClosed(): void {
    this.generation += 1;
    this.current = "CLOSED";
    this.openedAtMs = undefined;

    // Old history would re-open the breaker straight away.
    this.window.reset();

    this.halfOpenInFlight = 0;
    this.halfOpenSuccesses = 0;
  }
}
