// src/breaker.ts
import type { BreakerOptions, BreakerState } from "./types.js";

export interface BreakerDecision {
  allowed: boolean;
  state: BreakerState;
  retryAfterMs?: number; // only when blocked
  trial?: boolean; // this call is the single HALF_OPEN probe
  cooldownExpired?: boolean; // this decision moved OPEN -> HALF_OPEN
}

export interface BreakerTransition {
  changed: boolean;
  from?: BreakerState;
  to?: BreakerState;
}

export interface FailureOutcome extends BreakerTransition {
  /** streak after this failure, before any reset caused by opening */
  streak: number;
  /** this failure set a new cooldown, whether or not the state changed */
  opened: boolean;
}

export interface BreakerSnapshot {
  state: BreakerState;
  failureStreak: number;
  openUntilMs?: number;
  trialInFlight: boolean;
}

/**
 * Process-local consecutive-failure circuit breaker.
 * - CLOSED: allow; count consecutive failures; OPEN once the streak reaches threshold.
 * - OPEN: block until openUntilMs, then HALF_OPEN on the next allow().
 * - HALF_OPEN: admit exactly one trial; close on success, re-open on failure.
 *
 * Every method is synchronous, so each read-check-write runs to completion
 * before any other caller observes the state.
 */
export class CircuitBreaker {
  private readonly opts: BreakerOptions;

  private failureStreak = 0;
  private openUntilMs?: number;
  private halfOpen = false;
  private trialInFlight = false;

  constructor(opts: BreakerOptions) {
    if (!Number.isInteger(opts.threshold) || opts.threshold < 1) throw new Error("threshold must be an integer >= 1");
    if (!Number.isFinite(opts.resetMs) || opts.resetMs < 0) throw new Error("resetMs must be >= 0");
    this.opts = opts;
  }

  /**
   * Decide whether an outbound call may start.
   * If allowed with `trial`, caller MUST later call `onSuccess`, `onFailure` or `release`.
   */
  allow(nowMs: number): BreakerDecision {
    if (this.openUntilMs !== undefined) {
      const remaining = this.openUntilMs - nowMs;
      if (remaining > 0) {
        return { allowed: false, state: "OPEN", retryAfterMs: remaining };
      }

      // cooldown passed -> HALF_OPEN, this caller becomes the trial
      this.openUntilMs = undefined;
      this.halfOpen = true;
      this.trialInFlight = true;
      return { allowed: true, state: "HALF_OPEN", trial: true, cooldownExpired: true };
    }

    if (this.halfOpen) {
      if (this.trialInFlight) {
        return { allowed: false, state: "HALF_OPEN", retryAfterMs: 0 };
      }
      this.trialInFlight = true;
      return { allowed: true, state: "HALF_OPEN", trial: true };
    }

    return { allowed: true, state: "CLOSED" };
  }

  onSuccess(nowMs: number): BreakerTransition {
    const from = this.state(nowMs);

    this.failureStreak = 0;
    this.openUntilMs = undefined;
    this.halfOpen = false;
    this.trialInFlight = false;

    return from === "CLOSED" ? { changed: false } : { changed: true, from, to: "CLOSED" };
  }

  onFailure(nowMs: number): FailureOutcome {
    if (this.halfOpen) {
      this.toOpen(nowMs);
      return { changed: true, from: "HALF_OPEN", to: "OPEN", streak: 1, opened: true };
    }

    this.failureStreak += 1;
    const streak = this.failureStreak;

    // also reached by calls that started before another caller opened the circuit
    if (streak >= this.opts.threshold) {
      const from = this.state(nowMs);
      this.toOpen(nowMs);
      return from === "OPEN"
        ? { changed: false, streak, opened: true }
        : { changed: true, from, to: "OPEN", streak, opened: true };
    }

    return { changed: false, streak, opened: false };
  }

  /** Give back an unresolved HALF_OPEN trial (e.g. the caller aborted). */
  release(): void {
    if (this.halfOpen) this.trialInFlight = false;
  }

  /** Observe the live state. Applies the cooldown check without mutating anything. */
  state(nowMs: number): BreakerState {
    if (this.openUntilMs !== undefined) return nowMs < this.openUntilMs ? "OPEN" : "HALF_OPEN";
    return this.halfOpen ? "HALF_OPEN" : "CLOSED";
  }

  isOpen(nowMs: number): boolean {
    return this.state(nowMs) === "OPEN";
  }

  snapshot(nowMs: number): BreakerSnapshot {
    return {
      state: this.state(nowMs),
      failureStreak: this.failureStreak,
      openUntilMs: this.openUntilMs,
      trialInFlight: this.trialInFlight,
    };
  }

  private toOpen(nowMs: number): void {
    this.openUntilMs = nowMs + this.opts.resetMs;
    this.failureStreak = 0;
    this.halfOpen = false;
    this.trialInFlight = false;
  }
}
