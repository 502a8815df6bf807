import type { BreakerState } from "./types.js";

export interface ResilienceSnapshot {
  failureStreak: number;
  circuitOpenUntil?: number; // monotonic ms; undefined while closed
  circuitOpen: boolean; // live: false once the cooldown has elapsed
  state: BreakerState;
  maxRetries: number;
}
