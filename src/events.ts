import type { BreakerState, HttpMethod } from "./types.js";

export interface RequestEventBase {
  requestId: string; // generated per logical call, shared by its attempts
  method: HttpMethod;
  url: string; // redacted
}

export interface AttemptEvent extends RequestEventBase {
  attempt: number; // 0-based
  maxAttempts: number;
}

export interface RequestSuccessEvent extends AttemptEvent {
  status: number;
  durationMs: number;
}

export interface RequestFailureEvent extends AttemptEvent {
  error: unknown;
  durationMs: number;
  failureStreak: number;
}

export interface RequestRetryEvent extends AttemptEvent {
  error: unknown;
  delayMs: number;
}

export interface RequestRejectedEvent extends RequestEventBase {
  error: unknown;
}

export interface BreakerStateEvent {
  from: BreakerState;
  to: BreakerState;
}

export interface ResilientHttpEvents {
  "request:start": AttemptEvent;
  "request:success": RequestSuccessEvent;
  "request:failure": RequestFailureEvent;
  "request:retry": RequestRetryEvent;
  "request:rejected": RequestRejectedEvent;
  "breaker:state": BreakerStateEvent;
}

export type ResilientHttpEventName = keyof ResilientHttpEvents;
