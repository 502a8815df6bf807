// src/retry.ts
import { HttpStatusError, TransportError } from "./errors.js";

/**
 * Connectivity failures always retry; a status error retries only for 5xx.
 * Anything else (4xx, payload errors, unknown throws) surfaces on first occurrence.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof TransportError) return true;
  if (err instanceof HttpStatusError) return err.status >= 500 && err.status <= 599;
  return false;
}

/** backoffFactorMs * 2^attempt + U(0, jitterMs), attempt counted from 0. */
export function computeBackoffMs(
  attempt: number,
  backoffFactorMs: number,
  jitterMs: number,
  random: () => number = Math.random
): number {
  return backoffFactorMs * Math.pow(2, attempt) + random() * jitterMs;
}
