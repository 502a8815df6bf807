// src/utils/sleep.ts
import { RequestAbortedError } from "../errors.js";

/** Resolve after `ms`; reject with RequestAbortedError if `signal` aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new RequestAbortedError({ cause: signal.reason }));

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestAbortedError({ cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
