// src/http.ts
import { request as undiciRequest } from "undici";
import { RequestAbortedError, RequestTimeoutError, TransportError } from "./errors.js";
import type { TransportRequest, TransportResponse } from "./types.js";

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (v !== undefined) out[k.toLowerCase()] = v;
  }
  return out;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Execute a single HTTP request with a hard timeout using AbortController.
 * No retries. No breaker. Any status resolves; only a missing response rejects.
 */
export async function doHttpRequest(req: TransportRequest): Promise<TransportResponse> {
  if (req.signal?.aborted) throw new RequestAbortedError({ cause: req.signal.reason });

  const ac = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    ac.abort();
  }, req.timeoutMs);
  const onCallerAbort = () => ac.abort();
  req.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const res = await undiciRequest(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: ac.signal,
    });

    const body = await res.body.arrayBuffer();
    return {
      status: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: new Uint8Array(body),
    };
  } catch (err) {
    if (req.signal?.aborted) throw new RequestAbortedError({ cause: err });
    if (timedOut) throw new RequestTimeoutError(req.timeoutMs);

    const code = errorCode(err);
    // malformed requests are caller bugs, not connectivity failures
    if (err instanceof TypeError || code === "UND_ERR_INVALID_ARG") throw err;

    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Transport failure: ${message}`, { code, cause: err });
  } finally {
    clearTimeout(timer);
    req.signal?.removeEventListener("abort", onCallerAbort);
  }
}
