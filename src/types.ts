export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array; // raw; the client decodes JSON
}

/**
 * One network exchange. Resolves with any status the server sent;
 * rejects with a TransportError when no response was obtained.
 */
export type Transport = (req: TransportRequest) => Promise<TransportResponse>;

/** Monotonic time source in milliseconds. */
export interface Clock {
  now(): number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type BreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface BreakerOptions {
  threshold: number; // consecutive failures that open the circuit
  resetMs: number; // how long the circuit stays open
}
