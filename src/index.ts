export { ResilientHttpClient } from "./client.js";
export type {
  ClientEffects,
  PipelineOptions,
  RequestOptions,
  ResilientHttpClientOptions,
  ValidatedRequestOptions,
} from "./client.js";
export { CircuitBreaker } from "./breaker.js";
export type { BreakerDecision, BreakerSnapshot, BreakerTransition, FailureOutcome } from "./breaker.js";
export { DEFAULT_HEADERS, clientConfigFromEnv, clientConfigSchema, resolveClientConfig } from "./config.js";
export type { ClientConfig, ClientConfigInput } from "./config.js";
export {
  CircuitBreakerOpenError,
  HttpStatusError,
  InvalidClientConfigError,
  PayloadError,
  PipelineInvariantError,
  RemoteClientError,
  RemoteServerError,
  RequestAbortedError,
  RequestTimeoutError,
  ResilientHttpError,
  TransportError,
} from "./errors.js";
export type * from "./events.js";
export { doHttpRequest } from "./http.js";
export { getLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { decodePayload, encodePayload } from "./payload.js";
export type { PayloadSchema } from "./payload.js";
export { computeBackoffMs, isRetryableError } from "./retry.js";
export type { ResilienceSnapshot } from "./snapshot.js";
export type * from "./types.js";
