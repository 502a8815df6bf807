// src/client.ts
import { EventEmitter } from "node:events";
import { performance } from "node:perf_hooks";
import { CircuitBreaker, type BreakerTransition } from "./breaker.js";
import { DEFAULT_HEADERS, resolveClientConfig, type ClientConfig, type ClientConfigInput } from "./config.js";
import { CircuitBreakerOpenError, PipelineInvariantError, RequestAbortedError, httpStatusError } from "./errors.js";
import type { ResilientHttpEventName, ResilientHttpEvents } from "./events.js";
import { doHttpRequest } from "./http.js";
import { getLogger, type Logger } from "./logger.js";
import { decodePayload, encodePayload, validatePayload, type PayloadSchema } from "./payload.js";
import { computeBackoffMs, isRetryableError } from "./retry.js";
import type { ResilienceSnapshot } from "./snapshot.js";
import type { Clock, HttpMethod, JsonValue, Sleep, Transport } from "./types.js";
import { mergeHeaders } from "./utils/headers.js";
import { sleep } from "./utils/sleep.js";
import { joinUrl, redactUrl } from "./utils/url.js";

/** Collaborators the client calls out to. Each has a production default. */
export interface ClientEffects {
  transport: Transport;
  clock: Clock;
  sleep: Sleep;
  random: () => number;
}

export type ResilientHttpClientOptions = ClientConfigInput &
  Partial<ClientEffects> & {
    logger?: Logger;
  };

export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number; // overrides the client timeout for this call
}

export interface ValidatedRequestOptions<T> extends RequestOptions {
  schema: PayloadSchema<T>;
}

export interface PipelineOptions<T> extends RequestOptions {
  body?: unknown;
  schema?: PayloadSchema<T>;
}

const monotonicClock: Clock = { now: () => performance.now() };

function genRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * JSON HTTP client with retry, exponential backoff with jitter, and a
 * consecutive-failure circuit breaker shared by every call on the instance.
 */
export class ResilientHttpClient extends EventEmitter {
  readonly config: ClientConfig;

  private readonly breaker: CircuitBreaker;
  private readonly effects: ClientEffects;
  private readonly logger: Logger;

  // replaced, never mutated, so calls already under way keep their copy
  private defaultHeaders: Record<string, string>;

  constructor(options: ResilientHttpClientOptions) {
    super();

    const { transport, clock, sleep: sleepFn, random, logger, ...config } = options;
    this.config = resolveClientConfig(config);

    this.breaker = new CircuitBreaker({
      threshold: this.config.circuitBreakerThreshold,
      resetMs: this.config.circuitBreakerResetMs,
    });

    this.effects = {
      transport: transport ?? doHttpRequest,
      clock: clock ?? monotonicClock,
      sleep: sleepFn ?? sleep,
      random: random ?? Math.random,
    };

    this.logger = logger ?? getLogger("ResilientHttpClient");
    this.defaultHeaders = mergeHeaders(DEFAULT_HEADERS, this.config.headers);
  }

  get<T>(path: string, options: ValidatedRequestOptions<T>): Promise<T>;
  get(path: string, options?: RequestOptions): Promise<JsonValue>;
  get<T>(path: string, options: RequestOptions & { schema?: PayloadSchema<T> } = {}): Promise<T | JsonValue> {
    return this.execute("GET", path, options);
  }

  post<T>(path: string, body: unknown, options: ValidatedRequestOptions<T>): Promise<T>;
  post(path: string, body?: unknown, options?: RequestOptions): Promise<JsonValue>;
  post<T>(
    path: string,
    body?: unknown,
    options: RequestOptions & { schema?: PayloadSchema<T> } = {}
  ): Promise<T | JsonValue> {
    return this.execute("POST", path, { ...options, body });
  }

  put<T>(path: string, body: unknown, options: ValidatedRequestOptions<T>): Promise<T>;
  put(path: string, body?: unknown, options?: RequestOptions): Promise<JsonValue>;
  put<T>(
    path: string,
    body?: unknown,
    options: RequestOptions & { schema?: PayloadSchema<T> } = {}
  ): Promise<T | JsonValue> {
    return this.execute("PUT", path, { ...options, body });
  }

  delete<T>(path: string, options: ValidatedRequestOptions<T>): Promise<T>;
  delete(path: string, options?: RequestOptions): Promise<JsonValue>;
  delete<T>(path: string, options: RequestOptions & { schema?: PayloadSchema<T> } = {}): Promise<T | JsonValue> {
    return this.execute("DELETE", path, options);
  }

  /** Any verb through the same pipeline as the helpers above. */
  request<T>(method: HttpMethod, path: string, options: PipelineOptions<T> & { schema: PayloadSchema<T> }): Promise<T>;
  request(method: HttpMethod, path: string, options?: Omit<PipelineOptions<unknown>, "schema">): Promise<JsonValue>;
  request<T>(method: HttpMethod, path: string, options: PipelineOptions<T> = {}): Promise<T | JsonValue> {
    return this.execute(method, path, options);
  }

  /** Sets `Authorization: "{scheme} {token}"` for calls started from now on. */
  setAuthToken(token: string, scheme = "Bearer"): void {
    this.defaultHeaders = mergeHeaders(this.defaultHeaders, { Authorization: `${scheme} ${token}` });
    this.logger.info({ scheme }, "Authorization header set");
  }

  /** Observe resilience state. Never moves the breaker out of OPEN. */
  snapshot(): ResilienceSnapshot {
    const b = this.breaker.snapshot(this.effects.clock.now());
    return {
      failureStreak: b.failureStreak,
      circuitOpenUntil: b.openUntilMs,
      circuitOpen: b.state === "OPEN",
      state: b.state,
      maxRetries: this.config.maxRetries,
    };
  }

  /**
   * circuit check -> attempt -> record outcome -> retry eligibility -> backoff -> next attempt
   */
  private async execute<T>(method: HttpMethod, path: string, options: PipelineOptions<T>): Promise<T | JsonValue> {
    const { clock, transport, random } = this.effects;
    const { maxRetries, backoffFactorMs, jitterMs, circuitBreakerThreshold, circuitBreakerResetMs } = this.config;

    const url = joinUrl(this.config.baseUrl, path);
    // a malformed URL never reaches the breaker
    if (!URL.canParse(url)) throw new TypeError(`Invalid request URL: ${redactUrl(url)}`);
    const headers = mergeHeaders(this.defaultHeaders, options.headers);
    const body = encodePayload(options.body);
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const maxAttempts = maxRetries + 1;

    const requestId = genRequestId();
    const base = { requestId, method, url: redactUrl(url) };

    const decision = this.breaker.allow(clock.now());
    if (!decision.allowed) {
      const err = new CircuitBreakerOpenError(decision.retryAfterMs ?? 0);
      this.emitEvent("request:rejected", { ...base, error: err });
      throw err;
    }

    let holdsTrial = decision.trial === true;
    if (decision.cooldownExpired) {
      this.logger.warn({ requestId }, "Circuit cooldown expired, allowing a trial request");
      this.emitEvent("breaker:state", { from: "OPEN", to: "HALF_OPEN" });
    }

    try {
      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const event = { ...base, attempt, maxAttempts };
        const start = clock.now();

        this.logger.debug(
          { requestId },
          `Making HTTP request - ${method} ${base.url}, Attempt: ${attempt + 1}/${maxAttempts}`
        );
        this.emitEvent("request:start", event);

        let payload: T | JsonValue;
        let status: number;
        try {
          const res = await transport({ method, url, headers, body, timeoutMs, signal: options.signal });
          if (!isSuccessStatus(res.status)) {
            throw httpStatusError(res.status, url, new TextDecoder().decode(res.body));
          }

          const decoded = decodePayload(res.body);
          payload = options.schema ? validatePayload(options.schema, decoded) : decoded;
          status = res.status;
        } catch (err) {
          // cancellation says nothing about the upstream's health
          if (err instanceof RequestAbortedError) throw err;

          holdsTrial = false;
          const outcome = this.breaker.onFailure(clock.now());

          this.logger.warn(
            { requestId, err, failureStreak: outcome.streak },
            `Request failed - ${method} ${base.url}, Attempt: ${attempt + 1}/${maxAttempts}, Failure streak: ${outcome.streak}/${circuitBreakerThreshold}`
          );
          this.emitEvent("request:failure", {
            ...event,
            error: err,
            durationMs: clock.now() - start,
            failureStreak: outcome.streak,
          });

          if (outcome.opened) {
            this.logger.warn({ cooldownMs: circuitBreakerResetMs }, `Circuit opened for ${circuitBreakerResetMs}ms`);
          }
          this.emitTransition(outcome);

          const lastAttempt = attempt + 1 >= maxAttempts;
          if (lastAttempt || !isRetryableError(err)) throw err;

          const delayMs = computeBackoffMs(attempt, backoffFactorMs, jitterMs, random);
          this.logger.debug({ requestId, delayMs }, `Retrying in ${Math.round(delayMs)}ms`);
          this.emitEvent("request:retry", { ...event, error: err, delayMs });

          await this.effects.sleep(delayMs, options.signal);
          continue;
        }

        // outside the try: a throwing listener is not an upstream failure
        holdsTrial = false;
        this.emitTransition(this.breaker.onSuccess(clock.now()));
        this.emitEvent("request:success", { ...event, status, durationMs: clock.now() - start });
        return payload;
      }

      throw new PipelineInvariantError(`Attempt loop ended without a result (maxAttempts=${maxAttempts}).`);
    } finally {
      if (holdsTrial) this.breaker.release();
    }
  }

  private emitTransition(change: BreakerTransition): void {
    if (change.changed && change.from && change.to) {
      this.emitEvent("breaker:state", { from: change.from, to: change.to });
    }
  }

  private emitEvent<K extends ResilientHttpEventName>(name: K, payload: ResilientHttpEvents[K]): void {
    this.emit(name, payload);
  }
}
