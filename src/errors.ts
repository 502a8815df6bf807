export abstract class ResilientHttpError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CircuitBreakerOpenError extends ResilientHttpError {
  constructor(public readonly retryAfterMs: number) {
    super(`Circuit breaker is open (retryAfterMs=${Math.ceil(retryAfterMs)}).`);
  }

  get remainingSeconds(): number {
    return this.retryAfterMs / 1000;
  }
}

/** No response was obtained: DNS, connect, reset or timeout. */
export class TransportError extends ResilientHttpError {
  public readonly code?: string;
  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.code = options?.code;
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out (timeoutMs=${timeoutMs}).`, { code: "ETIMEDOUT" });
  }
}

/** A response was obtained, but its status is not 2xx. */
export class HttpStatusError extends ResilientHttpError {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string
  ) {
    super(`Upstream returned error status=${status} for ${url}.`);
  }
}

export class RemoteClientError extends HttpStatusError {}

export class RemoteServerError extends HttpStatusError {}

export function httpStatusError(status: number, url: string, body: string): HttpStatusError {
  if (status >= 500 && status <= 599) return new RemoteServerError(status, url, body);
  if (status >= 400 && status <= 499) return new RemoteClientError(status, url, body);
  return new HttpStatusError(status, url, body);
}

export class PayloadError extends ResilientHttpError {}

export class RequestAbortedError extends ResilientHttpError {
  constructor(options?: { cause?: unknown }) {
    super("Request was aborted by the caller.", options);
  }
}

export class InvalidClientConfigError extends ResilientHttpError {
  constructor(public readonly issues: string[]) {
    super(`Invalid client config: ${issues.join("; ")}`);
  }
}

export class PipelineInvariantError extends ResilientHttpError {}
