// src/config.ts
import { z } from "zod";
import { InvalidClientConfigError } from "./errors.js";

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "Content-Type": "application/json",
  Accept: "application/json",
});

export const clientConfigSchema = z.object({
  baseUrl: z
    .string()
    .trim()
    .min(1, { message: "baseUrl must not be empty" })
    .transform((val: string) => val.replace(/\/+$/, "")),
  timeoutMs: z.number().finite().positive().default(30_000),
  headers: z.record(z.string()).default({}),
  maxRetries: z.number().int().min(0).default(2),
  backoffFactorMs: z.number().finite().min(0).default(500),
  jitterMs: z.number().finite().min(0).default(100),
  circuitBreakerThreshold: z.number().int().min(1).default(5),
  circuitBreakerResetMs: z.number().finite().min(0).default(30_000),
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;

export type ClientConfig = Readonly<z.output<typeof clientConfigSchema>>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Apply defaults and validate. The returned config is frozen;
 * `headers` holds only the caller's overrides, not the defaults.
 */
export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  const parsed = clientConfigSchema.safeParse(input);
  if (!parsed.success) throw new InvalidClientConfigError(formatIssues(parsed.error));
  return Object.freeze({ ...parsed.data, headers: Object.freeze({ ...parsed.data.headers }) });
}

const envNumber = z.coerce.number().finite().optional();

export const clientEnvSchema = z.object({
  HTTP_CLIENT_BASE_URL: z.string().trim().min(1, { message: "HTTP_CLIENT_BASE_URL is required" }),
  HTTP_CLIENT_TIMEOUT_MS: envNumber,
  HTTP_CLIENT_MAX_RETRIES: envNumber,
  HTTP_CLIENT_BACKOFF_FACTOR_MS: envNumber,
  HTTP_CLIENT_JITTER_MS: envNumber,
  HTTP_CLIENT_BREAKER_THRESHOLD: envNumber,
  HTTP_CLIENT_BREAKER_RESET_MS: envNumber,
});

/** Build client config input from environment variables (unset keys fall back to defaults). */
export function clientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfigInput {
  const parsed = clientEnvSchema.safeParse(env);
  if (!parsed.success) throw new InvalidClientConfigError(formatIssues(parsed.error));
  const e = parsed.data;

  return {
    baseUrl: e.HTTP_CLIENT_BASE_URL,
    timeoutMs: e.HTTP_CLIENT_TIMEOUT_MS,
    maxRetries: e.HTTP_CLIENT_MAX_RETRIES,
    backoffFactorMs: e.HTTP_CLIENT_BACKOFF_FACTOR_MS,
    jitterMs: e.HTTP_CLIENT_JITTER_MS,
    circuitBreakerThreshold: e.HTTP_CLIENT_BREAKER_THRESHOLD,
    circuitBreakerResetMs: e.HTTP_CLIENT_BREAKER_RESET_MS,
  };
}
