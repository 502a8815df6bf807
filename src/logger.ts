// src/logger.ts
import { Writable } from "node:stream";
import { pino, type Logger } from "pino";
import { z } from "zod";

export type { Logger } from "pino";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOGGER_SERVICE_NAME: z.string().default("http-client"),
  NODE_ENV: z.enum(["production", "development", "test"]).default("development"),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

const loggerCache = new Map<string, Logger>();
let rootLogger: Logger | undefined;

function createRootLogger(): Logger {
  const env = validateLoggerEnv(process.env);
  const isTestEnv = env.NODE_ENV === "test" || process.env["VITEST"] === "true";

  const options = {
    base: { service: env.LOGGER_SERVICE_NAME, pid: process.pid },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnv) {
    // keep test output clean; tests that assert on logs inject their own logger
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(options, noopStream);
  }

  return pino(options);
}

/** Cached per-category child of the root logger. */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) rootLogger = createRootLogger();

  const logger = rootLogger.child({ category });
  loggerCache.set(category, logger);
  return logger;
}
