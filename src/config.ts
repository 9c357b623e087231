import { join, resolve } from 'node:path';
import { z } from 'zod';

/**
 * Runtime configuration for the producer and consumer processes.
 *
 * Values come from environment variables. Every variable is optional;
 * the defaults match a local Redis and the `test/` directories beside
 * the working directory.
 */
export interface AppConfig {
  redisUrl: string;
  logLevel: string;
  storageDir: string;
  monitorDir: string;
  logFile: string;
  connect: {
    maxRetries: number;
    retryDelayMs: number;
    timeoutMs: number;
    /** Per-command limit; the consumer adds its fetch timeout on top. */
    commandTimeoutMs: number;
  };
  reconnectDelayMs: number;
  fetch: {
    batchSize: number;
    timeoutMs: number;
  };
  publishQueueLimit: number;
  health: { port: number; host: string } | null;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STORAGE_DIR: z.string().min(1).optional(),
  MONITOR_DIR: z.string().min(1).optional(),
  LOG_FILE: z.string().min(1).optional(),
  CONNECT_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  CONNECT_RETRY_DELAY_MS: positiveInt.default(2000),
  CONNECT_TIMEOUT_MS: positiveInt.default(10_000),
  COMMAND_TIMEOUT_MS: positiveInt.default(5000),
  RECONNECT_DELAY_MS: positiveInt.default(2000),
  FETCH_BATCH_SIZE: positiveInt.default(1),
  FETCH_TIMEOUT_MS: positiveInt.default(1000),
  PUBLISH_QUEUE_LIMIT: positiveInt.default(1000),
  HEALTH_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
  HEALTH_HOST: z.string().min(1).default('0.0.0.0'),
});

/**
 * Parses and validates the environment.
 *
 * Empty strings are treated as unset so `FOO= npm start` falls back to
 * the default instead of failing validation.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  const storageDir = resolve(cwd, e.STORAGE_DIR ?? join('test', 'storage'));
  const monitorDir = resolve(cwd, e.MONITOR_DIR ?? join('test', 'monitor'));

  return {
    redisUrl: e.REDIS_URL,
    logLevel: e.LOG_LEVEL,
    storageDir,
    monitorDir,
    logFile: e.LOG_FILE !== undefined ? resolve(cwd, e.LOG_FILE) : join(monitorDir, 'storage_monitor.log'),
    connect: {
      maxRetries: e.CONNECT_MAX_RETRIES,
      retryDelayMs: e.CONNECT_RETRY_DELAY_MS,
      timeoutMs: e.CONNECT_TIMEOUT_MS,
      commandTimeoutMs: e.COMMAND_TIMEOUT_MS,
    },
    reconnectDelayMs: e.RECONNECT_DELAY_MS,
    fetch: {
      batchSize: e.FETCH_BATCH_SIZE,
      timeoutMs: e.FETCH_TIMEOUT_MS,
    },
    publishQueueLimit: e.PUBLISH_QUEUE_LIMIT,
    health: e.HEALTH_PORT !== undefined ? { port: e.HEALTH_PORT, host: e.HEALTH_HOST } : null,
  };
}
