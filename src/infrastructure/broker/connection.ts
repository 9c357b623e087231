import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { sleep as defaultSleep } from '../timers.js';

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

export type ConnectionState = 'disconnected' | 'connected';

export interface ConnectOptions {
  endpoint: string;
  /** Client name, visible broker-side via CLIENT LIST. */
  identity: string;
  maxRetries: number;
  initialDelayMs: number;
  connectTimeoutMs?: number | undefined;
  /**
   * Client-side limit on any single command. A blocking read must be given
   * more than its server-side block time.
   */
  commandTimeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface ClientTimeouts {
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

export type RedisClientFactory = (endpoint: string, identity: string, timeouts: ClientTimeouts) => Redis;

export interface ConnectDeps {
  createClient?: RedisClientFactory | undefined;
  sleep?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined;
}

/**
 * - `exhausted`: every attempt failed with a transient error.
 * - `fatal`: a non-transient error, no retries were spent.
 * - `aborted`: shutdown was requested while retrying.
 */
export type ConnectFailureReason = 'exhausted' | 'fatal' | 'aborted';

export class BrokerConnectError extends Error {
  constructor(
    readonly reason: ConnectFailureReason,
    readonly endpoint: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`Could not connect to broker at ${endpoint} (${reason} after ${attempts} attempt(s))`, { cause });
    this.name = 'BrokerConnectError';
  }
}

export type ConnectResult =
  | { ok: true; connection: BrokerConnection }
  | { ok: false; error: BrokerConnectError };

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

const TRANSIENT_MESSAGES = [
  /connection is closed/i,
  /connect ETIMEDOUT/i,
  /stream isn't writeable/i,
  /command timed out/i,
];

/** Timeouts, dropped connections, silent peers and unreachable servers. */
export function isTransientBrokerError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)) return true;
  return TRANSIENT_MESSAGES.some((pattern) => pattern.test(err.message));
}

/**
 * ioredis client tuned for a connection whose lifecycle is owned by the
 * caller: no lazy offline queue and no built-in reconnect.
 */
export const createRedisClient: RedisClientFactory = (endpoint, identity, timeouts) =>
  new Redis(endpoint, {
    connectionName: identity,
    connectTimeout: timeouts.connectTimeoutMs,
    commandTimeout: timeouts.commandTimeoutMs,
    lazyConnect: true,
    enableReadyCheck: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: null,
    retryStrategy: () => null,
  });

/**
 * One logical broker session, owned by exactly one component.
 */
export class BrokerConnection {
  private closed = false;

  /** Subject → stream bindings learned while provisioning on this session. */
  readonly subjectBindings = new Map<string, string>();

  constructor(
    readonly endpoint: string,
    readonly identity: string,
    readonly redis: Redis,
    private readonly log: Logger,
  ) {}

  get state(): ConnectionState {
    return this.isConnected() ? 'connected' : 'disconnected';
  }

  isConnected(): boolean {
    return !this.closed && this.redis.status === 'ready';
  }

  /** Idempotent. Never throws. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.redis.status === 'end') return;

    try {
      await this.redis.quit();
      this.log.info({ endpoint: this.endpoint, identity: this.identity }, 'Broker connection closed');
    } catch (err: unknown) {
      this.log.warn({ err, identity: this.identity }, 'Graceful broker disconnect failed, forcing');
      this.redis.disconnect();
    }
  }
}

/**
 * Connects with exponential backoff.
 *
 * Transient failures are retried up to `maxRetries` times; the delay before
 * retry k is `initialDelayMs * 2^(k-1)`. A non-transient failure returns
 * immediately. Every attempt uses a fresh client.
 *
 * ioredis rejects a failed handshake with a generic "Connection is closed."
 * and reports the underlying cause (refused socket, WRONGPASS, NOAUTH) as an
 * `error` event, so the last emitted error is what gets classified.
 */
export async function connectBroker(
  options: ConnectOptions,
  log: Logger,
  deps: ConnectDeps = {},
): Promise<ConnectResult> {
  const createClient = deps.createClient ?? createRedisClient;
  const sleep = deps.sleep ?? defaultSleep;
  const timeouts: ClientTimeouts = {
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    commandTimeoutMs: options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
  };
  const maxAttempts = options.maxRetries + 1;
  const { endpoint, identity, signal } = options;

  let delay = options.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return { ok: false, error: new BrokerConnectError('aborted', endpoint, attempt - 1) };
    }

    const client = createClient(endpoint, identity, timeouts);
    const lastEmitted: { error: unknown } = { error: undefined };
    client.on('error', (err: unknown) => {
      lastEmitted.error = err;
      log.debug({ err, identity }, 'Redis client error');
    });

    try {
      await client.connect();
      log.info({ endpoint, identity, attempt }, 'Connected to broker');
      return { ok: true, connection: new BrokerConnection(endpoint, identity, client, log) };
    } catch (rejection: unknown) {
      client.disconnect();
      const err = lastEmitted.error ?? rejection;

      if (!isTransientBrokerError(err)) {
        log.error({ err, endpoint, identity }, 'Unexpected error connecting to broker');
        return { ok: false, error: new BrokerConnectError('fatal', endpoint, attempt, err) };
      }

      if (attempt >= maxAttempts) {
        log.error(
          { err, endpoint, identity, attempts: attempt },
          'Failed to connect to broker, giving up. Is the server running and reachable?',
        );
        return { ok: false, error: new BrokerConnectError('exhausted', endpoint, attempt, err) };
      }

      log.warn(
        { err, endpoint, attempt, maxAttempts, retryInMs: delay },
        'Broker connection failed, retrying',
      );
      await sleep(delay, signal);
      delay *= 2;
    }
  }
}
