import type { Logger } from 'pino';
import type { FileEvent } from '../../domain/index.js';
import { connectBroker, ensureStream, publish } from '../broker/index.js';
import type { BrokerConnection, RedisClientFactory, StreamSpec } from '../broker/index.js';

export interface PublishWorkerOptions {
  endpoint: string;
  identity: string;
  stream: StreamSpec;
  subject: string;
  log: Logger;
  connect: {
    maxRetries: number;
    initialDelayMs: number;
    timeoutMs?: number | undefined;
    commandTimeoutMs?: number | undefined;
  };
  /** Events held while the worker is busy; further events are dropped. */
  queueLimit?: number | undefined;
  createClient?: RedisClientFactory | undefined;
}

export interface PublishStats {
  enqueued: number;
  published: number;
  failed: number;
  rejected: number;
}

const DEFAULT_QUEUE_LIMIT = 1000;

/**
 * The producer's single long-lived publishing task.
 *
 * Owns the broker connection; watcher callbacks only `enqueue()`.
 * Events are published once each, in arrival order. A failed publish
 * drops the event (best-effort producer). A lost connection is
 * re-established before the next publish.
 *
 * On shutdown the queue is flushed while the connection is up, then the
 * connection is closed.
 */
export class PublishWorker {
  private readonly queue: FileEvent[] = [];
  private connection: BrokerConnection | null = null;
  private accepting = true;
  private wake: (() => void) | null = null;
  private readonly queueLimit: number;
  readonly stats: PublishStats = { enqueued: 0, published: 0, failed: 0, rejected: 0 };

  constructor(private readonly options: PublishWorkerOptions) {
    this.queueLimit = options.queueLimit ?? DEFAULT_QUEUE_LIMIT;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Connects and ensures the stream. Throws when either fails: the
   * producer cannot do anything useful without them.
   */
  async open(signal: AbortSignal): Promise<void> {
    const connection = await this.connect(signal);
    if (connection === null) {
      throw new Error(`Failed to provision stream '${this.options.stream.name}'`);
    }
    this.connection = connection;
  }

  enqueue(event: FileEvent): boolean {
    const { log } = this.options;

    if (!this.accepting) {
      this.stats.rejected++;
      log.warn({ path: event.path, operation: event.operation }, 'Shutting down, event not published');
      return false;
    }

    if (this.queue.length >= this.queueLimit) {
      this.stats.rejected++;
      log.warn({ path: event.path, queueLimit: this.queueLimit }, 'Publish queue full, event dropped');
      return false;
    }

    this.queue.push(event);
    this.stats.enqueued++;
    this.notify();
    return true;
  }

  /** Resolves after shutdown once the queue is drained and the connection closed. */
  async run(signal: AbortSignal): Promise<void> {
    const { log } = this.options;
    const stop = (): void => {
      this.accepting = false;
      this.notify();
    };

    if (signal.aborted) stop();
    else signal.addEventListener('abort', stop, { once: true });

    try {
      for (;;) {
        const event = this.queue.shift();
        if (event === undefined) {
          if (!this.accepting) break;
          await this.waitForWork();
          continue;
        }
        await this.publishOne(event, signal);
      }
    } finally {
      signal.removeEventListener('abort', stop);
      await this.connection?.close();
      this.connection = null;
      log.info({ stats: this.stats }, 'Publish worker stopped');
    }
  }

  private waitForWork(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async publishOne(event: FileEvent, signal: AbortSignal): Promise<void> {
    const { log, subject } = this.options;
    const connection = await this.ensureConnected(signal);

    if (connection === null) {
      this.stats.failed++;
      log.error({ path: event.path, operation: event.operation }, 'No broker connection, event dropped');
      return;
    }

    if (await publish(connection, subject, event, log)) {
      this.stats.published++;
      log.info({ path: event.path, operation: event.operation, subject }, 'Event published');
    } else {
      this.stats.failed++;
      log.warn({ path: event.path, operation: event.operation, subject }, 'Failed to publish event, event dropped');
    }
  }

  private async ensureConnected(signal: AbortSignal): Promise<BrokerConnection | null> {
    if (this.connection?.isConnected()) return this.connection;

    if (this.connection !== null) {
      await this.connection.close();
      this.connection = null;
    }

    // No reconnect attempts while shutting down.
    if (signal.aborted) return null;

    this.options.log.warn('Broker connection lost, reconnecting');
    try {
      this.connection = await this.connect(signal);
    } catch (err: unknown) {
      this.options.log.error({ err }, 'Reconnect failed');
    }
    return this.connection;
  }

  /**
   * Connect + ensure stream. Null when the stream cannot be provisioned;
   * throws the BrokerConnectError when the connection cannot be made.
   */
  private async connect(signal: AbortSignal): Promise<BrokerConnection | null> {
    const { log, stream } = this.options;
    const result = await connectBroker(
      {
        endpoint: this.options.endpoint,
        identity: this.options.identity,
        maxRetries: this.options.connect.maxRetries,
        initialDelayMs: this.options.connect.initialDelayMs,
        connectTimeoutMs: this.options.connect.timeoutMs,
        commandTimeoutMs: this.options.connect.commandTimeoutMs,
        signal,
      },
      log,
      { createClient: this.options.createClient },
    );
    if (!result.ok) throw result.error;

    if (!(await ensureStream(result.connection, stream, log))) {
      await result.connection.close();
      return null;
    }
    return result.connection;
  }
}
