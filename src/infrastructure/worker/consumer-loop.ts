import type { Logger } from 'pino';
import { decodeFileEvent } from '../../application/index.js';
import type { EventSink } from '../sink/index.js';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  PullSubscription,
  connectBroker,
  ensureConsumer,
  ensureStream,
  isTransientBrokerError,
} from '../broker/index.js';
import type {
  BrokerConnection,
  ConsumerSpec,
  RedisClientFactory,
  StreamMessage,
  StreamSpec,
} from '../broker/index.js';
import { sleep } from '../timers.js';

export type ConsumerLoopState = 'disconnected' | 'provisioning' | 'polling' | 'draining' | 'stopped';

export interface ConsumerLoopOptions {
  endpoint: string;
  identity: string;
  stream: StreamSpec;
  consumer: ConsumerSpec;
  sink: EventSink;
  log: Logger;
  /** Shutdown request. Checked between fetches; never interrupts a message mid-flight. */
  signal: AbortSignal;
  connect: {
    maxRetries: number;
    initialDelayMs: number;
    timeoutMs?: number | undefined;
    /** Allowance on top of the fetch block time before a command is abandoned. */
    commandTimeoutMs?: number | undefined;
  };
  batchSize?: number | undefined;
  fetchTimeoutMs?: number | undefined;
  /** Wait before reconnecting or re-provisioning. */
  reconnectDelayMs?: number | undefined;
  /** Wait after a non-connection fetch error. */
  idleDelayMs?: number | undefined;
  createClient?: RedisClientFactory | undefined;
}

export interface ConsumerStats {
  received: number;
  recorded: number;
  decodeFailures: number;
  sinkFailures: number;
  acked: number;
  ackFailures: number;
  reconnects: number;
}

export interface ConsumerHealth {
  state: ConsumerLoopState;
  connected: boolean;
  stats: Readonly<ConsumerStats>;
}

const DEFAULT_BATCH_SIZE = 1;
const DEFAULT_FETCH_TIMEOUT_MS = 1000;
const DEFAULT_RECONNECT_DELAY_MS = 2000;
const DEFAULT_IDLE_DELAY_MS = 1000;

function isMissingGroup(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith('NOGROUP');
}

/**
 * Pull consumer state machine.
 *
 *   disconnected → provisioning → polling
 *        ↑______________|______________|   (provisioning failure / connection loss / group lost)
 *   any → draining → stopped                (shutdown signal)
 *
 * Per message: decode → sink.record → XACK. Every delivered message is
 * acknowledged exactly once, whatever the decode or sink outcome, so a
 * poison message is never redelivered. Failures are logged, not retried.
 *
 * On entering `polling` the loop first re-reads its own pending entries
 * list, recovering messages delivered before a crash but never acked.
 */
export class PullConsumerLoop {
  private currentState: ConsumerLoopState = 'disconnected';
  private connection: BrokerConnection | null = null;
  private everConnected = false;
  private readonly stats: ConsumerStats = {
    received: 0,
    recorded: 0,
    decodeFailures: 0,
    sinkFailures: 0,
    acked: 0,
    ackFailures: 0,
    reconnects: 0,
  };

  private readonly batchSize: number;
  private readonly fetchTimeoutMs: number;
  private readonly reconnectDelayMs: number;
  private readonly idleDelayMs: number;
  private readonly commandTimeoutMs: number;

  constructor(private readonly options: ConsumerLoopOptions) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.idleDelayMs = options.idleDelayMs ?? DEFAULT_IDLE_DELAY_MS;
    // A blocking read legitimately stays silent for the whole fetch timeout.
    this.commandTimeoutMs = this.fetchTimeoutMs + (options.connect.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS);
  }

  get state(): ConsumerLoopState {
    return this.currentState;
  }

  health(): ConsumerHealth {
    return {
      state: this.currentState,
      connected: this.connection?.isConnected() ?? false,
      stats: { ...this.stats },
    };
  }

  /**
   * Runs until the shutdown signal fires, then closes the connection.
   *
   * Rejects with a BrokerConnectError only when the very first connection
   * cannot be established; later connection losses are retried forever.
   */
  async run(): Promise<void> {
    const { signal, log } = this.options;

    try {
      while (!signal.aborted) {
        const connection = await this.ensureConnected();
        if (connection === null) continue;

        this.transition('provisioning');
        if (!(await this.provision(connection))) {
          this.transition('disconnected');
          log.warn({ retryInMs: this.reconnectDelayMs }, 'Provisioning failed, waiting to retry');
          await sleep(this.reconnectDelayMs, signal);
          continue;
        }

        this.transition('polling');
        await this.poll(connection);
      }
    } finally {
      this.transition('draining');
      await this.connection?.close();
      this.connection = null;
      this.transition('stopped');
      log.info({ stats: this.stats }, 'Consumer stopped');
    }
  }

  private transition(next: ConsumerLoopState): void {
    if (this.currentState === next) return;
    this.options.log.debug({ from: this.currentState, to: next }, 'Consumer state change');
    this.currentState = next;
  }

  private async ensureConnected(): Promise<BrokerConnection | null> {
    if (this.connection?.isConnected()) return this.connection;

    const { log, signal } = this.options;
    this.transition('disconnected');

    if (this.connection !== null) {
      await this.connection.close();
      this.connection = null;
    }

    const result = await connectBroker(
      {
        endpoint: this.options.endpoint,
        identity: this.options.identity,
        maxRetries: this.options.connect.maxRetries,
        initialDelayMs: this.options.connect.initialDelayMs,
        connectTimeoutMs: this.options.connect.timeoutMs,
        commandTimeoutMs: this.commandTimeoutMs,
        signal,
      },
      log,
      { createClient: this.options.createClient },
    );

    if (result.ok) {
      if (this.everConnected) {
        this.stats.reconnects++;
        log.info({ reconnects: this.stats.reconnects }, 'Reconnected to broker');
      }
      this.everConnected = true;
      this.connection = result.connection;
      return result.connection;
    }

    if (result.error.reason === 'aborted') return null;
    if (!this.everConnected) throw result.error;

    log.error({ err: result.error, retryInMs: this.reconnectDelayMs }, 'Reconnect failed, waiting to retry');
    await sleep(this.reconnectDelayMs, signal);
    return null;
  }

  private async provision(connection: BrokerConnection): Promise<boolean> {
    const { stream, consumer, log } = this.options;
    if (!(await ensureStream(connection, stream, log))) return false;
    return ensureConsumer(connection, stream.name, consumer, log);
  }

  /**
   * Returns when shutdown is requested, the connection is lost, or the
   * stream or consumer group disappeared and must be provisioned again.
   */
  private async poll(connection: BrokerConnection): Promise<void> {
    const { stream, consumer, identity, log, signal } = this.options;
    const subscription = new PullSubscription(connection, stream.name, consumer.durableName, identity);

    await this.recoverPending(subscription);

    log.info(
      { stream: stream.name, consumer: consumer.durableName, member: identity, batchSize: this.batchSize },
      'Polling for file events',
    );

    while (!signal.aborted) {
      let messages: StreamMessage[];
      try {
        messages = await subscription.fetch(this.batchSize, this.fetchTimeoutMs);
      } catch (err: unknown) {
        if (signal.aborted) return;

        if (!connection.isConnected() || isTransientBrokerError(err)) {
          log.warn({ err }, 'Connection to broker lost, reconnecting');
          await connection.close();
          return;
        }

        if (isMissingGroup(err)) {
          log.warn(
            { err, stream: stream.name, consumer: consumer.durableName },
            'Consumer group is gone, re-provisioning',
          );
          return;
        }

        log.error({ err, retryInMs: this.idleDelayMs }, 'Error fetching messages');
        await sleep(this.idleDelayMs, signal);
        continue;
      }

      // In fetch order, one at a time; a started batch is finished even after shutdown.
      for (const message of messages) {
        await this.handle(message);
      }
    }
  }

  private async recoverPending(subscription: PullSubscription): Promise<void> {
    const { log, signal } = this.options;
    let cursor = '0';
    let count = 0;

    try {
      while (!signal.aborted) {
        const batch = await subscription.fetchPending(this.batchSize, cursor);
        if (batch.length === 0) break;

        for (const message of batch) {
          await this.handle(message);
          cursor = message.id;
          count++;
        }
      }
    } catch (err: unknown) {
      log.error({ err }, 'Failed to recover pending entries');
    }

    if (count > 0) {
      log.info({ count }, 'Recovered pending entries');
    }
  }

  private async handle(message: StreamMessage): Promise<void> {
    const { log, sink } = this.options;
    this.stats.received++;

    const decoded = message.data === null
      ? { ok: false as const, error: 'Entry has no payload' }
      : decodeFileEvent(message.data);

    if (!decoded.ok) {
      this.stats.decodeFailures++;
      log.warn({ id: message.id, subject: message.subject, error: decoded.error }, 'Discarding undecodable message');
    } else {
      const { event } = decoded;
      try {
        await sink.record(event);
        this.stats.recorded++;
        log.info({ id: message.id, path: event.path, operation: event.operation }, 'Recorded file event');
      } catch (err: unknown) {
        this.stats.sinkFailures++;
        log.error({ err, id: message.id, path: event.path }, 'Failed to record file event');
      }
    }

    await this.acknowledge(message);
  }

  private async acknowledge(message: StreamMessage): Promise<void> {
    try {
      await message.ack();
      this.stats.acked++;
    } catch (err: unknown) {
      // Stays in the pending entries list; recovered after the next (re)connect.
      this.stats.ackFailures++;
      this.options.log.error({ err, id: message.id }, 'Failed to acknowledge message');
    }
  }
}
