import { z } from 'zod';
import type { BrokerConnection } from './connection.js';

/**
 * One delivered stream entry. `data` is null when the entry was trimmed
 * from the stream after delivery but is still pending.
 */
export interface StreamMessage {
  readonly id: string;
  readonly subject: string | null;
  readonly data: string | null;
  ack(): Promise<void>;
}

const entrySchema = z.tuple([z.string(), z.array(z.string()).nullable()]);
const readReplySchema = z.array(z.tuple([z.string(), z.array(entrySchema)])).nullable();

/**
 * Pull-based reader for one member of a durable consumer group.
 *
 * `group` is the durable consumer name shared across restarts; `consumer`
 * names this process within it and owns its pending entries list.
 */
export class PullSubscription {
  constructor(
    private readonly connection: BrokerConnection,
    readonly stream: string,
    readonly group: string,
    readonly consumer: string,
  ) {}

  /**
   * Waits up to `timeoutMs` for at most `batchSize` new entries.
   * Resolves to an empty array on timeout.
   */
  async fetch(batchSize: number, timeoutMs: number): Promise<StreamMessage[]> {
    const reply: unknown = await this.connection.redis.xreadgroup(
      'GROUP', this.group, this.consumer,
      'COUNT', batchSize,
      'BLOCK', timeoutMs,
      'STREAMS', this.stream,
      '>', // only never-delivered entries
    );
    return this.toMessages(reply);
  }

  /**
   * Entries already delivered to this consumer but never acknowledged,
   * with IDs greater than `afterId` ('0' = from the beginning).
   */
  async fetchPending(batchSize: number, afterId = '0'): Promise<StreamMessage[]> {
    const reply: unknown = await this.connection.redis.xreadgroup(
      'GROUP', this.group, this.consumer,
      'COUNT', batchSize,
      'STREAMS', this.stream,
      afterId,
    );
    return this.toMessages(reply);
  }

  private toMessages(reply: unknown): StreamMessage[] {
    const parsed = readReplySchema.parse(reply);
    // null = BLOCK timed out with no new entries
    if (parsed === null) return [];

    const messages: StreamMessage[] = [];
    for (const [, entries] of parsed) {
      for (const [id, fields] of entries) {
        messages.push(this.toMessage(id, fields));
      }
    }
    return messages;
  }

  private toMessage(id: string, fields: string[] | null): StreamMessage {
    const map = new Map<string, string>();
    if (fields !== null) {
      for (let i = 0; i < fields.length; i += 2) {
        const key = fields[i];
        const value = fields[i + 1];
        if (key !== undefined && value !== undefined) {
          map.set(key, value);
        }
      }
    }

    return {
      id,
      subject: map.get('subject') ?? null,
      data: map.get('data') ?? null,
      ack: async () => {
        await this.connection.redis.xack(this.stream, this.group, id);
      },
    };
  }
}
