import { EventEmitter } from 'node:events';
import type { Redis } from 'ioredis';
import { connectBroker } from '../../src/infrastructure/broker/index.js';
import type { BrokerConnection, ClientTimeouts } from '../../src/infrastructure/broker/index.js';

/**
 * In-process stand-in for the Redis stream, consumer-group and hash
 * commands the broker layer issues. Several clients share one broker
 * state, like connections to one server.
 *
 * Error messages mirror the real server's replies, since callers
 * classify errors by message.
 */

interface Entry {
  id: string;
  seq: number;
  fields: string[] | null;
}

interface GroupState {
  /** Index into `entries` of the next never-delivered entry. */
  nextIndex: number;
  /** Entry id → consumer that holds it. */
  pending: Map<string, string>;
}

interface StreamState {
  entries: Entry[];
  seq: number;
  groups: Map<string, GroupState>;
}

type Arg = string | number;

const CLOSED = 'Connection is closed.';

function seqOf(id: string): number {
  return Number(id.split('-')[0]);
}

export class FakeBroker {
  readonly streams = new Map<string, StreamState>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly clients: FakeRedis[] = [];
  /** Every command issued, as [name, ...args]. */
  readonly commands: Arg[][] = [];
  private readonly connectFailures: Error[] = [];
  /** When set, every command with this name rejects with the error. */
  readonly failures = new Map<string, Error>();
  /** When true, blocking reads get no reply, like a half-open socket. */
  silent = false;

  readonly createClient = (_endpoint: string, identity: string, timeouts: ClientTimeouts): Redis => {
    const client = new FakeRedis(this, identity, timeouts);
    this.clients.push(client);
    return client as unknown as Redis;
  };

  /**
   * The next `errors.length` connection attempts fail, in order. Like
   * ioredis, the cause is emitted as `error` and the attempt rejects with
   * a generic closed-connection error.
   */
  failConnects(...errors: Error[]): void {
    this.connectFailures.push(...errors);
  }

  takeConnectFailure(): Error | undefined {
    return this.connectFailures.shift();
  }

  /** Simulates the server going away: every open client is closed. */
  dropConnections(): void {
    for (const client of this.clients) client.drop();
  }

  count(command: string): number {
    return this.commands.filter(([name]) => name === command).length;
  }

  /** Raw append, bypassing the publisher. */
  append(stream: string, fields: string[]): string {
    const state = this.streamOrCreate(stream);
    state.seq++;
    const id = `${state.seq}-0`;
    state.entries.push({ id, seq: state.seq, fields });
    return id;
  }

  /** Entries still pending (delivered, unacknowledged) for a group. */
  pendingIds(stream: string, group: string): string[] {
    return [...(this.streams.get(stream)?.groups.get(group)?.pending.keys() ?? [])];
  }

  streamOrCreate(name: string): StreamState {
    let state = this.streams.get(name);
    if (state === undefined) {
      state = { entries: [], seq: 0, groups: new Map() };
      this.streams.set(name, state);
    }
    return state;
  }
}

export class FakeRedis extends EventEmitter {
  status = 'wait';

  constructor(
    private readonly broker: FakeBroker,
    readonly identity: string,
    readonly timeouts: ClientTimeouts,
  ) {
    super();
  }

  async connect(): Promise<void> {
    const failure = this.broker.takeConnectFailure();
    if (failure !== undefined) {
      this.status = 'end';
      if (this.listenerCount('error') > 0) this.emit('error', failure);
      throw new Error(CLOSED);
    }
    this.status = 'ready';
  }

  async quit(): Promise<'OK'> {
    this.guard('quit');
    this.status = 'end';
    return 'OK';
  }

  disconnect(): void {
    this.status = 'end';
  }

  drop(): void {
    if (this.status === 'end') return;
    this.status = 'end';
    this.emit('close');
  }

  async xinfo(subcommand: 'STREAM' | 'GROUPS', key: string): Promise<unknown> {
    this.guard('xinfo', subcommand, key);
    const stream = this.broker.streams.get(key);
    if (stream === undefined) throw new Error('ERR no such key');

    if (subcommand === 'STREAM') {
      return ['length', stream.entries.length, 'groups', stream.groups.size];
    }
    return [...stream.groups.entries()].map(([name, group]) => [
      'name', name,
      'consumers', new Set(group.pending.values()).size,
      'pending', group.pending.size,
    ]);
  }

  async xgroup(subcommand: 'CREATE' | 'DESTROY', key: string, group: string, id?: string, mkstream?: 'MKSTREAM'): Promise<unknown> {
    this.guard('xgroup', subcommand, key, group, ...(id !== undefined ? [id] : []));
    let stream = this.broker.streams.get(key);

    if (subcommand === 'DESTROY') {
      return stream?.groups.delete(group) === true ? 1 : 0;
    }

    if (stream === undefined) {
      if (mkstream !== 'MKSTREAM') {
        throw new Error(
          'ERR The XGROUP subcommand requires the key to exist. Note that for CREATE you may want to use the MKSTREAM option to create an empty stream automatically.',
        );
      }
      stream = this.broker.streamOrCreate(key);
    }
    if (stream.groups.has(group)) throw new Error('BUSYGROUP Consumer Group name already exists');

    stream.groups.set(group, { nextIndex: id === '$' ? stream.entries.length : 0, pending: new Map() });
    return 'OK';
  }

  async xadd(key: string, id: string, ...fields: string[]): Promise<string | null> {
    this.guard('xadd', key, id, ...fields);
    return this.broker.append(key, fields);
  }

  async xreadgroup(...args: Arg[]): Promise<unknown> {
    this.guard('xreadgroup', ...args);
    const group = String(args[1]);
    const consumer = String(args[2]);
    const count = Number(args[4]);
    const blockAt = args.indexOf('BLOCK');
    const blockMs = blockAt === -1 ? null : Number(args[blockAt + 1]);
    const streamsAt = args.indexOf('STREAMS');
    const key = String(args[streamsAt + 1]);
    const from = String(args[streamsAt + 2]);

    const stream = this.broker.streams.get(key);
    const state = stream?.groups.get(group);
    if (stream === undefined || state === undefined) {
      throw new Error(`NOGROUP No such key '${key}' or consumer group '${group}' in XREADGROUP with GROUP option`);
    }

    if (from === '>' && this.broker.silent) return this.noReply();

    if (from !== '>') {
      const after = seqOf(from);
      const entries = stream.entries
        .filter((entry) => entry.seq > after && state.pending.get(entry.id) === consumer)
        .slice(0, count)
        .map((entry) => [entry.id, entry.fields]);
      return [[key, entries]];
    }

    const deadline = Date.now() + (blockMs ?? 0);
    while (state.nextIndex >= stream.entries.length) {
      if (blockMs === null || Date.now() >= deadline) return null;
      await new Promise((resolve) => setTimeout(resolve, 2));
      if (this.status !== 'ready') throw new Error(CLOSED);
    }

    const delivered = stream.entries.slice(state.nextIndex, state.nextIndex + count);
    state.nextIndex += delivered.length;
    for (const entry of delivered) state.pending.set(entry.id, consumer);
    return [[key, delivered.map((entry) => [entry.id, entry.fields])]];
  }

  async xack(key: string, group: string, ...ids: string[]): Promise<number> {
    this.guard('xack', key, group, ...ids);
    const pending = this.broker.streams.get(key)?.groups.get(group)?.pending;
    let acked = 0;
    for (const id of ids) {
      if (pending?.delete(id) === true) acked++;
    }
    return acked;
  }

  async hset(key: string, values: Record<string, string>): Promise<number> {
    this.guard('hset', key, ...Object.entries(values).flat());
    let hash = this.broker.hashes.get(key);
    if (hash === undefined) {
      hash = new Map();
      this.broker.hashes.set(key, hash);
    }
    let added = 0;
    for (const [field, value] of Object.entries(values)) {
      if (!hash.has(field)) added++;
      hash.set(field, value);
    }
    return added;
  }

  async hget(key: string, field: string): Promise<string | null> {
    this.guard('hget', key, field);
    return this.broker.hashes.get(key)?.get(field) ?? null;
  }

  /** Never settles unless the client-side command timeout fires. */
  private noReply(): Promise<never> {
    return new Promise((_resolve, reject) => {
      setTimeout(() => reject(new Error('Command timed out')), this.timeouts.commandTimeoutMs);
    });
  }

  private guard(command: string, ...args: Arg[]): void {
    this.broker.commands.push([command, ...args]);
    if (this.status !== 'ready') throw new Error(CLOSED);
    const failure = this.broker.failures.get(command);
    if (failure !== undefined) throw failure;
  }
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Test connection error shaped like a refused socket. */
export function connectionRefused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:6379'), { code: 'ECONNREFUSED' });
}

/** Connects a client of `broker` in one attempt, throwing on failure. */
export async function openConnection(
  broker: FakeBroker,
  identity = 'test-client',
  log = fakeLogger(),
): Promise<BrokerConnection> {
  const result = await connectBroker(
    { endpoint: 'redis://broker.test:6379', identity, maxRetries: 0, initialDelayMs: 1 },
    log,
    { createClient: broker.createClient },
  );
  if (!result.ok) throw result.error;
  return result.connection;
}
