import { z } from 'zod';
import type { Logger } from 'pino';
import type { BrokerConnection } from './connection.js';
import type { ConsumerSpec, DeliverPolicy, StreamSpec } from './topology.js';
import { SUBJECT_BINDINGS_KEY } from './topology.js';

/** Outcome of an existence check. Absence is a result, not an error. */
export type ProbeResult = 'exists' | 'not-found' | 'error';

// Throwaway group used only to create an empty stream key via MKSTREAM.
const PROVISIONING_GROUP = '__provisioning__';

const groupsReplySchema = z.array(z.array(z.unknown()));

function isNoSuchKey(err: unknown): boolean {
  return err instanceof Error && /no such key/i.test(err.message);
}

function isBusyGroup(err: unknown): boolean {
  return err instanceof Error && err.message.includes('BUSYGROUP');
}

function startIdFor(policy: DeliverPolicy): string {
  // "$" skips history: only entries added after the group exists are delivered.
  return policy === 'new' ? '$' : '0';
}

/**
 * Group names from an XINFO GROUPS reply. Each group arrives as a flat
 * [field, value, field, value, ...] array.
 */
function groupNames(reply: unknown): string[] | null {
  const parsed = groupsReplySchema.safeParse(reply);
  if (!parsed.success) return null;

  const names: string[] = [];
  for (const fields of parsed.data) {
    for (let i = 0; i < fields.length; i += 2) {
      const value = fields[i + 1];
      if (fields[i] === 'name' && typeof value === 'string') names.push(value);
    }
  }
  return names;
}

export async function probeStream(
  connection: BrokerConnection,
  streamName: string,
  log: Logger,
): Promise<ProbeResult> {
  try {
    await connection.redis.xinfo('STREAM', streamName);
    return 'exists';
  } catch (err: unknown) {
    if (isNoSuchKey(err)) return 'not-found';
    log.warn({ err, stream: streamName }, 'Stream existence check failed');
    return 'error';
  }
}

export async function probeConsumer(
  connection: BrokerConnection,
  streamName: string,
  durableName: string,
  log: Logger,
): Promise<ProbeResult> {
  try {
    const reply: unknown = await connection.redis.xinfo('GROUPS', streamName);
    const names = groupNames(reply);
    if (names === null) {
      log.warn({ stream: streamName, consumer: durableName }, 'Unrecognised XINFO GROUPS reply');
      return 'error';
    }
    return names.includes(durableName) ? 'exists' : 'not-found';
  } catch (err: unknown) {
    if (isNoSuchKey(err)) return 'not-found';
    log.warn({ err, stream: streamName, consumer: durableName }, 'Consumer existence check failed');
    return 'error';
  }
}

function bindSubjects(connection: BrokerConnection, spec: StreamSpec): void {
  for (const subject of spec.subjects) {
    connection.subjectBindings.set(subject, spec.name);
  }
}

/**
 * Ensures the stream exists. An existing stream is accepted as-is, even if
 * it was created with other subjects.
 *
 * Returns false only when the existence check and the create both fail.
 */
export async function ensureStream(
  connection: BrokerConnection,
  spec: StreamSpec,
  log: Logger,
): Promise<boolean> {
  if (!connection.isConnected()) {
    log.error({ stream: spec.name }, 'Cannot ensure stream: not connected to broker');
    return false;
  }

  const probe = await probeStream(connection, spec.name, log);
  if (probe === 'exists') {
    bindSubjects(connection, spec);
    log.info({ stream: spec.name }, 'Stream exists');
    return true;
  }

  try {
    try {
      await connection.redis.xgroup('CREATE', spec.name, PROVISIONING_GROUP, '$', 'MKSTREAM');
    } catch (err: unknown) {
      // A concurrent provisioner holds the throwaway group; the stream exists either way.
      if (!isBusyGroup(err)) throw err;
    }
    await connection.redis.xgroup('DESTROY', spec.name, PROVISIONING_GROUP);

    if (spec.subjects.length > 0) {
      await connection.redis.hset(
        SUBJECT_BINDINGS_KEY,
        Object.fromEntries(spec.subjects.map((subject) => [subject, spec.name])),
      );
    }

    bindSubjects(connection, spec);
    log.info({ stream: spec.name, subjects: spec.subjects }, 'Created stream');
    return true;
  } catch (err: unknown) {
    log.error({ err, stream: spec.name }, 'Error ensuring stream');
    return false;
  }
}

/**
 * Ensures the durable consumer group exists on `streamName`.
 * BUSYGROUP (created concurrently) counts as success.
 */
export async function ensureConsumer(
  connection: BrokerConnection,
  streamName: string,
  spec: ConsumerSpec,
  log: Logger,
): Promise<boolean> {
  if (!connection.isConnected()) {
    log.error({ consumer: spec.durableName }, 'Cannot ensure consumer: not connected to broker');
    return false;
  }

  const probe = await probeConsumer(connection, streamName, spec.durableName, log);
  if (probe === 'exists') {
    log.info({ stream: streamName, consumer: spec.durableName }, 'Consumer exists');
    return true;
  }

  try {
    await connection.redis.xgroup('CREATE', streamName, spec.durableName, startIdFor(spec.deliverPolicy));
    log.info(
      { stream: streamName, consumer: spec.durableName, deliverPolicy: spec.deliverPolicy },
      'Created consumer',
    );
    return true;
  } catch (err: unknown) {
    if (isBusyGroup(err)) {
      log.debug({ consumer: spec.durableName }, 'Consumer already exists');
      return true;
    }
    log.error({ err, stream: streamName, consumer: spec.durableName }, 'Error ensuring consumer');
    return false;
  }
}

/**
 * Stream that stores messages for `subject`, or null when nothing is bound.
 * Throws on transport errors.
 */
export async function resolveStream(connection: BrokerConnection, subject: string): Promise<string | null> {
  const known = connection.subjectBindings.get(subject);
  if (known !== undefined) return known;

  const stream = await connection.redis.hget(SUBJECT_BINDINGS_KEY, subject);
  if (stream !== null) connection.subjectBindings.set(subject, stream);
  return stream;
}
