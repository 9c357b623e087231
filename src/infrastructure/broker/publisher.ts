import type { Logger } from 'pino';
import type { FileEvent } from '../../domain/index.js';
import { encodeFileEvent } from '../../application/index.js';
import type { BrokerConnection } from './connection.js';
import { resolveStream } from './provisioner.js';

/**
 * Appends a file event to the stream bound to `subject`.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). The entry carries the
 * subject and the JSON payload as two fields.
 *
 * Best-effort: returns false on any failure and never retries or buffers.
 * Whether a failed event is dropped or retried is the caller's decision.
 */
export async function publish(
  connection: BrokerConnection,
  subject: string,
  event: FileEvent,
  log: Logger,
): Promise<boolean> {
  if (!connection.isConnected()) {
    log.warn({ subject }, 'Cannot publish: not connected to broker');
    return false;
  }

  try {
    const stream = await resolveStream(connection, subject);
    if (stream === null) {
      log.error({ subject }, 'Cannot publish: no stream is bound to subject');
      return false;
    }

    const entryId = await connection.redis.xadd(stream, '*', 'subject', subject, 'data', encodeFileEvent(event));
    if (entryId === null) {
      log.error({ subject, stream }, 'Broker did not accept the entry');
      return false;
    }

    log.debug({ subject, stream, entryId, path: event.path }, 'Published file event');
    return true;
  } catch (err: unknown) {
    log.error({ err, subject, path: event.path }, 'Error publishing file event');
    return false;
  }
}
