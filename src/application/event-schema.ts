import { z } from 'zod';
import { FILE_OPERATIONS, fileAdded, fileDeleted } from '../domain/index.js';
import type { FileEvent } from '../domain/index.js';

/**
 * Zod schema for the JSON payload carried on the `file.events` subject.
 *
 * - `file_size` is in KB and is `0` for deletions.
 * - `timestamp` is fractional Unix seconds captured by the producer.
 */
export const fileEventWireSchema = z.object({
  path: z.string().min(1),
  operation: z.enum(FILE_OPERATIONS),
  file_size: z.number().finite().nonnegative(),
  timestamp: z.number().finite(),
});

export type FileEventWire = z.infer<typeof fileEventWireSchema>;

/**
 * Decoding never throws. The caller decides what to do with an
 * undecodable payload (the consumer acknowledges and drops it).
 */
export type DecodeResult =
  | { ok: true; event: FileEvent }
  | { ok: false; error: string };

export function toWire(event: FileEvent): FileEventWire {
  return {
    path: event.path,
    operation: event.operation,
    file_size: event.sizeKB ?? 0,
    timestamp: event.timestamp,
  };
}

export function encodeFileEvent(event: FileEvent): string {
  return JSON.stringify(toWire(event));
}

export function decodeFileEvent(raw: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    return { ok: false, error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = fileEventWireSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `Invalid file event: ${detail}` };
  }

  const wire = parsed.data;
  const event = wire.operation === 'added'
    ? fileAdded(wire.path, wire.file_size, wire.timestamp)
    : fileDeleted(wire.path, wire.timestamp);

  return { ok: true, event };
}
