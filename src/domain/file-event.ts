/**
 * Core domain types for a filesystem change observed in the storage directory.
 *
 * These types carry no framework or broker dependencies.
 */

export const FILE_OPERATIONS = ['added', 'deleted'] as const;

export type FileOperation = (typeof FILE_OPERATIONS)[number];

/**
 * A single add/delete observation.
 *
 * `sizeKB` is `null` for deletions: the size of a removed file is not
 * known. An added empty file has a size of `0`.
 */
export interface FileEvent {
  readonly path: string;
  readonly operation: FileOperation;
  readonly sizeKB: number | null;
  /** Unix seconds (fractional) at which the producer saw the change. */
  readonly timestamp: number;
}

export class InvalidFileEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFileEventError';
  }
}

function assertPath(path: string): void {
  if (path.length === 0) {
    throw new InvalidFileEventError('File event path must be non-empty');
  }
}

function assertTimestamp(path: string, timestamp: number): void {
  if (!Number.isFinite(timestamp)) {
    throw new InvalidFileEventError(`Invalid timestamp for ${path}: ${timestamp}`);
  }
}

/** Current time as fractional Unix seconds. */
export function unixNow(): number {
  return Date.now() / 1000;
}

export function fileAdded(path: string, sizeKB: number, timestamp: number = unixNow()): FileEvent {
  assertPath(path);
  if (!Number.isFinite(sizeKB) || sizeKB < 0) {
    throw new InvalidFileEventError(`Invalid size for ${path}: ${sizeKB}`);
  }
  assertTimestamp(path, timestamp);
  const event: FileEvent = { path, operation: 'added', sizeKB, timestamp };
  return Object.freeze(event);
}

export function fileDeleted(path: string, timestamp: number = unixNow()): FileEvent {
  assertPath(path);
  assertTimestamp(path, timestamp);
  const event: FileEvent = { path, operation: 'deleted', sizeKB: null, timestamp };
  return Object.freeze(event);
}
