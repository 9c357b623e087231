import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FileEvent } from '../../domain/index.js';
import { formatLogLine } from '../../application/index.js';

/**
 * Durable destination for consumed events. `record` rejects when the
 * event could not be stored.
 */
export interface EventSink {
  record(event: FileEvent): Promise<void>;
}

/**
 * Appends one formatted line per event to the monitor log file.
 * The directory and the file are created on first write.
 */
export class LogFileSink implements EventSink {
  constructor(
    readonly logFile: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(event: FileEvent): Promise<void> {
    await mkdir(dirname(this.logFile), { recursive: true });
    await appendFile(this.logFile, formatLogLine(event, this.now()), 'utf-8');
  }
}
