import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { fileAdded, fileDeleted, unixNow } from '../../domain/index.js';
import type { FileEvent } from '../../domain/index.js';

export type FileEventHandler = (event: FileEvent) => void;

export function bytesToKB(bytes: number): number {
  return bytes / 1024;
}

/**
 * Watches a directory tree and reports file additions and deletions.
 *
 * Directory events are ignored, as are files present before `start()`.
 * The handler is called synchronously from the watcher callback and must
 * not block; the producer hands events to its publish queue.
 */
export class FileWatchSource {
  private watcher: FSWatcher | null = null;

  constructor(
    readonly directory: string,
    private readonly log: Logger,
    private readonly onEvent: FileEventHandler,
  ) {}

  /** Resolves once the initial scan is done and changes are being reported. */
  start(): Promise<void> {
    if (this.watcher !== null) return Promise.resolve();

    const watcher = watch(this.directory, {
      persistent: true,
      ignoreInitial: true,
      alwaysStat: true,
    });

    watcher.on('add', (path: string, stats?: Stats) => {
      void this.handleAdd(path, stats, unixNow());
    });
    watcher.on('unlink', (path: string) => {
      this.emit(fileDeleted(resolve(path)));
    });
    watcher.on('error', (err: unknown) => {
      this.log.error({ err, directory: this.directory }, 'File watcher error');
    });

    this.watcher = watcher;

    return new Promise<void>((ready) => {
      watcher.once('ready', () => {
        this.log.info({ directory: this.directory }, 'Watching directory for file changes');
        ready();
      });
    });
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    if (watcher === null) return;
    this.watcher = null;
    await watcher.close();
    this.log.info({ directory: this.directory }, 'File watcher stopped');
  }

  private async handleAdd(path: string, stats: Stats | undefined, timestamp: number): Promise<void> {
    const absolute = resolve(path);
    let bytes = stats?.size;

    if (bytes === undefined) {
      try {
        bytes = (await stat(absolute)).size;
      } catch (err: unknown) {
        this.log.debug({ err, path: absolute }, 'File vanished before it could be measured');
        bytes = 0;
      }
    }

    this.emit(fileAdded(absolute, bytesToKB(bytes), timestamp));
  }

  private emit(event: FileEvent): void {
    this.log.info({ path: event.path, operation: event.operation }, `File ${event.operation}`);
    try {
      this.onEvent(event);
    } catch (err: unknown) {
      this.log.error({ err, path: event.path }, 'File event handler failed');
    }
  }
}
