#!/usr/bin/env node
import { mkdir } from 'node:fs/promises';
import { pino } from 'pino';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import {
  BrokerConnectError,
  FILES_STREAM,
  FILE_EVENTS_SUBJECT,
  FileWatchSource,
  PUBLISHER_IDENTITY,
  PublishWorker,
  waitForAbort,
} from './infrastructure/index.js';

/**
 * File listener process: watches the storage directory recursively and
 * publishes every file addition and deletion to the `file.events` subject.
 *
 * Watcher callbacks only enqueue; a single publish worker owns the broker
 * connection. Exhausting the initial connection retries exits non-zero.
 */
let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  console.error('Fatal: invalid configuration', err);
  process.exit(1);
}

const log = pino({ level: config.logLevel, name: PUBLISHER_IDENTITY });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  await mkdir(config.storageDir, { recursive: true });
  log.info({ directory: config.storageDir }, 'Starting file listener');

  const worker = new PublishWorker({
    endpoint: config.redisUrl,
    identity: PUBLISHER_IDENTITY,
    stream: FILES_STREAM,
    subject: FILE_EVENTS_SUBJECT,
    log,
    connect: {
      maxRetries: config.connect.maxRetries,
      initialDelayMs: config.connect.retryDelayMs,
      timeoutMs: config.connect.timeoutMs,
      commandTimeoutMs: config.connect.commandTimeoutMs,
    },
    queueLimit: config.publishQueueLimit,
  });

  await worker.open(ac.signal);
  const publishing = worker.run(ac.signal);

  const source = new FileWatchSource(config.storageDir, log, (event) => {
    worker.enqueue(event);
  });

  try {
    await source.start();
    log.info('File listener is running. Press Ctrl+C to stop.');
    await waitForAbort(ac.signal);
  } finally {
    await source.close();
    if (!ac.signal.aborted) ac.abort();
    await publishing;
  }
}

function shutdown(signal: NodeJS.Signals): void {
  if (ac.signal.aborted) return;
  log.info({ signal }, 'Shutdown requested, cleaning up...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(() => {
    log.info('Shutdown complete');
    process.exit(0);
  })
  .catch((err: unknown) => {
    if (err instanceof BrokerConnectError && err.reason === 'aborted') {
      log.info('Shutdown requested before the broker connection was established');
      process.exit(0);
    }
    log.fatal({ err }, 'File listener crashed');
    process.exit(1);
  });
