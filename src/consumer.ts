#!/usr/bin/env node
import { mkdir } from 'node:fs/promises';
import { pino } from 'pino';
import type { FastifyInstance } from 'fastify';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import {
  FILES_STREAM,
  FILE_EVENTS_SUBJECT,
  FILE_MONITOR_CONSUMER,
  LogFileSink,
  MONITOR_IDENTITY,
  PullConsumerLoop,
} from './infrastructure/index.js';
import { buildHealthServer } from './interfaces/http/index.js';

/**
 * Monitor process: durably consumes file events from the FILES stream and
 * appends one line per event to the monitor log file.
 *
 * SIGINT / SIGTERM stop further fetches; the message in flight is finished
 * and acknowledged before the connection closes.
 */
let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  console.error('Fatal: invalid configuration', err);
  process.exit(1);
}

const log = pino({ level: config.logLevel, name: MONITOR_IDENTITY });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  await mkdir(config.monitorDir, { recursive: true });

  const loop = new PullConsumerLoop({
    endpoint: config.redisUrl,
    identity: MONITOR_IDENTITY,
    stream: FILES_STREAM,
    consumer: FILE_MONITOR_CONSUMER,
    sink: new LogFileSink(config.logFile),
    log,
    signal: ac.signal,
    connect: {
      maxRetries: config.connect.maxRetries,
      initialDelayMs: config.connect.retryDelayMs,
      timeoutMs: config.connect.timeoutMs,
      commandTimeoutMs: config.connect.commandTimeoutMs,
    },
    batchSize: config.fetch.batchSize,
    fetchTimeoutMs: config.fetch.timeoutMs,
    reconnectDelayMs: config.reconnectDelayMs,
  });

  let health: FastifyInstance | null = null;
  if (config.health !== null) {
    health = await buildHealthServer(() => loop.health(), config.logLevel);
    await health.listen({ host: config.health.host, port: config.health.port });
  }

  log.info(
    { subject: FILE_EVENTS_SUBJECT, stream: FILES_STREAM.name, logFile: config.logFile },
    'Monitoring for file events. Press Ctrl+C to stop.',
  );

  try {
    await loop.run();
  } finally {
    await health?.close();
  }
}

function shutdown(signal: NodeJS.Signals): void {
  if (ac.signal.aborted) return;
  log.info({ signal }, 'Shutdown requested, draining...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(() => {
    log.info('Monitor shutdown complete');
    process.exit(0);
  })
  .catch((err: unknown) => {
    log.fatal({ err }, 'Monitor crashed');
    process.exit(1);
  });
