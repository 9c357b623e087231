import type { FileEvent } from '../domain/index.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Formats one monitor log line, newline-terminated:
 *
 *   [2026-02-19 12:00:00] File ADDED: /data/a.txt, Size: 12.50 KB
 *
 * Deletions carry no size and are written as `0.00`.
 */
export function formatLogLine(event: FileEvent, recordedAt: Date = new Date()): string {
  const size = (event.sizeKB ?? 0).toFixed(2);
  return `[${formatLogTimestamp(recordedAt)}] File ${event.operation.toUpperCase()}: ${event.path}, Size: ${size} KB\n`;
}
