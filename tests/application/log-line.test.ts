import { describe, it, expect } from 'vitest';
import { formatLogLine, formatLogTimestamp } from '../../src/application/log-line.js';
import { fileAdded, fileDeleted } from '../../src/domain/index.js';

const RECORDED_AT = new Date(2026, 1, 19, 9, 5, 7); // local time

describe('formatLogTimestamp', () => {
  it('zero-pads every component', () => {
    expect(formatLogTimestamp(RECORDED_AT)).toBe('2026-02-19 09:05:07');
  });
});

describe('formatLogLine', () => {
  it('formats an added file with two decimals', () => {
    expect(formatLogLine(fileAdded('/x/a.txt', 12.5, 1700000000), RECORDED_AT)).toBe(
      '[2026-02-19 09:05:07] File ADDED: /x/a.txt, Size: 12.50 KB\n',
    );
  });

  it('formats a deleted file with a zero size', () => {
    expect(formatLogLine(fileDeleted('/x/old.txt', 1700000000), RECORDED_AT)).toBe(
      '[2026-02-19 09:05:07] File DELETED: /x/old.txt, Size: 0.00 KB\n',
    );
  });

  it('rounds fractional kilobytes', () => {
    // 1500 bytes
    expect(formatLogLine(fileAdded('/x/b.bin', 1500 / 1024, 1), RECORDED_AT)).toBe(
      '[2026-02-19 09:05:07] File ADDED: /x/b.bin, Size: 1.46 KB\n',
    );
  });
});
