import { describe, expect, it } from 'vitest';
import { formatHex, formatRxLine, formatTxError, formatTxLine } from './log-format';

describe('log formatting', () => {
  const now = new Date(2024, 0, 2, 9, 5, 7);

  it('formats hex as upper-case pairs', () => {
    expect(formatHex(Uint8Array.of(0x7e, 0x0a, 0xff))).toBe('7E 0A FF');
    expect(formatHex(new Uint8Array(0))).toBe('');
  });

  it('prefixes RX lines with the local time', () => {
    expect(formatRxLine(Uint8Array.of(0x41, 0x42), { now })).toBe('09:05:07 41 42');
  });

  it('decodes RX text with replacement characters', () => {
    expect(formatRxLine(Uint8Array.of(0x68, 0x69), { hex: false, now })).toBe('09:05:07 hi');
    expect(formatRxLine(Uint8Array.of(0x41, 0xff), { hex: false, timestamp: false })).toBe(
      'A�'
    );
  });

  it('formats TX lines and errors', () => {
    expect(formatTxLine(Uint8Array.of(0x04))).toBe('[TX] 04');
    expect(formatTxError(new Error('port closed'))).toBe('[TX ERROR] port closed');
    expect(formatTxError('timeout')).toBe('[TX ERROR] timeout');
  });
});
