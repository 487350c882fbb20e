import { describe, expect, it } from 'vitest';
import { DEFAULT_BAUD_RATE, parseBaudRate, parseSerialSettings } from './config';
import { ConfigError } from './exceptions';

describe('parseSerialSettings', () => {
  it('defaults to 115200 8N1', () => {
    expect(parseSerialSettings({ path: '/dev/ttyUSB0' })).toEqual({
      path: '/dev/ttyUSB0',
      baudRate: DEFAULT_BAUD_RATE,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
    });
  });

  it('maps operator letters and numbers', () => {
    expect(
      parseSerialSettings({ path: 'COM3', baud: '9600', parity: 'e', stop: '1.5', data: '7' })
    ).toEqual({ path: 'COM3', baudRate: 9600, dataBits: 7, parity: 'even', stopBits: 1.5 });
  });

  it('requires a port path', () => {
    expect(() => parseSerialSettings({ path: '  ' })).toThrow('Serial port path is required');
  });

  it('rejects unknown parity, stop and data values', () => {
    expect(() => parseSerialSettings({ path: 'COM3', parity: 'X' })).toThrow(ConfigError);
    expect(() => parseSerialSettings({ path: 'COM3', stop: '3' })).toThrow(
      'Invalid stop bits: 3 (expected one of 1, 1.5, 2)'
    );
    expect(() => parseSerialSettings({ path: 'COM3', data: '9' })).toThrow(
      'Invalid data bits: 9 (expected one of 8, 7, 6, 5)'
    );
  });
});

describe('parseBaudRate', () => {
  it('accepts positive integers', () => {
    expect(parseBaudRate(' 57600 ')).toBe(57600);
  });

  it('rejects anything else', () => {
    expect(() => parseBaudRate('fast')).toThrow('Invalid baudrate: fast');
    expect(() => parseBaudRate('0')).toThrow(ConfigError);
    expect(() => parseBaudRate('96.5')).toThrow(ConfigError);
  });
});
