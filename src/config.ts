/**
 * Serial settings parsing and validation.
 */

import { ConfigError } from './exceptions';
import type { DataBits, Parity, SerialSettings, StopBits } from './models/settings';

export const DEFAULT_BAUD_RATE = 115200;

// Maps keep insertion order, so error messages list choices as written here.
const PARITY_LETTERS: ReadonlyMap<string, Parity> = new Map<string, Parity>([
  ['N', 'none'],
  ['E', 'even'],
  ['O', 'odd'],
  ['M', 'mark'],
  ['S', 'space'],
]);

const STOP_BITS: ReadonlyMap<string, StopBits> = new Map<string, StopBits>([
  ['1', 1],
  ['1.5', 1.5],
  ['2', 2],
]);

const DATA_BITS: ReadonlyMap<string, DataBits> = new Map<string, DataBits>([
  ['8', 8],
  ['7', 7],
  ['6', 6],
  ['5', 5],
]);

/**
 * Serial settings as typed by an operator. Unset fields take 115200 8N1.
 */
export interface SerialSettingsInput {
  path?: string;
  baud?: string;
  parity?: string;
  stop?: string;
  data?: string;
}

function lookup<T>(table: ReadonlyMap<string, T>, key: string, what: string): T {
  const value = table.get(key);
  if (value === undefined) {
    throw new ConfigError(
      `Invalid ${what}: ${key} (expected one of ${[...table.keys()].join(', ')})`
    );
  }
  return value;
}

/**
 * Parse a baud rate string.
 *
 * @throws {ConfigError} If the value is not a positive integer
 */
export function parseBaudRate(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new ConfigError(`Invalid baudrate: ${value}`);
  }
  return Number(trimmed);
}

/**
 * Build validated {@link SerialSettings} from operator input.
 *
 * @throws {ConfigError} If any field is missing or invalid
 */
export function parseSerialSettings(input: SerialSettingsInput): SerialSettings {
  const path = input.path?.trim();
  if (!path) {
    throw new ConfigError('Serial port path is required');
  }

  return {
    path,
    baudRate: input.baud === undefined ? DEFAULT_BAUD_RATE : parseBaudRate(input.baud),
    dataBits: lookup(DATA_BITS, input.data ?? '8', 'data bits'),
    parity: lookup(PARITY_LETTERS, (input.parity ?? 'N').toUpperCase(), 'parity'),
    stopBits: lookup(STOP_BITS, input.stop ?? '1', 'stop bits'),
  };
}
