/**
 * Command-line argument parsing for `hht-terminal`.
 */

import { parseArgs } from 'node:util';
import type { SerialSettingsInput } from '../config';
import { ConfigError } from '../exceptions';

export const USAGE = `Usage:
  hht-terminal --list
  hht-terminal --port <path> [--baud 115200] [--parity N|E|O|M|S]
               [--stop 1|1.5|2] [--data 8|7|6|5] [--no-hex] [--no-timestamp]

Keys: Esc, Up, Down, Enter are sent to the device. q or Ctrl-C quits.`;

export interface CliOptions {
  help: boolean;
  list: boolean;
  settings: SerialSettingsInput;
  hexLog: boolean;
  timestamps: boolean;
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      help: { type: 'boolean', short: 'h' },
      list: { type: 'boolean', short: 'l' },
      port: { type: 'string', short: 'p' },
      baud: { type: 'string', short: 'b' },
      parity: { type: 'string' },
      stop: { type: 'string' },
      data: { type: 'string' },
      'no-hex': { type: 'boolean' },
      'no-timestamp': { type: 'boolean' },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * Parse `process.argv.slice(2)`.
 *
 * @throws {ConfigError} On unknown options or missing option values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
  const { values } = parsed;

  return {
    help: values.help ?? false,
    list: values.list ?? false,
    settings: {
      path: values.port,
      baud: values.baud,
      parity: values.parity,
      stop: values.stop,
      data: values.data,
    },
    hexLog: !(values['no-hex'] ?? false),
    timestamps: !(values['no-timestamp'] ?? false),
  };
}
