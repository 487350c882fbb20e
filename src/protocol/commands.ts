/**
 * Outbound command builders for the HHT keypad.
 */

import type { NavigationAction } from '../models/terminal';
import { CommandByte } from './constants';

const ACTION_COMMANDS: Readonly<Record<NavigationAction, CommandByte>> = {
  escape: CommandByte.ESC,
  up: CommandByte.UP,
  down: CommandByte.DOWN,
  enter: CommandByte.ENT,
};

/**
 * Look up the command byte a keypad action sends.
 */
export function commandForAction(action: NavigationAction): CommandByte {
  return ACTION_COMMANDS[action];
}

/**
 * Build the wire bytes for a command.
 *
 * @returns Command bytes: a single byte, no framing
 */
export function buildCommand(command: CommandByte): Uint8Array {
  return Uint8Array.of(command);
}
