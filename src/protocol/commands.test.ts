import { describe, expect, it } from 'vitest';
import { buildCommand, commandForAction } from './commands';
import { CommandByte } from './constants';

describe('commands', () => {
  it('maps keypad actions to their command bytes', () => {
    expect(commandForAction('escape')).toBe(0x04);
    expect(commandForAction('up')).toBe(0x08);
    expect(commandForAction('down')).toBe(0x01);
    expect(commandForAction('enter')).toBe(0x02);
  });

  it('builds a single unframed byte', () => {
    expect(Array.from(buildCommand(CommandByte.ENT))).toEqual([0x02]);
  });
});
