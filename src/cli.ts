#!/usr/bin/env node
/**
 * `hht-terminal` command-line front end.
 */

import { emitKeypressEvents, type Key } from 'node:readline';
import { USAGE, parseCliArgs } from './cli/args';
import { LOG_LINES, renderScreen } from './cli/screen';
import { parseSerialSettings } from './config';
import { listSerialPorts } from './discovery';
import type { NavigationAction } from './models/terminal';
import { TerminalSession } from './session';

const KEY_ACTIONS: Readonly<Record<string, NavigationAction>> = {
  escape: 'escape',
  up: 'up',
  down: 'down',
  return: 'enter',
  enter: 'enter',
};

async function printPorts(): Promise<void> {
  const ports = await listSerialPorts();
  if (ports.length === 0) {
    console.log('No serial ports found');
    return;
  }
  for (const port of ports) {
    const details = [port.manufacturer, port.serialNumber].filter(Boolean).join(', ');
    console.log(details ? `${port.path}  (${details})` : port.path);
  }
}

async function main(argv: readonly string[]): Promise<void> {
  const args = parseCliArgs(argv);

  if (args.help) {
    console.log(USAGE);
    return;
  }
  if (args.list) {
    await printPorts();
    return;
  }

  const settings = parseSerialSettings(args.settings);
  const title = `${settings.path} @ ${settings.baudRate}`;
  const log: string[] = [];
  let lcdText = '';
  let highlighted = false;

  const draw = (): void => {
    process.stdout.write('\x1b[2J\x1b[H' + renderScreen({ title, lcdText, highlighted, log }) + '\n');
  };
  const appendLog = (line: string): void => {
    log.push(line);
    if (log.length > LOG_LINES) {
      log.splice(0, log.length - LOG_LINES);
    }
    draw();
  };

  const session = await TerminalSession.open(settings, {
    hexLog: args.hexLog,
    timestamps: args.timestamps,
    handlers: {
      render: (event) => {
        lcdText = event.text;
        draw();
      },
      raw: (line) => appendLog(line),
      log: (line) => appendLog(line),
      highlight: (active) => {
        highlighted = active;
        draw();
      },
      error: (error) => appendLog(`[ERROR] ${error.message}`),
    },
  });
  draw();

  await new Promise<void>((resolve) => {
    const onKeypress = (_text: string | undefined, key: Key | undefined): void => {
      if (!key) {
        return;
      }
      if (key.name === 'q' || (key.ctrl && key.name === 'c')) {
        process.stdin.off('keypress', onKeypress);
        resolve();
        return;
      }
      const action =
        key.name && Object.hasOwn(KEY_ACTIONS, key.name) ? KEY_ACTIONS[key.name] : undefined;
      if (action) {
        session.press(action).catch((error: unknown) => appendLog(`[ERROR] ${String(error)}`));
      }
    };

    emitKeypressEvents(process.stdin);
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true);
    }
    process.stdin.on('keypress', onKeypress);
    process.stdin.resume();
  });

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
  await session.stop();
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
