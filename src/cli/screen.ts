/**
 * Text screen for the `hht-terminal` front end.
 */

import chalk from 'chalk';

export const LCD_MIN_WIDTH = 20;
export const LOG_LINES = 10;

const PLACEHOLDER = '(waiting for frame)';
const KEY_HINT = 'Esc/Up/Down/Enter: keypad   q: quit';

type Colors = Pick<typeof chalk, 'bgBlue' | 'yellow' | 'white' | 'bold' | 'dim'>;

export interface ScreenView {
  /** Port description shown in the header */
  title: string;

  /** Rendered LCD text, empty before the first frame */
  lcdText: string;

  /** ENT acknowledgment in progress */
  highlighted: boolean;

  /** RX/TX log, oldest first */
  log: readonly string[];
}

/**
 * Lay out the LCD panel, the tail of the log and the key hint.
 *
 * The LCD is drawn white on blue, yellow while highlighted.
 */
export function renderScreen(view: ScreenView, colors: Colors = chalk): string {
  const lcdLines = view.lcdText === '' ? [PLACEHOLDER] : view.lcdText.split('\n');
  const width = Math.max(LCD_MIN_WIDTH, ...lcdLines.map((line) => line.length));
  const ink = view.highlighted ? colors.yellow : colors.white;

  return [
    colors.bold(`LCD Terminal  ${view.title}`),
    ...lcdLines.map((line) => colors.bgBlue(ink(` ${line.padEnd(width)} `))),
    '',
    colors.dim('Log'),
    ...view.log.slice(-LOG_LINES),
    '',
    colors.dim(KEY_HINT),
  ].join('\n');
}
