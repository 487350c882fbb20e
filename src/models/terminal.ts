/**
 * Terminal state and event models.
 */

/**
 * Keypad actions an operator can take.
 */
export type NavigationAction = 'escape' | 'up' | 'down' | 'enter';

/**
 * Reconstructed LCD state.
 */
export interface TerminalState {
  /** Decoded display lines, trimmed and never empty */
  readonly lines: readonly string[];

  /** Selected line, 0-based */
  readonly cursorIndex: number;

  /** Blink phase of the cursor marker */
  readonly blinkVisible: boolean;
}

/**
 * Emitted whenever the LCD needs to be redrawn.
 */
export interface RenderEvent extends TerminalState {
  readonly type: 'render';

  /** Lines with the cursor prefix applied, joined by `\n` */
  readonly text: string;
}

/**
 * Emitted by `confirm()` so the presentation layer can flash the display.
 */
export interface AcknowledgeEvent {
  readonly type: 'acknowledged';
}

export type TerminalEvent = RenderEvent | AcknowledgeEvent;
