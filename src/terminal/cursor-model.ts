/**
 * Cursor navigation state machine for the reconstructed LCD.
 */

import type {
  NavigationAction,
  RenderEvent,
  TerminalEvent,
  TerminalState,
} from '../models/terminal';
import { commandForAction } from '../protocol/commands';
import { CommandByte, CURSOR_MARKER } from '../protocol/constants';

export type TerminalListener = (event: TerminalEvent) => void;

/**
 * Build the LCD text for a state.
 *
 * The selected line gets `▶ ` while the blink phase is visible, every other
 * line two spaces.
 */
export function renderLines(state: TerminalState): string {
  return state.lines
    .map((line, i) => {
      const prefix = i === state.cursorIndex && state.blinkVisible ? `${CURSOR_MARKER} ` : '  ';
      return prefix + line;
    })
    .join('\n');
}

/**
 * Holds the current line set, the selected index and the blink phase.
 *
 * The model owns no timers. Blinking is driven by calling {@link tickBlink}
 * from an external periodic source, and the ENT highlight is left to the
 * presentation layer through the `acknowledged` event.
 *
 * The model is Idle until the first non-empty line set arrives and Ready from
 * then on; an empty line set never blanks the display.
 */
export class CursorModel {
  private lines: readonly string[] = [];
  private cursorIndex = 0;
  private blinkVisible = true;
  private listeners = new Set<TerminalListener>();

  /**
   * True once a non-empty line set has been received.
   */
  get isReady(): boolean {
    return this.lines.length > 0;
  }

  /**
   * Register a listener for render and acknowledge events.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: TerminalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Copy of the current state.
   */
  snapshot(): TerminalState {
    return Object.freeze({
      lines: [...this.lines],
      cursorIndex: this.cursorIndex,
      blinkVisible: this.blinkVisible,
    });
  }

  /**
   * Replace the line set with a freshly decoded frame.
   *
   * An empty set is ignored. Otherwise the cursor index is kept modulo the new
   * line count (index 7 over 3 lines becomes 1).
   */
  setLines(lines: readonly string[]): void {
    if (lines.length === 0) {
      return;
    }
    this.lines = [...lines];
    this.cursorIndex %= this.lines.length;
    this.render();
  }

  /**
   * Move the cursor one line up, wrapping to the last line.
   *
   * @returns UP command byte, or null when there are no lines
   */
  moveUp(): CommandByte | null {
    if (this.lines.length === 0) {
      return null;
    }
    this.cursorIndex = (this.cursorIndex - 1 + this.lines.length) % this.lines.length;
    this.render();
    return commandForAction('up');
  }

  /**
   * Move the cursor one line down, wrapping to the first line.
   *
   * @returns DOWN command byte, or null when there are no lines
   */
  moveDown(): CommandByte | null {
    if (this.lines.length === 0) {
      return null;
    }
    this.cursorIndex = (this.cursorIndex + 1) % this.lines.length;
    this.render();
    return commandForAction('down');
  }

  confirm(): CommandByte {
    this.emit({ type: 'acknowledged' });
    return commandForAction('enter');
  }

  escape(): CommandByte {
    return commandForAction('escape');
  }

  /**
   * Flip the blink phase and redraw.
   */
  tickBlink(): void {
    this.blinkVisible = !this.blinkVisible;
    this.render();
  }

  /**
   * Dispatch a keypad action to the matching transition.
   *
   * @returns Command byte to transmit, or null if the action was a no-op
   */
  navigate(action: NavigationAction): CommandByte | null {
    switch (action) {
      case 'escape':
        return this.escape();
      case 'up':
        return this.moveUp();
      case 'down':
        return this.moveDown();
      case 'enter':
        return this.confirm();
    }
  }

  private render(): void {
    if (this.lines.length === 0) {
      return;
    }
    const state = this.snapshot();
    const event: RenderEvent = { type: 'render', ...state, text: renderLines(state) };
    this.emit(event);
  }

  private emit(event: TerminalEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
