/**
 * HHT terminal session: serial transport, stream pump and cursor model.
 */

import { QueueClosedError } from './exceptions';
import type {
  NavigationAction,
  RenderEvent,
  TerminalEvent,
  TerminalState,
} from './models/terminal';
import type { SerialSettings, SessionSettings } from './models/settings';
import { buildCommand } from './protocol/commands';
import { BLINK_INTERVAL_MS, CommandByte, HIGHLIGHT_MS } from './protocol/constants';
import { splitLines } from './protocol/lines';
import { formatRxLine, formatTxError, formatTxLine } from './protocol/log-format';
import { CursorModel } from './terminal/cursor-model';
import { SerialTransport } from './transport/serial-transport';
import { StreamPump, normalizePositiveInteger, type PumpEvent } from './transport/stream-pump';
import type { ByteTransport } from './transport/types';

/**
 * Callbacks through which a session reports to its presentation layer.
 */
export interface TerminalSessionHandlers {
  /** LCD changed (new frame, navigation or blink) */
  render?: (event: RenderEvent) => void;

  /** A chunk arrived; `line` is formatted for the raw log */
  raw?: (line: string, data: Uint8Array) => void;

  /** Operator log line, e.g. `[TX] 08` or `[TX ERROR] ...` */
  log?: (line: string) => void;

  /** ENT highlight switched on or off */
  highlight?: (active: boolean) => void;

  /** Transport read failure or a handler that threw */
  error?: (error: Error) => void;
}

export interface TerminalSessionOptions extends SessionSettings {
  handlers?: TerminalSessionHandlers;
}

/**
 * A live terminal session.
 *
 * The pump drains the transport on its own loop; this object consumes the
 * pump's events, owns the {@link CursorModel} and both timers, and writes
 * command bytes back to the transport.
 *
 * @example
 * ```typescript
 * const session = await TerminalSession.open(
 *   { path: '/dev/ttyUSB0', baudRate: 115200, dataBits: 8, parity: 'none', stopBits: 1 },
 *   { handlers: { render: (e) => console.log(e.text) } }
 * );
 * await session.press('down');
 * await session.stop();
 * ```
 */
export class TerminalSession {
  private readonly cursor = new CursorModel();
  private readonly pump: StreamPump;
  private readonly handlers: TerminalSessionHandlers;
  private readonly blinkIntervalMs: number;
  private readonly highlightMs: number;
  private consumer: Promise<void> | null = null;
  private blinkTimer: ReturnType<typeof setInterval> | null = null;
  private highlightTimer: ReturnType<typeof setTimeout> | null = null;
  private _highlighted = false;
  private stopped = false;

  constructor(
    private readonly transport: ByteTransport,
    private readonly options: TerminalSessionOptions = {}
  ) {
    this.handlers = options.handlers ?? {};
    this.blinkIntervalMs = normalizePositiveInteger(options.blinkIntervalMs, BLINK_INTERVAL_MS);
    this.highlightMs = normalizePositiveInteger(options.highlightMs, HIGHLIGHT_MS);
    this.pump = new StreamPump(transport, {
      pollIntervalMs: options.pollIntervalMs,
      readChunkSize: options.readChunkSize,
    });
    this.cursor.subscribe((event) => this.handleTerminalEvent(event));
  }

  /**
   * Open a serial port and start a session on it.
   *
   * @throws {SerialConnectionError} If the port cannot be opened
   */
  static async open(
    settings: SerialSettings,
    options: TerminalSessionOptions = {}
  ): Promise<TerminalSession> {
    const transport = await SerialTransport.open(settings);
    const session = new TerminalSession(transport, options);
    session.start();
    return session;
  }

  /**
   * Current LCD state.
   */
  get state(): TerminalState {
    return this.cursor.snapshot();
  }

  get isHighlighted(): boolean {
    return this._highlighted;
  }

  /**
   * False once stopped, or once the pump has ended on a transport error.
   */
  get isRunning(): boolean {
    return this.consumer !== null && !this.stopped && this.pump.isRunning;
  }

  /**
   * Start the pump, the frame consumer and the blink timer.
   */
  start(): void {
    if (this.consumer || this.stopped) {
      return;
    }

    this.pump.start();
    this.consumer = this.consume().catch((error: unknown) => this.reportError(error));
    this.blinkTimer = setInterval(() => this.cursor.tickBlink(), this.blinkIntervalMs);
  }

  /**
   * Apply a keypad action and send its command byte.
   *
   * @returns The command sent, or null when the action was a no-op
   */
  async press(action: NavigationAction): Promise<CommandByte | null> {
    const command = this.cursor.navigate(action);
    if (command === null) {
      return null;
    }
    await this.sendCommand(command);
    return command;
  }

  /**
   * Write a command byte to the device.
   *
   * Write failures are reported through the `log` handler and not retried.
   *
   * @returns True if the device accepted the byte
   */
  async sendCommand(command: CommandByte): Promise<boolean> {
    const data = buildCommand(command);
    try {
      await this.transport.write(data);
    } catch (error) {
      this.notify(this.handlers.log, formatTxError(error));
      return false;
    }
    this.notify(this.handlers.log, formatTxLine(data));
    return true;
  }

  /**
   * Stop the session and close the transport.
   *
   * Frames already read are still applied before the consumer exits.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    if (this.blinkTimer !== null) {
      clearInterval(this.blinkTimer);
      this.blinkTimer = null;
    }
    this.clearHighlight();

    await this.pump.stop();
    this.pump.events.close('Session stopped');
    if (this.consumer) {
      await this.consumer;
    }
    await this.transport.close();
  }

  private async consume(): Promise<void> {
    for (;;) {
      let event: PumpEvent;
      try {
        event = await this.pump.events.dequeue();
      } catch (error) {
        if (error instanceof QueueClosedError) {
          return;
        }
        throw error;
      }
      try {
        this.handlePumpEvent(event);
      } catch (error) {
        this.reportError(error);
      }
    }
  }

  private handlePumpEvent(event: PumpEvent): void {
    switch (event.kind) {
      case 'raw':
        this.notify(
          this.handlers.raw,
          formatRxLine(event.data, {
            hex: this.options.hexLog ?? true,
            timestamp: this.options.timestamps ?? true,
          }),
          event.data
        );
        break;
      case 'frame':
        this.cursor.setLines(splitLines(event.frame));
        break;
      case 'error':
        this.reportError(event.error);
        break;
    }
  }

  private handleTerminalEvent(event: TerminalEvent): void {
    if (event.type === 'render') {
      this.notify(this.handlers.render, event);
    } else {
      this.startHighlight();
    }
  }

  private startHighlight(): void {
    if (this.highlightTimer !== null) {
      clearTimeout(this.highlightTimer);
    }
    if (!this._highlighted) {
      this._highlighted = true;
      this.notify(this.handlers.highlight, true);
    }
    this.highlightTimer = setTimeout(() => this.clearHighlight(), this.highlightMs);
  }

  private clearHighlight(): void {
    if (this.highlightTimer !== null) {
      clearTimeout(this.highlightTimer);
      this.highlightTimer = null;
    }
    if (this._highlighted) {
      this._highlighted = false;
      this.notify(this.handlers.highlight, false);
    }
  }

  /**
   * Call a presentation handler. Handlers also run from timer callbacks and
   * between a navigation and its write, so a throw goes to `error` instead.
   */
  private notify<A extends unknown[]>(
    handler: ((...args: A) => void) | undefined,
    ...args: A
  ): void {
    if (!handler) {
      return;
    }
    try {
      handler(...args);
    } catch (error) {
      this.reportError(error);
    }
  }

  private reportError(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.handlers.error) {
      this.handlers.error(err);
    } else {
      console.error(`Terminal session error: ${err.message}`);
    }
  }
}
