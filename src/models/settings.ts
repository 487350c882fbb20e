/**
 * Serial line and session settings.
 */

export type Parity = 'none' | 'even' | 'odd' | 'mark' | 'space';
export type DataBits = 5 | 6 | 7 | 8;
export type StopBits = 1 | 1.5 | 2;

/**
 * Serial port parameters.
 */
export interface SerialSettings {
  /** Device path, e.g. `/dev/ttyUSB0` or `COM3` */
  path: string;
  baudRate: number;
  dataBits: DataBits;
  parity: Parity;
  stopBits: StopBits;
}

/**
 * Tunables for a terminal session. All fields are optional.
 */
export interface SessionSettings {
  /** Sleep between empty transport polls */
  pollIntervalMs?: number;

  /** Cursor blink period */
  blinkIntervalMs?: number;

  /** How long the display stays highlighted after ENT */
  highlightMs?: number;

  /** Upper bound on bytes taken per read; defaults to everything available */
  readChunkSize?: number;

  /** Raw log shows hex (true) or decoded text (false) */
  hexLog?: boolean;

  /** Prefix raw log lines with the local time */
  timestamps?: boolean;
}
