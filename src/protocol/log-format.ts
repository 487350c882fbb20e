/**
 * Formatting for the operator-facing RX/TX log.
 */

/**
 * Options for {@link formatRxLine}.
 */
export interface RxLineOptions {
  /** Show bytes as hex instead of decoded text (default: true) */
  hex?: boolean;

  /** Prefix the line with a local `HH:MM:SS ` time (default: true) */
  timestamp?: boolean;

  /** Clock used for the timestamp (default: current time) */
  now?: Date;
}

/**
 * Format bytes as upper-case hex pairs separated by spaces.
 *
 * @example
 * ```typescript
 * formatHex(Uint8Array.of(0x7e, 0x0a)); // '7E 0A'
 * ```
 */
export function formatHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' ');
}

function formatClock(date: Date): string {
  const pad = (n: number): string => n.toString().padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Format a received chunk for the raw log.
 */
export function formatRxLine(bytes: Uint8Array, options: RxLineOptions = {}): string {
  const { hex = true, timestamp = true, now = new Date() } = options;
  const prefix = timestamp ? `${formatClock(now)} ` : '';
  // Non-fatal decoder substitutes U+FFFD for invalid sequences.
  const body = hex ? formatHex(bytes) : new TextDecoder('utf-8').decode(bytes);
  return `${prefix}${body}`;
}

export function formatTxLine(bytes: Uint8Array): string {
  return `[TX] ${formatHex(bytes)}`;
}

export function formatTxError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `[TX ERROR] ${message}`;
}
