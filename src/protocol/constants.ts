/**
 * Byte-level protocol constants for the HHT serial link.
 */

/** Opens and closes a frame. Frames do not nest. */
export const FRAME_DELIMITER = 0x7e;

/** Padding byte removed from every frame before interpretation. */
export const PADDING_BYTE = 0x80;

/**
 * Control bytes that end the current LCD line.
 *
 * 0xD4 is also listed in {@link GLYPH_MAP}; the terminator check runs first,
 * so the glyph entry is never reached.
 */
export const LINE_TERMINATORS: ReadonlySet<number> = new Set([0xc0, 0x94, 0xd4]);

/**
 * LCD glyphs for non-printable bytes.
 */
export const GLYPH_MAP: ReadonlyMap<number, string> = new Map([
  [0xa3, '↑'],
  [0xa4, '↓'],
  [0xd4, '●'],
  [0xe4, '○'],
]);

export const PRINTABLE_MIN = 32;
export const PRINTABLE_MAX = 126;

/** Marker drawn in front of the selected line. */
export const CURSOR_MARKER = '▶';

// Timing defaults (milliseconds)
export const POLL_INTERVAL_MS = 5;
export const BLINK_INTERVAL_MS = 500;
export const HIGHLIGHT_MS = 500;

/**
 * Single-byte commands sent back to the device.
 */
export enum CommandByte {
  ESC = 0x04,
  UP = 0x08,
  DOWN = 0x01,
  ENT = 0x02,
}
