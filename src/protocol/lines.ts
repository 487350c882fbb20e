/**
 * LCD line reconstruction from frame bytes.
 */

import {
  GLYPH_MAP,
  LINE_TERMINATORS,
  PADDING_BYTE,
  PRINTABLE_MAX,
  PRINTABLE_MIN,
} from './constants';

function isPrintable(byte: number): boolean {
  return byte >= PRINTABLE_MIN && byte <= PRINTABLE_MAX;
}

/**
 * Decode LCD bytes to text.
 *
 * Glyph-map bytes become their glyph and printable ASCII its character.
 * Anything else contributes nothing.
 *
 * @param bytes - Bytes of a single line
 */
export function decodeText(bytes: Iterable<number>): string {
  let text = '';
  for (const byte of bytes) {
    const glyph = GLYPH_MAP.get(byte);
    if (glyph !== undefined) {
      text += glyph;
    } else if (isPrintable(byte)) {
      text += String.fromCharCode(byte);
    }
  }
  return text;
}

/**
 * Split one frame into display lines.
 *
 * Padding bytes (0x80) are removed first. 0xC0, 0x94 and 0xD4 end the current
 * line and are never rendered, even though 0xD4 also has a glyph. Bytes that
 * are neither glyphs nor printable ASCII are dropped. Lines are trimmed and
 * blank ones omitted.
 *
 * @param frame - Frame payload without delimiters
 * @returns Non-empty, trimmed lines in frame order
 *
 * @example
 * ```typescript
 * splitLines(Uint8Array.of(0x41, 0xc0, 0x42, 0x94, 0x43)); // ['A', 'B', 'C']
 * ```
 */
export function splitLines(frame: Uint8Array): string[] {
  const lines: string[] = [];
  let current: number[] = [];

  const flush = (): void => {
    if (current.length > 0) {
      lines.push(decodeText(current).trim());
      current = [];
    }
  };

  for (const byte of frame) {
    if (byte === PADDING_BYTE) {
      continue;
    }
    if (LINE_TERMINATORS.has(byte)) {
      flush();
    } else if (GLYPH_MAP.has(byte) || isPrintable(byte)) {
      current.push(byte);
    }
  }
  flush();

  return lines.filter((line) => line !== '');
}
