/**
 * Frame extraction for the 0x7E-delimited HHT protocol.
 */

import { FRAME_DELIMITER } from './constants';

/**
 * Stateful scanner that turns an arbitrary byte stream into complete frames.
 *
 * The transport may split frames at any byte boundary, so the extractor keeps
 * its buffer and armed flag between calls. Stray delimiters and truncated
 * frames fall back into the armed/disarmed cycle instead of raising.
 *
 * @example
 * ```typescript
 * const extractor = new FrameExtractor();
 * extractor.feed(Uint8Array.of(0x7e, 0x41)); // []
 * extractor.feed(Uint8Array.of(0x42, 0x7e)); // [Uint8Array [0x41, 0x42]]
 * ```
 */
export class FrameExtractor {
  private buffer: number[] = [];
  private _armed = false;

  /**
   * Whether a frame is currently open.
   */
  get armed(): boolean {
    return this._armed;
  }

  /**
   * Number of bytes collected for the open frame.
   */
  get pendingLength(): number {
    return this.buffer.length;
  }

  /**
   * Scan a chunk and return every frame it completes, in arrival order.
   *
   * @param chunk - Raw bytes as read from the transport
   */
  feed(chunk: Uint8Array): Uint8Array[] {
    const frames: Uint8Array[] = [];

    for (const byte of chunk) {
      if (byte === FRAME_DELIMITER) {
        if (this._armed && this.buffer.length > 0) {
          frames.push(Uint8Array.from(this.buffer));
          this.buffer = [];
          this._armed = false;
        } else {
          // Idle start, or an empty 7E 7E pair: (re)open.
          this.buffer = [];
          this._armed = true;
        }
      } else if (this._armed) {
        this.buffer.push(byte);
      }
    }

    return frames;
  }

  /**
   * Drop any partial frame and wait for the next opening delimiter.
   */
  reset(): void {
    this.buffer = [];
    this._armed = false;
  }
}
