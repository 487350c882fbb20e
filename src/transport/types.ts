/**
 * Byte transport collaborator used by the stream pump and the session.
 */

/**
 * Non-blocking byte source and sink.
 *
 * Reads never wait: `bytesAvailable()` reports what is buffered and
 * `read()` returns at most that many bytes.
 */
export interface ByteTransport {
  readonly isOpen: boolean;

  /** Bytes that can be read right now without waiting */
  bytesAvailable(): number;

  /** Take up to `maxBytes` buffered bytes (possibly none) */
  read(maxBytes: number): Uint8Array;

  /** Send bytes; rejects when the transport is closed or the write fails */
  write(data: Uint8Array): Promise<void>;

  close(): Promise<void>;
}
