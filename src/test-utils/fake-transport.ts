import { SerialConnectionError } from '../exceptions';
import type { ByteTransport } from '../transport/types';

/**
 * In-memory transport: tests push device bytes in and inspect what was written.
 */
export class FakeTransport implements ByteTransport {
  readonly written: Uint8Array[] = [];
  isOpen = true;
  closeCount = 0;
  readError: Error | null = null;
  private inbound: number[] = [];

  push(bytes: readonly number[]): void {
    this.inbound.push(...bytes);
  }

  bytesAvailable(): number {
    if (this.readError) {
      throw this.readError;
    }
    return this.inbound.length;
  }

  read(maxBytes: number): Uint8Array {
    return Uint8Array.from(this.inbound.splice(0, maxBytes));
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.isOpen) {
      throw new SerialConnectionError('Port fake is not open');
    }
    this.written.push(data);
  }

  async close(): Promise<void> {
    this.isOpen = false;
    this.closeCount++;
  }
}
