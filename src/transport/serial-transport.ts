/**
 * Serial port transport for HHT devices.
 *
 * Adapts the event-driven `serialport` stream to the non-blocking
 * {@link ByteTransport} interface:
 * - Incoming data is buffered until the pump reads it
 * - Writes resolve once the port has accepted the bytes
 * - Close is idempotent
 */

import { SerialPort } from 'serialport';
import { SerialConnectionError } from '../exceptions';
import type { SerialSettings } from '../models/settings';
import type { ByteTransport } from './types';

/**
 * The part of a `serialport` stream this transport relies on.
 */
export interface SerialPortLike {
  readonly isOpen: boolean;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean;
  close(callback: (error: Error | null) => void): void;
}

/**
 * Open a serial port with the given settings.
 *
 * @throws {SerialConnectionError} If the port cannot be opened
 */
async function openSerialPort(settings: SerialSettings): Promise<SerialPort> {
  const port = new SerialPort({
    path: settings.path,
    baudRate: settings.baudRate,
    dataBits: settings.dataBits,
    parity: settings.parity,
    stopBits: settings.stopBits,
    autoOpen: false,
  });

  await new Promise<void>((resolve, reject) => {
    port.open((error) => {
      if (error) {
        reject(new SerialConnectionError(`Failed to open ${settings.path}: ${error.message}`));
      } else {
        resolve();
      }
    });
  });

  return port;
}

/**
 * Byte transport over a serial port.
 */
export class SerialTransport implements ByteTransport {
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private closed = false;

  constructor(private readonly port: SerialPortLike, readonly path: string = 'serial') {
    this.port.on('data', (chunk) => this.handleData(chunk));
    this.port.on('close', () => this.handleClose());
    this.port.on('error', (error) => {
      console.warn(`Serial port ${this.path} error: ${error.message}`);
    });
  }

  /**
   * Open a serial port and wrap it.
   *
   * @throws {SerialConnectionError} If the port cannot be opened
   */
  static async open(settings: SerialSettings): Promise<SerialTransport> {
    const port = await openSerialPort(settings);
    console.log(
      `Connected to ${settings.path} at ${settings.baudRate} baud ` +
        `(${settings.dataBits}${settings.parity[0].toUpperCase()}${settings.stopBits})`
    );
    return new SerialTransport(port, settings.path);
  }

  get isOpen(): boolean {
    return !this.closed && this.port.isOpen;
  }

  bytesAvailable(): number {
    return this.pendingBytes;
  }

  /**
   * Take up to `maxBytes` buffered bytes. Returns an empty array when nothing
   * has arrived.
   */
  read(maxBytes: number): Uint8Array {
    const size = Math.max(0, Math.min(maxBytes, this.pendingBytes));
    const out = new Uint8Array(size);
    let offset = 0;

    while (offset < size) {
      const head = this.pending[0];
      const take = Math.min(head.length, size - offset);
      out.set(head.subarray(0, take), offset);
      offset += take;
      if (take === head.length) {
        this.pending.shift();
      } else {
        this.pending[0] = head.subarray(take);
      }
    }

    this.pendingBytes -= size;
    return out;
  }

  /**
   * Write bytes to the port.
   *
   * @throws {SerialConnectionError} If the port is closed or the write fails
   */
  async write(data: Uint8Array): Promise<void> {
    if (!this.isOpen) {
      throw new SerialConnectionError(`Port ${this.path} is not open`);
    }

    await new Promise<void>((resolve, reject) => {
      this.port.write(Buffer.from(data), (error) => {
        if (error) {
          reject(new SerialConnectionError(`Failed to write to ${this.path}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close the port. Buffered bytes are discarded.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pending = [];
    this.pendingBytes = 0;

    if (!this.port.isOpen) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.port.close((error) => {
        if (error) {
          reject(new SerialConnectionError(`Failed to close ${this.path}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
    console.log(`Disconnected from ${this.path}`);
  }

  private handleData(chunk: Buffer): void {
    if (this.closed || chunk.length === 0) {
      return;
    }
    this.pending.push(new Uint8Array(chunk));
    this.pendingBytes += chunk.length;
  }

  private handleClose(): void {
    if (!this.closed) {
      console.log(`Port ${this.path} closed by device`);
    }
    this.closed = true;
  }
}
