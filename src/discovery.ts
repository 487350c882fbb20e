/**
 * Serial port discovery for HHT devices.
 */

import { SerialPort } from 'serialport';
import { SerialConnectionError } from './exceptions';
import type { SerialPortInfo } from './models/port';

/**
 * List the serial ports present on this machine.
 *
 * @returns Ports sorted by path
 * @throws {SerialConnectionError} If the platform listing fails
 *
 * @example
 * ```typescript
 * const ports = await listSerialPorts();
 * const session = await TerminalSession.open({ ...defaults, path: ports[0].path });
 * ```
 */
export async function listSerialPorts(): Promise<SerialPortInfo[]> {
  try {
    const ports = await SerialPort.list();
    return ports
      .map((port) => ({
        path: port.path,
        manufacturer: port.manufacturer,
        serialNumber: port.serialNumber,
      }))
      .sort((a, b) => a.path.localeCompare(b.path));
  } catch (error) {
    if (error instanceof Error) {
      throw new SerialConnectionError(`Port listing failed: ${error.message}`);
    }
    throw new SerialConnectionError('Port listing failed');
  }
}
