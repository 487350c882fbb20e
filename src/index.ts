/**
 * hht-terminal - serial HHT terminal decoding and navigation
 *
 * Main entry point exporting the public API.
 */

// Core session API
export { TerminalSession } from './session';
export type { TerminalSessionHandlers, TerminalSessionOptions } from './session';
export { listSerialPorts } from './discovery';
export { parseSerialSettings, parseBaudRate, DEFAULT_BAUD_RATE } from './config';
export type { SerialSettingsInput } from './config';

// Decoding pipeline and state machine
export * from './protocol';
export { CursorModel, renderLines } from './terminal/cursor-model';
export type { TerminalListener } from './terminal/cursor-model';

// Transport
export { HandoffQueue } from './transport/handoff-queue';
export { StreamPump } from './transport/stream-pump';
export type { PumpEvent, StreamPumpOptions } from './transport/stream-pump';
export { SerialTransport } from './transport/serial-transport';
export type { SerialPortLike } from './transport/serial-transport';
export type { ByteTransport } from './transport/types';

// Models and types
export * from './models';

// Exceptions
export * from './exceptions';
