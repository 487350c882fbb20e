/**
 * Exception classes for the HHT terminal library.
 */

export class HhtTerminalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HhtTerminalError';
  }
}

export class SerialConnectionError extends HhtTerminalError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialConnectionError';
  }
}

export class QueueClosedError extends HhtTerminalError {
  constructor(message: string) {
    super(message);
    this.name = 'QueueClosedError';
  }
}

export class HandoffTimeoutError extends HhtTerminalError {
  constructor(message: string) {
    super(message);
    this.name = 'HandoffTimeoutError';
  }
}

export class ConfigError extends HhtTerminalError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
