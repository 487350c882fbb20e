/**
 * Models layer exports for the HHT terminal.
 */

export * from './terminal';
export * from './settings';
export * from './port';
