/**
 * Protocol layer exports for the HHT serial link.
 */

export * from './constants';
export * from './framer';
export * from './lines';
export * from './commands';
export * from './log-format';
