export { createLogger, createSilentLogger, parseLogLevel } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';

export * from './types.js';
export * from './schemas.js';
export * from './depot-logger.js';
export * from './transport-factory.js';
export * from './transports/console-transport.js';
export * from './transports/file-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
