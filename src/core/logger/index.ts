export { BlobwalkLogger } from './blobwalk-logger.js';
export type { BlobwalkLoggerConfig } from './blobwalk-logger.js';
export { createLogger, createSilentLogger, createTransport } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';
export { LoggerConfigSchema, LoggerTransportSchema } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
export { LogComponent } from './types.js';
export type { LogEntry, LogLevel, Logger, LoggerTransport } from './types.js';
