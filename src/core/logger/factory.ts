/**
 * Logger Factory
 *
 * Builds loggers from `LoggerConfigSchema` input.
 */

import { BlobwalkLogger } from './blobwalk-logger.js';
import { LoggerError } from './errors.js';
import {
    LoggerConfigSchema,
    type LoggerConfigInput,
    type LoggerTransportConfig,
} from './schemas.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { SilentTransport } from './transports/silent-transport.js';
import { LogComponent, type Logger, type LoggerTransport } from './types.js';

export interface CreateLoggerOptions {
    /** Raw logger configuration; validated and defaulted here */
    config?: LoggerConfigInput;
    /** Component identifier (defaults to CLI) */
    component?: LogComponent;
}

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();
        case 'console':
            return new ConsoleTransport({ colorize: config.colorize });
        default: {
            const unknownType: { type: string } = config;
            throw LoggerError.unknownTransportType(unknownType.type);
        }
    }
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'debug', transports: [{ type: 'console' }] },
 *   component: LogComponent.CLI,
 * });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
    const parsed = LoggerConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
        throw LoggerError.invalidConfig(parsed.error);
    }

    return new BlobwalkLogger({
        level: parsed.data.level,
        component: options.component ?? LogComponent.CLI,
        transports: parsed.data.transports.map(createTransport),
    });
}

/**
 * Logger that drops everything. Used when a caller injects none.
 */
export function createSilentLogger(component: LogComponent): Logger {
    return new BlobwalkLogger({
        level: 'error',
        component,
        transports: [new SilentTransport()],
    });
}
