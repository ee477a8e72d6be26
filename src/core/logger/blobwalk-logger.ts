/**
 * Blobwalk Logger
 *
 * Multi-transport logger with structured entries and component tags.
 */

import type { LogComponent, LogEntry, LogLevel, Logger, LoggerTransport } from './types.js';

export interface BlobwalkLoggerConfig {
    level: LogLevel;
    component: LogComponent;
    transports: LoggerTransport[];
}

/**
 * Level is held in a shared box so children follow `setLevel` on the parent.
 */
interface LevelRef {
    current: LogLevel;
}

// Lower number = more severe. A logger at 'debug' records error, warn, info, debug.
const LEVELS: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    silly: 4,
};

export class BlobwalkLogger implements Logger {
    private readonly levelRef: LevelRef;
    private readonly component: LogComponent;
    private readonly transports: LoggerTransport[];

    constructor(config: BlobwalkLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
        });
    }

    createChild(component: LogComponent): BlobwalkLogger {
        return new BlobwalkLogger(
            { level: this.levelRef.current, component, transports: this.transports },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (LEVELS[level] > LEVELS[this.levelRef.current]) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A failing transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }
}
