/**
 * Console Transport
 *
 * Writes to stderr so command output on stdout stays machine-readable.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const timestamp = new Date(entry.timestamp).toLocaleTimeString();
        let message = `${timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}`;

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        if (entry.context && Object.keys(entry.context).length > 0) {
            message += '\n' + JSON.stringify(entry.context, null, 2);
        }

        console.error(message);
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'silly':
            case 'debug':
                return chalk.gray;
            case 'info':
                return chalk.cyan;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
        }
    }
}
