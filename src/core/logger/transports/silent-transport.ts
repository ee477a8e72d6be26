import type { LoggerTransport, LogEntry } from '../types.js';

/**
 * Discards every entry. Default for library use when no logger is injected.
 */
export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}
}
