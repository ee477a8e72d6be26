/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { LogLevel, Logger } from './types.js';

/**
 * Creates a mock logger whose methods are all vi.fn() spies.
 * Children return the same mock so assertions see every call.
 */
export function createMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        trackException: vi.fn(),
        createChild: vi.fn(() => mockLogger),
        destroy: vi.fn(async () => undefined),
        setLevel: vi.fn(),
        getLevel: vi.fn((): LogLevel => 'info'),
    };
    return mockLogger;
}
