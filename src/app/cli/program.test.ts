import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createProgram, reportCommandError } from './program.js';
import { LoaderError } from '../../core/loaders/filesystem/errors.js';

vi.mock('chalk', () => ({
    default: {
        gray: vi.fn((text: string) => text),
        red: vi.fn((text: string) => text),
        yellow: vi.fn((text: string) => text),
        cyan: vi.fn((text: string) => text),
    },
}));

describe('blobwalk program', () => {
    let tempDir: string;
    let mockConsoleLog: MockInstance<typeof console.log>;
    let mockConsoleError: MockInstance<typeof console.error>;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blobwalk-cli-'));
        await fs.writeFile(path.join(tempDir, 'a.txt'), 'alpha');
        await fs.writeFile(path.join(tempDir, 'b.md'), '# beta');

        mockConsoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
        mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('runs count with parsed flags', async () => {
        await createProgram('0.0.0-test').parseAsync([
            'node',
            'blobwalk',
            'count',
            tempDir,
            '--suffix',
            '.txt',
        ]);

        expect(mockConsoleLog).toHaveBeenCalledWith('1');
        expect(process.exitCode).toBeUndefined();
    });

    it('reports a missing directory and sets the exit code', async () => {
        const missing = path.join(tempDir, 'missing');

        await createProgram('0.0.0-test').parseAsync(['node', 'blobwalk', 'list', missing]);

        expect(mockConsoleError).toHaveBeenCalledWith(
            `❌ blobwalk list: Directory not found: ${missing}`
        );
        expect(process.exitCode).toBe(1);
    });

    it('lists with --json and --limit', async () => {
        await createProgram('0.0.0-test').parseAsync([
            'node',
            'blobwalk',
            'list',
            tempDir,
            '--json',
            '--limit',
            '1',
        ]);

        expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    });
});

describe('reportCommandError', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
    });

    it('prints runtime errors with their recovery hint', () => {
        const mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const error = LoaderError.invalidRoot('number');

        reportCommandError('count', error);

        expect(mockConsoleError.mock.calls).toEqual([
            ['❌ blobwalk count: Invalid root path (number). Expected a string or a file: URL'],
            ['   Pass a directory path as a string or a file: URL'],
        ]);
        expect(process.exitCode).toBe(1);
    });

    it('prints unknown failures', () => {
        const mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

        reportCommandError('load', 'boom');

        expect(mockConsoleError).toHaveBeenCalledWith('❌ blobwalk load failed: boom');
        expect(process.exitCode).toBe(1);
    });
});
