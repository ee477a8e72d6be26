import { describe, it, expect, vi } from 'vitest';
import { BlobCursor, type BlobCursorSource } from './blob-cursor.js';
import { LoaderErrorCode } from './error-codes.js';
import { Blob } from '../../blob/blob.js';
import { createMockLogger } from '../../logger/test-utils.js';
import type { ProgressSink } from '../../progress/types.js';

function* pathsOf(items: string[], failAt?: number): Generator<string, void, undefined> {
    for (const [index, item] of items.entries()) {
        if (index === failAt) {
            throw new Error('walk failed');
        }
        yield item;
    }
}

function createSource(overrides: Partial<BlobCursorSource> = {}) {
    const sink: ProgressSink = { increment: vi.fn(), close: vi.fn() };
    const source = {
        openPaths: vi.fn(() => pathsOf(['/data/one.txt', '/data/two.txt'])),
        countPaths: vi.fn(() => 2),
        makeBlob: vi.fn((filePath: string) => Blob.fromPath(filePath)),
        progress: vi.fn((_total: number) => sink),
        logger: createMockLogger(),
        ...overrides,
    };
    return { source, sink };
}

describe('BlobCursor', () => {
    it('opens nothing before the first pull', () => {
        const { source } = createSource();

        new BlobCursor(source);

        expect(source.openPaths).not.toHaveBeenCalled();
        expect(source.countPaths).not.toHaveBeenCalled();
    });

    it('yields one blob per path, then reports done', () => {
        const { source, sink } = createSource();
        const cursor = new BlobCursor(source);

        expect(cursor.next().value?.path).toBe('/data/one.txt');
        expect(cursor.next().value?.path).toBe('/data/two.txt');
        expect(cursor.next()).toEqual({ done: true, value: undefined });

        expect(source.progress).toHaveBeenCalledWith(2);
        expect(sink.increment).toHaveBeenCalledTimes(2);
        expect(sink.close).toHaveBeenCalledTimes(1);
        expect(cursor.closed).toBe(true);
    });

    it('skips counting when no progress factory is given', () => {
        const { source } = createSource({ progress: undefined });
        const cursor = new BlobCursor(source);

        expect(Array.from(cursor)).toHaveLength(2);
        expect(source.countPaths).not.toHaveBeenCalled();
    });

    it('closes without walking when returned before the first pull', () => {
        const { source } = createSource();
        const cursor = new BlobCursor(source);

        expect(cursor.return()).toEqual({ done: true, value: undefined });
        expect(cursor.next()).toEqual({ done: true, value: undefined });
        expect(source.openPaths).not.toHaveBeenCalled();
        expect(source.progress).not.toHaveBeenCalled();
    });

    it('releases the traversal when returned early', () => {
        const inner = pathsOf(['/data/one.txt', '/data/two.txt']);
        const returnSpy = vi.fn((): IteratorResult<string, void> => inner.return());
        const paths: Iterator<string, void, undefined> = {
            next: () => inner.next(),
            return: returnSpy,
        };
        const { source, sink } = createSource({ openPaths: () => paths });
        const cursor = new BlobCursor(source);

        cursor.next();
        cursor.return();

        expect(returnSpy).toHaveBeenCalledTimes(1);
        expect(sink.close).toHaveBeenCalledTimes(1);
    });

    it('closes and rethrows when the walk fails', () => {
        const { source, sink } = createSource({
            openPaths: () => pathsOf(['/data/one.txt', '/data/two.txt'], 1),
        });
        const cursor = new BlobCursor(source);

        cursor.next();
        expect(() => cursor.next()).toThrow('walk failed');

        expect(sink.close).toHaveBeenCalledTimes(1);
        expect(cursor.next()).toEqual({ done: true, value: undefined });
    });

    it('wraps factory failures and stays open for the next path', () => {
        const { source, sink } = createSource({
            makeBlob: (filePath: string) => {
                if (filePath === '/data/one.txt') {
                    throw new Error('vanished');
                }
                return Blob.fromPath(filePath);
            },
        });
        const cursor = new BlobCursor(source);

        let failure: unknown;
        try {
            cursor.next();
        } catch (error) {
            failure = error;
        }

        expect(failure).toMatchObject({
            code: LoaderErrorCode.ITEM_MATERIALIZATION_FAILED,
            message: 'Failed to create blob for /data/one.txt. vanished',
        });
        expect(cursor.closed).toBe(false);
        expect(cursor.next().value?.path).toBe('/data/two.txt');
        expect(sink.increment).toHaveBeenCalledTimes(2);
        expect(source.logger.warn).toHaveBeenCalledWith('Blob factory failed for /data/one.txt', {
            path: '/data/one.txt',
            error: 'vanished',
        });
    });

    it('does not open the sink when counting throws', () => {
        const { source } = createSource({
            countPaths: () => {
                throw new Error('count failed');
            },
        });
        const cursor = new BlobCursor(source);

        expect(() => cursor.next()).toThrow('count failed');
        expect(source.progress).not.toHaveBeenCalled();
        expect(source.openPaths).not.toHaveBeenCalled();
        expect(cursor.closed).toBe(true);
    });
});
