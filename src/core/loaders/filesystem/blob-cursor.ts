/**
 * BlobCursor
 *
 * Pull-based sequence of blobs over one traversal. Nothing is walked until the
 * first next(). Closing (exhaustion, return(), dispose) releases the traversal
 * and the progress sink exactly once.
 */

import type { Blob } from '../../blob/blob.js';
import type { BlobFactory } from '../../blob/types.js';
import type { Logger } from '../../logger/types.js';
import type { ProgressSink, ProgressSinkFactory } from '../../progress/types.js';
import { LoaderError } from './errors.js';

export interface BlobCursorSource {
    /** Start a fresh traversal */
    openPaths(): Iterator<string, void, undefined>;
    /** Full traversal that only counts; used to size the progress sink */
    countPaths(): number;
    makeBlob: BlobFactory<Blob>;
    /** Present only when progress reporting is on */
    progress?: ProgressSinkFactory | undefined;
    logger: Logger;
}

type CursorState = 'pending' | 'open' | 'closed';

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class BlobCursor implements IterableIterator<Blob>, Disposable {
    private state: CursorState = 'pending';
    private paths: Iterator<string, void, undefined> | undefined;
    private sink: ProgressSink | undefined;
    private pulled = 0;
    private failed = 0;

    constructor(private readonly source: BlobCursorSource) {}

    [Symbol.iterator](): this {
        return this;
    }

    /**
     * Pull the next blob.
     *
     * @throws BlobwalkRuntimeError `loader_item_materialization_failed` when the
     * factory fails for this path; the cursor stays open for the next pull.
     */
    next(): IteratorResult<Blob, undefined> {
        if (this.state === 'closed') {
            return DONE;
        }
        const paths = this.paths ?? this.open();

        let step: IteratorResult<string, void>;
        try {
            step = paths.next();
        } catch (error) {
            this.close();
            throw error;
        }
        if (step.done) {
            this.close();
            return DONE;
        }

        const filePath = step.value;
        this.pulled += 1;
        try {
            return { done: false, value: this.source.makeBlob(filePath) };
        } catch (error) {
            this.failed += 1;
            this.source.logger.warn(`Blob factory failed for ${filePath}`, {
                path: filePath,
                error: error instanceof Error ? error.message : String(error),
            });
            throw LoaderError.itemMaterializationFailed(filePath, error);
        } finally {
            this.sink?.increment();
        }
    }

    return(): IteratorResult<Blob, undefined> {
        this.close();
        return DONE;
    }

    [Symbol.dispose](): void {
        this.close();
    }

    get closed(): boolean {
        return this.state === 'closed';
    }

    private open(): Iterator<string, void, undefined> {
        this.state = 'open';
        try {
            if (this.source.progress) {
                const total = this.source.countPaths();
                this.sink = this.source.progress(total);
                this.source.logger.debug(`Progress sink opened with total ${total}`);
            }
            this.paths = this.source.openPaths();
            return this.paths;
        } catch (error) {
            this.close();
            throw error;
        }
    }

    private close(): void {
        if (this.state === 'closed') {
            return;
        }
        const wasOpen = this.state === 'open';
        this.state = 'closed';

        const paths = this.paths;
        const sink = this.sink;
        this.paths = undefined;
        this.sink = undefined;

        try {
            paths?.return?.();
        } finally {
            sink?.close();
        }

        if (wasOpen) {
            this.source.logger.debug(
                `Cursor closed after ${this.pulled} item(s), ${this.failed} failed`
            );
        }
    }
}
