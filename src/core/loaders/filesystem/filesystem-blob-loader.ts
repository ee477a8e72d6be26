/**
 * FileSystem Blob Loader
 *
 * Walks a directory with a glob pattern and yields one blob per matching
 * regular file. Every call re-walks the tree; nothing is cached between calls.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globIterateSync } from 'glob';
import { Blob } from '../../blob/blob.js';
import type { BlobFactory } from '../../blob/types.js';
import { createSilentLogger } from '../../logger/factory.js';
import { LogComponent, type Logger } from '../../logger/types.js';
import { noopProgress } from '../../progress/noop-progress.js';
import type { ProgressSinkFactory } from '../../progress/types.js';
import { BlobCursor } from './blob-cursor.js';
import { LoaderError } from './errors.js';
import {
    parseLoaderOptions,
    toRootPath,
    type FileSystemBlobLoaderOptions,
    type RootPath,
} from './schemas.js';
import type { BlobLoader, FileSystemBlobLoaderDeps } from './types.js';

// Matched entries that vanished or dangle are not regular files; skip them.
const NOT_A_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'ELOOP']);

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);

// A directory the walker can list and enter
const DIRECTORY_ACCESS = fs.constants.R_OK | fs.constants.X_OK;

function errnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Blob loader for the local file system.
 *
 * @example
 * ```typescript
 * // All non-hidden files, recursively
 * const loader = new FileSystemBlobLoader('/path/to/dir');
 *
 * // Only text and markdown files, with a spinner
 * const docs = new FileSystemBlobLoader(
 *   '/path/to/dir',
 *   { suffixes: ['.txt', '.md'], showProgress: true },
 *   { progress: createSpinnerProgress() }
 * );
 *
 * for (const blob of docs.yieldBlobs()) {
 *   console.log(blob.source, blob.mimeType);
 * }
 * ```
 */
export class FileSystemBlobLoader implements BlobLoader {
    readonly root: string;
    readonly glob: string;
    readonly exclude: readonly string[];
    readonly suffixes: ReadonlySet<string>;
    readonly showProgress: boolean;

    private readonly blobFactory: BlobFactory<Blob>;
    private readonly progress: ProgressSinkFactory;
    private readonly logger: Logger;

    /**
     * @param root - Directory to walk. Existence is checked when enumeration starts.
     * @param options - Validated against FileSystemBlobLoaderOptionsSchema
     * @throws BlobwalkRuntimeError `loader_invalid_root` for an unsupported root
     * @throws BlobwalkValidationError `loader_invalid_options` for bad options
     */
    constructor(
        root: RootPath,
        options: FileSystemBlobLoaderOptions = {},
        deps: FileSystemBlobLoaderDeps = {}
    ) {
        this.root = toRootPath(root);
        const config = parseLoaderOptions(options);

        this.glob = config.glob;
        this.exclude = Object.freeze([...config.exclude]);
        this.suffixes = new Set(config.suffixes);
        this.showProgress = config.showProgress;

        this.blobFactory = deps.blobFactory ?? ((filePath) => Blob.fromPath(filePath));
        this.progress = deps.progress ?? noopProgress;
        this.logger = (deps.logger ?? createSilentLogger(LogComponent.LOADER)).createChild(
            LogComponent.LOADER
        );

        this.logger.debug('FileSystemBlobLoader configured', {
            root: this.root,
            glob: this.glob,
            exclude: this.exclude,
            suffixes: [...this.suffixes],
            showProgress: this.showProgress,
        });
    }

    /**
     * Lazily yield a blob for every matching file.
     *
     * With showProgress on, the first pull counts all matches, opens the progress
     * sink with that total, then walks again to produce blobs. If the tree changes
     * between the two walks the total may not match what is yielded.
     */
    yieldBlobs(): BlobCursor {
        return new BlobCursor({
            openPaths: () => this.yieldPaths(),
            countPaths: () => this.countMatchingFiles(),
            makeBlob: this.blobFactory,
            progress: this.showProgress ? this.progress : undefined,
            logger: this.logger,
        });
    }

    /**
     * Count matching files without creating blobs.
     */
    countMatchingFiles(): number {
        let count = 0;
        for (const _ of this.yieldPaths()) {
            count += 1;
        }
        this.logger.debug(`Counted ${count} matching file(s) under ${this.root}`);
        return count;
    }

    /**
     * Paths of matching regular files, in walk order.
     * Entries the process may not read are skipped with a warning, so a
     * partial walk is never silent.
     */
    private *yieldPaths(): Generator<string, void, undefined> {
        this.assertRootIsDirectory();

        const matches = globIterateSync(this.glob, {
            cwd: this.root,
            ignore: [...this.exclude],
            dot: false,
        });

        for (const match of matches) {
            const filePath = path.join(this.root, match);
            if (!this.isRegularFile(filePath)) {
                continue;
            }
            if (this.suffixes.size > 0 && !this.suffixes.has(path.extname(filePath))) {
                this.logger.silly(`Skipping ${filePath}: suffix not accepted`);
                continue;
            }
            yield filePath;
        }
    }

    private assertRootIsDirectory(): void {
        let stats: fs.Stats | undefined;
        try {
            stats = fs.statSync(this.root, { throwIfNoEntry: false });
        } catch (error) {
            const code = errnoCode(error);
            if (code === 'ENOTDIR') {
                throw LoaderError.rootNotFound(this.root);
            }
            if (code !== undefined && PERMISSION_CODES.has(code)) {
                throw LoaderError.permissionDenied(this.root, error);
            }
            throw LoaderError.traversalFailed(this.root, this.root, error);
        }
        if (stats === undefined) {
            throw LoaderError.rootNotFound(this.root);
        }
        if (!stats.isDirectory()) {
            throw LoaderError.rootNotDirectory(this.root);
        }
        try {
            fs.accessSync(this.root, DIRECTORY_ACCESS);
        } catch (error) {
            throw LoaderError.permissionDenied(this.root, error);
        }
    }

    /**
     * Follows symlinks: a link to a file counts, a link to a directory does not.
     */
    private isRegularFile(filePath: string): boolean {
        let stats: fs.Stats;
        try {
            stats = fs.statSync(filePath);
        } catch (error) {
            const code = errnoCode(error);
            if (code !== undefined && NOT_A_FILE_CODES.has(code)) {
                this.logger.debug(`Skipping ${filePath}: ${code}`);
                return false;
            }
            if (code !== undefined && PERMISSION_CODES.has(code)) {
                this.logger.warn(`Skipping ${filePath}: permission denied`, {
                    path: filePath,
                    code,
                });
                return false;
            }
            throw LoaderError.traversalFailed(this.root, filePath, error);
        }

        if (stats.isDirectory()) {
            this.warnIfUnreadableDirectory(filePath);
            return false;
        }
        if (!stats.isFile()) {
            this.logger.silly(`Skipping non-file ${filePath}`);
            return false;
        }
        return true;
    }

    /**
     * The walker lists an unreadable directory as empty; say so.
     */
    private warnIfUnreadableDirectory(dirPath: string): void {
        try {
            fs.accessSync(dirPath, DIRECTORY_ACCESS);
        } catch (error) {
            this.logger.warn(`Skipping unreadable directory ${dirPath}`, {
                path: dirPath,
                code: errnoCode(error),
            });
        }
    }
}
