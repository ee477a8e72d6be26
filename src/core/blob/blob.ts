/**
 * Blob
 *
 * A file-backed (or in-memory) binary record. Construction never touches the
 * filesystem; content is read on demand by asString(), asBytes() and asStream().
 */

import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import { Readable } from 'node:stream';
import mime from 'mime-types';
import { BlobError } from './errors.js';
import type { BlobData, BlobInit, FromDataOptions, FromPathOptions } from './types.js';

const DEFAULT_ENCODING: BufferEncoding = 'utf-8';

export class Blob {
    readonly data: BlobData | undefined;
    readonly path: string | undefined;
    readonly mimeType: string | undefined;
    readonly encoding: BufferEncoding;
    readonly metadata: Readonly<Record<string, unknown>>;

    constructor(init: BlobInit) {
        if (init.data === undefined && init.path === undefined) {
            throw BlobError.missingContent();
        }
        this.data = init.data;
        this.path = init.path;
        this.mimeType = init.mimeType;
        this.encoding = init.encoding ?? DEFAULT_ENCODING;
        this.metadata = Object.freeze({ ...init.metadata });
    }

    /**
     * Reference a file without reading it.
     */
    static fromPath(path: string, options: FromPathOptions = {}): Blob {
        const guessType = options.guessType ?? true;
        let mimeType = options.mimeType;
        if (mimeType === undefined && guessType) {
            mimeType = mime.lookup(path) || undefined;
        }

        return new Blob({
            path,
            mimeType,
            encoding: options.encoding,
            metadata: options.metadata,
        });
    }

    static fromData(data: BlobData, options: FromDataOptions = {}): Blob {
        return new Blob({ data, ...options });
    }

    /**
     * Where the blob came from: `metadata.source` when set, else the path.
     */
    get source(): string | undefined {
        const source = this.metadata['source'];
        return typeof source === 'string' ? source : this.path;
    }

    async asString(): Promise<string> {
        if (typeof this.data === 'string') {
            return this.data;
        }
        if (this.data !== undefined) {
            return Buffer.from(this.data).toString(this.encoding);
        }
        return await this.readFile((filePath) => fs.readFile(filePath, this.encoding));
    }

    async asBytes(): Promise<Uint8Array> {
        if (typeof this.data === 'string') {
            return Buffer.from(this.data, this.encoding);
        }
        if (this.data !== undefined) {
            return this.data;
        }
        return await this.readFile((filePath) => fs.readFile(filePath));
    }

    /**
     * Stream the content. Read errors surface as stream 'error' events.
     */
    asStream(): Readable {
        if (typeof this.data === 'string') {
            return Readable.from([Buffer.from(this.data, this.encoding)]);
        }
        if (this.data !== undefined) {
            return Readable.from([Buffer.from(this.data)]);
        }
        return createReadStream(this.requirePath());
    }

    toString(): string {
        return `Blob ${this.source ?? '<inline>'}`;
    }

    private requirePath(): string {
        if (this.path === undefined) {
            throw BlobError.missingContent();
        }
        return this.path;
    }

    private async readFile<T>(read: (filePath: string) => Promise<T>): Promise<T> {
        const filePath = this.requirePath();
        try {
            return await read(filePath);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw BlobError.notFound(filePath);
            }
            throw BlobError.readFailed(filePath, error);
        }
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
