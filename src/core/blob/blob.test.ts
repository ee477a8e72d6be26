import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { Blob } from './blob.js';
import { BlobErrorCode } from './error-codes.js';

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf-8');
}

describe('Blob', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blobwalk-blob-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('construction', () => {
        it('requires data or a path', () => {
            expect(() => new Blob({})).toThrow('A blob needs either inline data or a path');
        });

        it('freezes metadata', () => {
            const blob = Blob.fromData('x', { metadata: { source: 'memory' } });

            expect(Object.isFrozen(blob.metadata)).toBe(true);
            expect(blob.encoding).toBe('utf-8');
        });
    });

    describe('fromPath', () => {
        it('does not touch the filesystem', () => {
            const blob = Blob.fromPath(path.join(tempDir, 'missing.txt'));

            expect(blob.path).toBe(path.join(tempDir, 'missing.txt'));
            expect(blob.data).toBeUndefined();
        });

        it('guesses the MIME type from the extension', () => {
            expect(Blob.fromPath('/docs/readme.md').mimeType).toBe('text/markdown');
            expect(Blob.fromPath('/docs/page.html').mimeType).toBe('text/html');
            expect(Blob.fromPath('/docs/notes.txt').mimeType).toBe('text/plain');
        });

        it('leaves the MIME type unset for unknown extensions', () => {
            expect(Blob.fromPath('/docs/data.unknownext').mimeType).toBeUndefined();
            expect(Blob.fromPath('/docs/Makefile').mimeType).toBeUndefined();
        });

        it('prefers an explicit MIME type and can skip guessing', () => {
            expect(Blob.fromPath('/a.txt', { mimeType: 'application/x-custom' }).mimeType).toBe(
                'application/x-custom'
            );
            expect(Blob.fromPath('/a.txt', { guessType: false }).mimeType).toBeUndefined();
        });
    });

    describe('source', () => {
        it('uses metadata.source when it is a string', () => {
            const blob = Blob.fromPath('/a.txt', { metadata: { source: 's3://bucket/a.txt' } });

            expect(blob.source).toBe('s3://bucket/a.txt');
        });

        it('falls back to the path', () => {
            expect(Blob.fromPath('/a.txt', { metadata: { source: 42 } }).source).toBe('/a.txt');
            expect(Blob.fromData('inline').source).toBeUndefined();
        });
    });

    describe('reading', () => {
        it('reads file content as string, bytes and stream', async () => {
            const filePath = path.join(tempDir, 'note.txt');
            await fs.writeFile(filePath, 'hello');
            const blob = Blob.fromPath(filePath);

            expect(await blob.asString()).toBe('hello');
            expect(Buffer.from(await blob.asBytes()).toString('utf-8')).toBe('hello');
            expect(await readAll(blob.asStream())).toBe('hello');
        });

        it('reads inline string data', async () => {
            const blob = Blob.fromData('inline text');

            expect(await blob.asString()).toBe('inline text');
            expect((await blob.asBytes()).byteLength).toBe(11);
            expect(await readAll(blob.asStream())).toBe('inline text');
        });

        it('decodes inline bytes with the blob encoding', async () => {
            const blob = Blob.fromData(Buffer.from('café', 'latin1'), { encoding: 'latin1' });

            expect(await blob.asString()).toBe('café');
        });

        it('reports a missing file as not found', async () => {
            const blob = Blob.fromPath(path.join(tempDir, 'gone.txt'));

            await expect(blob.asString()).rejects.toMatchObject({
                code: BlobErrorCode.BLOB_NOT_FOUND,
            });
        });

        it('reports other read failures as read errors', async () => {
            const blob = Blob.fromPath(tempDir);

            await expect(blob.asBytes()).rejects.toMatchObject({
                code: BlobErrorCode.BLOB_READ_FAILED,
                context: { path: tempDir },
            });
        });
    });
});
