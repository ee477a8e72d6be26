import type { Blob } from '../../blob/blob.js';
import type { BlobFactory } from '../../blob/types.js';
import type { Logger } from '../../logger/types.js';
import type { ProgressSinkFactory } from '../../progress/types.js';

/**
 * Anything that can produce a sequence of blobs
 */
export interface BlobLoader {
    yieldBlobs(): Iterable<Blob>;
}

/**
 * Collaborators injected into FileSystemBlobLoader
 */
export interface FileSystemBlobLoaderDeps {
    /** Builds the blob for a matched path (default: Blob.fromPath) */
    blobFactory?: BlobFactory<Blob> | undefined;
    /** Progress rendering used when showProgress is on (default: no-op) */
    progress?: ProgressSinkFactory | undefined;
    logger?: Logger | undefined;
}
