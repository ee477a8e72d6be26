export { FileSystemBlobLoader } from './filesystem-blob-loader.js';
export { BlobCursor } from './blob-cursor.js';
export type { BlobCursorSource } from './blob-cursor.js';
export {
    DEFAULT_GLOB,
    FileSystemBlobLoaderOptionsSchema,
    parseLoaderOptions,
    toRootPath,
} from './schemas.js';
export type {
    FileSystemBlobLoaderConfig,
    FileSystemBlobLoaderOptions,
    RootPath,
} from './schemas.js';
export type { BlobLoader, FileSystemBlobLoaderDeps } from './types.js';
export { LoaderError } from './errors.js';
export { LoaderErrorCode } from './error-codes.js';
