/**
 * Blob records and their errors
 */

export { Blob } from './blob.js';
export type { BlobData, BlobFactory, BlobInit, FromDataOptions, FromPathOptions } from './types.js';
export { BlobError } from './errors.js';
export { BlobErrorCode } from './error-codes.js';
