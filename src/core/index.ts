/**
 * blobwalk
 *
 * Enumerate files under a directory as lazily-produced blobs.
 */

export * from './errors/index.js';
export * from './logger/index.js';
export * from './blob/index.js';
export * from './progress/index.js';
export * from './loaders/filesystem/index.js';
