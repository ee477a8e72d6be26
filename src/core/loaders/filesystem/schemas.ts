/**
 * FileSystemBlobLoader options.
 *
 * The schema is the single source of defaults; the loader uses parsed values as-is.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { LoaderError } from './errors.js';

/** Every non-hidden entry, recursively */
export const DEFAULT_GLOB = '**/[!.]*';

export const FileSystemBlobLoaderOptionsSchema = z
    .object({
        glob: z
            .string()
            .min(1, 'Glob pattern must not be empty')
            .default(DEFAULT_GLOB)
            .describe('Glob pattern relative to the root'),
        exclude: z
            .array(z.string().min(1))
            .default([])
            .describe('Glob patterns relative to the root whose matches are skipped'),
        suffixes: z
            .array(
                z.string().regex(/^\.[^/\\]*$/, 'Suffixes must start with "." (e.g. ".txt")')
            )
            .default([])
            .describe('Keep only files with one of these extensions; empty keeps all'),
        showProgress: z
            .boolean()
            .default(false)
            .describe('Count matches first and report progress while yielding'),
    })
    .strict();

export type FileSystemBlobLoaderConfig = z.output<typeof FileSystemBlobLoaderOptionsSchema>;

/**
 * Options accepted by the constructor. Suffixes may be given as a Set.
 */
export type FileSystemBlobLoaderOptions = Omit<
    z.input<typeof FileSystemBlobLoaderOptionsSchema>,
    'suffixes'
> & {
    suffixes?: readonly string[] | ReadonlySet<string> | undefined;
};

export function parseLoaderOptions(
    options: FileSystemBlobLoaderOptions
): FileSystemBlobLoaderConfig {
    const { suffixes, ...rest } = options;
    const result = FileSystemBlobLoaderOptionsSchema.safeParse({
        ...rest,
        ...(suffixes !== undefined && { suffixes: Array.from(suffixes) }),
    });
    if (!result.success) {
        throw LoaderError.invalidOptions(result.error);
    }
    return result.data;
}

/**
 * A directory given as a plain path or a file: URL.
 */
export type RootPath = string | URL;

/**
 * Convert a root argument to a filesystem path. No filesystem access.
 */
export function toRootPath(value: unknown): string {
    if (typeof value === 'string') {
        if (value.length === 0) {
            throw LoaderError.invalidRoot('empty string', 'Root path must not be empty');
        }
        return value;
    }
    if (value instanceof URL) {
        if (value.protocol !== 'file:') {
            throw LoaderError.invalidRoot(value.href, 'Only file: URLs name a directory');
        }
        return fileURLToPath(value);
    }
    throw LoaderError.invalidRoot(value === null ? 'null' : typeof value);
}
