import { z, type ZodTypeAny } from 'zod';
import { createLogger } from '../../core/logger/factory.js';
import { LogComponent, type Logger } from '../../core/logger/types.js';
import { CliError } from './errors.js';
import {
    DEFAULT_GLOB,
    type FileSystemBlobLoaderOptions,
} from '../../core/loaders/filesystem/schemas.js';

// Flags shared by every command that walks a directory
export const WalkCommandSchema = z
    .object({
        glob: z.string().min(1, 'Glob pattern must not be empty').default(DEFAULT_GLOB),
        suffix: z.array(z.string()).default([]),
        exclude: z.array(z.string()).default([]),
        verbose: z.boolean().default(false),
    })
    .strict();

export type WalkCommandOptions = z.output<typeof WalkCommandSchema>;
export type WalkCommandOptionsInput = z.input<typeof WalkCommandSchema>;

export function toLoaderOptions(options: WalkCommandOptions): FileSystemBlobLoaderOptions {
    return {
        glob: options.glob,
        suffixes: options.suffix,
        exclude: options.exclude,
    };
}

/**
 * Console logger for a command; debug level with --verbose, warnings otherwise.
 */
export function createCommandLogger(verbose: boolean): Logger {
    return createLogger({
        config: {
            level: verbose ? 'debug' : 'warn',
            transports: [{ type: 'console', colorize: true }],
        },
        component: LogComponent.CLI,
    });
}

/**
 * Validate raw commander flags against a command schema.
 */
export function parseCommandOptions<S extends ZodTypeAny>(
    schema: S,
    options: unknown
): z.output<S> {
    const result = schema.safeParse(options);
    if (!result.success) {
        throw CliError.invalidOptions(result.error);
    }
    return result.data;
}
