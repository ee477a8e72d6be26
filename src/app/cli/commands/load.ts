import chalk from 'chalk';
import { z } from 'zod';
import { BlobwalkRuntimeError } from '../../../core/errors/BlobwalkRuntimeError.js';
import { toError } from '../../../core/errors/conversion.js';
import { FileSystemBlobLoader } from '../../../core/loaders/filesystem/filesystem-blob-loader.js';
import { LoaderErrorCode } from '../../../core/loaders/filesystem/error-codes.js';
import { createSpinnerProgress } from '../../../core/progress/spinner-progress.js';
import type { Blob } from '../../../core/blob/blob.js';
import {
    WalkCommandSchema,
    createCommandLogger,
    parseCommandOptions,
    toLoaderOptions,
} from '../options.js';

const LoadCommandSchema = WalkCommandSchema.extend({
    progress: z.boolean().default(false),
}).strict();

export type LoadCommandOptions = z.output<typeof LoadCommandSchema>;
export type LoadCommandOptionsInput = z.input<typeof LoadCommandSchema>;

export interface LoadSummary {
    loaded: number;
    failed: number;
    bytes: number;
}

function isMaterializationError(error: unknown): error is BlobwalkRuntimeError {
    return (
        error instanceof BlobwalkRuntimeError &&
        error.code === LoaderErrorCode.ITEM_MATERIALIZATION_FAILED
    );
}

/**
 * Handle `blobwalk load <dir>`: read every matching blob, report failures per
 * item and keep going, then print a summary.
 */
export async function handleLoadCommand(
    dir: string,
    options: unknown = {}
): Promise<LoadSummary> {
    const validated = parseCommandOptions(LoadCommandSchema, options);
    const logger = createCommandLogger(validated.verbose);
    const summary: LoadSummary = { loaded: 0, failed: 0, bytes: 0 };

    const reportFailure = (source: string, error: unknown) => {
        summary.failed += 1;
        console.error(chalk.yellow(`✗ ${source}: ${toError(error).message}`));
    };

    try {
        const loader = new FileSystemBlobLoader(
            dir,
            { ...toLoaderOptions(validated), showProgress: validated.progress },
            { logger, progress: createSpinnerProgress({ label: 'Loading blobs' }) }
        );
        const cursor = loader.yieldBlobs();

        try {
            for (;;) {
                let step: IteratorResult<Blob, undefined>;
                try {
                    step = cursor.next();
                } catch (error) {
                    if (!isMaterializationError(error)) {
                        throw error;
                    }
                    const failedPath = error.context?.['path'];
                    reportFailure(typeof failedPath === 'string' ? failedPath : dir, error);
                    continue;
                }
                if (step.done) {
                    break;
                }

                const blob = step.value;
                try {
                    const bytes = await blob.asBytes();
                    summary.loaded += 1;
                    summary.bytes += bytes.byteLength;
                } catch (error) {
                    reportFailure(blob.source ?? dir, error);
                }
            }
        } finally {
            cursor.return();
        }

        console.log(
            `Loaded ${summary.loaded} blobs (${summary.bytes} bytes), ${summary.failed} failed`
        );
        return summary;
    } finally {
        await logger.destroy();
    }
}
