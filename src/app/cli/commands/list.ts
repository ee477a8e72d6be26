import chalk from 'chalk';
import { z } from 'zod';
import { FileSystemBlobLoader } from '../../../core/loaders/filesystem/filesystem-blob-loader.js';
import {
    WalkCommandSchema,
    createCommandLogger,
    parseCommandOptions,
    toLoaderOptions,
} from '../options.js';

const ListCommandSchema = WalkCommandSchema.extend({
    limit: z.coerce.number().int().positive().optional(),
    json: z.boolean().default(false),
}).strict();

export type ListCommandOptions = z.output<typeof ListCommandSchema>;
export type ListCommandOptionsInput = z.input<typeof ListCommandSchema>;

/**
 * Handle `blobwalk list <dir>`: print each matching blob as it is produced.
 * With --limit the walk stops as soon as enough blobs were printed.
 *
 * @returns number of blobs printed
 */
export async function handleListCommand(
    dir: string,
    options: unknown = {}
): Promise<number> {
    const validated = parseCommandOptions(ListCommandSchema, options);
    const logger = createCommandLogger(validated.verbose);

    try {
        const loader = new FileSystemBlobLoader(dir, toLoaderOptions(validated), { logger });
        let printed = 0;

        for (const blob of loader.yieldBlobs()) {
            const source = blob.source ?? '';
            const mimeType = blob.mimeType ?? 'unknown';
            if (validated.json) {
                console.log(JSON.stringify({ source, mimeType }));
            } else {
                console.log(`${source}  ${chalk.gray(mimeType)}`);
            }
            printed += 1;
            if (validated.limit !== undefined && printed >= validated.limit) {
                break;
            }
        }

        return printed;
    } finally {
        await logger.destroy();
    }
}
