import { FileSystemBlobLoader } from '../../../core/loaders/filesystem/filesystem-blob-loader.js';
import {
    WalkCommandSchema,
    createCommandLogger,
    parseCommandOptions,
    toLoaderOptions,
} from '../options.js';

/**
 * Handle `blobwalk count <dir>`: print the number of matching files
 */
export async function handleCountCommand(dir: string, options: unknown = {}): Promise<number> {
    const validated = parseCommandOptions(WalkCommandSchema, options);
    const logger = createCommandLogger(validated.verbose);

    try {
        const loader = new FileSystemBlobLoader(dir, toLoaderOptions(validated), { logger });
        const count = loader.countMatchingFiles();
        console.log(String(count));
        return count;
    } finally {
        await logger.destroy();
    }
}
