/**
 * Filesystem Loader Errors
 */

import type { ZodError } from 'zod';
import { BlobwalkRuntimeError } from '../../errors/BlobwalkRuntimeError.js';
import { BlobwalkValidationError } from '../../errors/BlobwalkValidationError.js';
import { zodToIssues } from '../../errors/conversion.js';
import { ErrorScope, ErrorType } from '../../errors/types.js';
import { LoaderErrorCode } from './error-codes.js';

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Factory class for creating loader errors
 */
export class LoaderError {
    private constructor() {}

    /**
     * Root is not a string or file URL
     */
    static invalidRoot(received: string, reason?: string): BlobwalkRuntimeError {
        return new BlobwalkRuntimeError(
            LoaderErrorCode.INVALID_ROOT,
            ErrorScope.LOADER,
            ErrorType.USER,
            `Invalid root path (${received}). ${reason ?? 'Expected a string or a file: URL'}`,
            { received },
            'Pass a directory path as a string or a file: URL'
        );
    }

    static invalidOptions(error: ZodError): BlobwalkValidationError {
        return new BlobwalkValidationError(
            zodToIssues(error, ErrorScope.LOADER, LoaderErrorCode.INVALID_OPTIONS)
        );
    }

    static rootNotFound(root: string): BlobwalkRuntimeError {
        return new BlobwalkRuntimeError(
            LoaderErrorCode.ROOT_NOT_FOUND,
            ErrorScope.LOADER,
            ErrorType.NOT_FOUND,
            `Directory not found: ${root}`,
            { root }
        );
    }

    static rootNotDirectory(root: string): BlobwalkRuntimeError {
        return new BlobwalkRuntimeError(
            LoaderErrorCode.ROOT_NOT_DIRECTORY,
            ErrorScope.LOADER,
            ErrorType.USER,
            `Not a directory: ${root}`,
            { root }
        );
    }

    /**
     * The root exists but may not be listed or entered
     */
    static permissionDenied(root: string, cause: unknown): BlobwalkRuntimeError {
        const reason = describeCause(cause);
        return new BlobwalkRuntimeError(
            LoaderErrorCode.PERMISSION_DENIED,
            ErrorScope.LOADER,
            ErrorType.FORBIDDEN,
            `Permission denied: ${root}. ${reason}`,
            { root, reason },
            'Check read and execute permissions on the directory',
            { cause }
        );
    }

    static traversalFailed(root: string, path: string, cause: unknown): BlobwalkRuntimeError {
        const reason = describeCause(cause);
        return new BlobwalkRuntimeError(
            LoaderErrorCode.TRAVERSAL_FAILED,
            ErrorScope.LOADER,
            ErrorType.SYSTEM,
            `Traversal of ${root} failed at ${path}. ${reason}`,
            { root, path, reason },
            undefined,
            { cause }
        );
    }

    /**
     * The blob factory failed for one matched path. Later items are unaffected.
     */
    static itemMaterializationFailed(path: string, cause: unknown): BlobwalkRuntimeError {
        const reason = describeCause(cause);
        return new BlobwalkRuntimeError(
            LoaderErrorCode.ITEM_MATERIALIZATION_FAILED,
            ErrorScope.LOADER,
            ErrorType.SYSTEM,
            `Failed to create blob for ${path}. ${reason}`,
            { path, reason },
            'Pull the next item to continue, or return() the cursor to stop',
            { cause }
        );
    }
}
