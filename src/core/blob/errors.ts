import { BlobwalkRuntimeError } from '../errors/BlobwalkRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { BlobErrorCode } from './error-codes.js';

/**
 * Error factory for blob construction and content reads
 */
export class BlobError {
    static missingContent(): BlobwalkRuntimeError {
        return new BlobwalkRuntimeError(
            BlobErrorCode.BLOB_MISSING_CONTENT,
            ErrorScope.BLOB,
            ErrorType.USER,
            'A blob needs either inline data or a path',
            {},
            'Use Blob.fromPath() or Blob.fromData()'
        );
    }

    static notFound(path: string): BlobwalkRuntimeError {
        return new BlobwalkRuntimeError(
            BlobErrorCode.BLOB_NOT_FOUND,
            ErrorScope.BLOB,
            ErrorType.NOT_FOUND,
            `Blob file not found: ${path}`,
            { path }
        );
    }

    static readFailed(path: string, cause: unknown): BlobwalkRuntimeError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new BlobwalkRuntimeError(
            BlobErrorCode.BLOB_READ_FAILED,
            ErrorScope.BLOB,
            ErrorType.SYSTEM,
            `Failed to read blob: ${path}. ${reason}`,
            { path, reason },
            undefined,
            { cause }
        );
    }
}
