/**
 * Blob-specific error codes
 */
export enum BlobErrorCode {
    BLOB_MISSING_CONTENT = 'blob_missing_content',
    BLOB_NOT_FOUND = 'blob_not_found',
    BLOB_READ_FAILED = 'blob_read_failed',
}
