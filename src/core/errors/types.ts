import type { BlobErrorCode } from '../blob/error-codes.js';
import type { LoaderErrorCode } from '../loaders/filesystem/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    LOADER = 'loader', // Directory traversal, filtering, blob production
    BLOB = 'blob', // Blob construction and content reads
    LOGGER = 'logger', // Logger configuration and transports
    CLI = 'cli', // Command-line option handling
}

/**
 * Error types that map to the nature of the failure
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // permission denied
    NOT_FOUND = 'not_found', // path or resource doesn't exist
    SYSTEM = 'system', // I/O failures, unexpected states
}

/**
 * Union type for all error codes across domains
 */
export type BlobwalkErrorCode = LoaderErrorCode | BlobErrorCode | LoggerErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: BlobwalkErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
