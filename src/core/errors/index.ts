/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { BlobwalkError } from './BlobwalkError.js';
export { BlobwalkRuntimeError } from './BlobwalkRuntimeError.js';
export { BlobwalkValidationError } from './BlobwalkValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { BlobwalkErrorCode, Issue, Severity } from './types.js';
export { zodToIssues, toError } from './conversion.js';
