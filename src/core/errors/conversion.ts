import type { ZodError } from 'zod';
import { ErrorType, type ErrorScope, type Issue } from './types.js';

/**
 * Convert zod issues into blobwalk issues so schema failures can be raised as
 * a `BlobwalkValidationError` with a domain code.
 */
export function zodToIssues(error: ZodError, scope: ErrorScope, code: string): Issue[] {
    return error.issues.map((issue) => ({
        code,
        message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        scope,
        type: ErrorType.USER,
        severity: 'error' as const,
        path: issue.path,
        context: { zodCode: issue.code },
    }));
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(String(value));
}
