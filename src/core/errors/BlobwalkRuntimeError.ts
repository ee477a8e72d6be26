import { BlobwalkError } from './BlobwalkError.js';
import type { BlobwalkErrorCode, ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a single code, scope and type.
 * Thrown directly at the point of failure; created through per-module factories.
 */
export class BlobwalkRuntimeError<C = Record<string, unknown>> extends BlobwalkError {
    readonly code: BlobwalkErrorCode;
    readonly scope: ErrorScope;
    readonly type: ErrorType;
    readonly context: C | undefined;
    readonly recovery: string | undefined;

    constructor(
        code: BlobwalkErrorCode,
        scope: ErrorScope,
        type: ErrorType,
        message: string,
        context?: C,
        recovery?: string,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
        this.recovery = recovery;
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}
