import { BlobwalkError } from './BlobwalkError.js';
import type { Issue } from './types.js';

/**
 * Validation error aggregating one or more issues.
 * The first error-severity issue supplies the code and message.
 */
export class BlobwalkValidationError extends BlobwalkError {
    readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const primary = issues.find((issue) => issue.severity === 'error') ?? issues[0];
        super(primary?.message ?? 'Validation failed');
        this.issues = issues;
    }

    get code(): string {
        return this.primary?.code ?? 'validation_failed';
    }

    get errors(): Issue[] {
        return this.issues.filter((issue) => issue.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((issue) => issue.severity === 'warning');
    }

    private get primary(): Issue | undefined {
        return this.errors[0] ?? this.issues[0];
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            issues: this.issues,
        };
    }
}
