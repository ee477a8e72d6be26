import type { ZodError } from 'zod';
import { BlobwalkValidationError } from '../../core/errors/BlobwalkValidationError.js';
import { zodToIssues } from '../../core/errors/conversion.js';
import { ErrorScope } from '../../core/errors/types.js';

export enum CliErrorCode {
    INVALID_OPTIONS = 'cli_invalid_options',
}

export class CliError {
    static invalidOptions(error: ZodError): BlobwalkValidationError {
        return new BlobwalkValidationError(
            zodToIssues(error, ErrorScope.CLI, CliErrorCode.INVALID_OPTIONS)
        );
    }
}
