import { BlobwalkRuntimeError } from '../errors/BlobwalkRuntimeError.js';
import { BlobwalkValidationError } from '../errors/BlobwalkValidationError.js';
import { zodToIssues } from '../errors/conversion.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';
import type { ZodError } from 'zod';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 */
export class LoggerError {
    static unknownTransportType(transportType: string): BlobwalkRuntimeError {
        return new BlobwalkRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    }

    static invalidConfig(error: ZodError): BlobwalkValidationError {
        return new BlobwalkValidationError(
            zodToIssues(error, ErrorScope.LOGGER, LoggerErrorCode.INVALID_CONFIG)
        );
    }
}
