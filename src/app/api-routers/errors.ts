import { TRPCError } from '@trpc/server';
import { ExtractionError, UnsupportedFormatError } from 'src/shared/backend/extraction';
import { FileTooLargeError, ValidationError } from 'src/shared/backend/use-cases/errors';

type DomainError = UnsupportedFormatError | ExtractionError | FileTooLargeError | ValidationError;

export function isDomainError(error: unknown): error is DomainError {
    return (
        error instanceof UnsupportedFormatError ||
        error instanceof ExtractionError ||
        error instanceof FileTooLargeError ||
        error instanceof ValidationError
    );
}

/**
 * Map a use-case error onto the tRPC error code the HTTP layer answers with.
 */
export function toTRPCError(error: DomainError): TRPCError {
    switch (error.code) {
        case 'UNSUPPORTED_FORMAT':
            return new TRPCError({ code: 'UNSUPPORTED_MEDIA_TYPE', message: error.message, cause: error });
        case 'EXTRACTION_FAILED':
            return new TRPCError({ code: 'UNPROCESSABLE_CONTENT', message: error.message, cause: error });
        case 'FILE_TOO_LARGE':
            return new TRPCError({ code: 'PAYLOAD_TOO_LARGE', message: error.message, cause: error });
        case 'VALIDATION':
            return new TRPCError({ code: 'BAD_REQUEST', message: error.message, cause: error });
    }
}
