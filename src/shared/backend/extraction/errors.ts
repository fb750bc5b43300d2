import { DOCUMENT_FORMATS, type DocumentFormat } from './types';

export class UnsupportedFormatError extends Error {
    readonly code = 'UNSUPPORTED_FORMAT';

    constructor(readonly requested: string) {
        super(
            `Unsupported file type${requested ? ` "${requested}"` : ''}. Supported types: ${DOCUMENT_FORMATS.join(', ')}`,
        );
        this.name = 'UnsupportedFormatError';
    }
}

export class ExtractionError extends Error {
    readonly code = 'EXTRACTION_FAILED';

    constructor(
        readonly format: DocumentFormat,
        readonly reason: string,
    ) {
        super(`Could not read ${format.toUpperCase()} file: ${reason}`);
        this.name = 'ExtractionError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
