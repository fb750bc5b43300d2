import type { DocumentFormat, ExtractionResult } from 'src/shared/backend/extraction/types';

export interface ITextExtractor {
    readonly format: DocumentFormat;

    /**
     * Read the plain text of a document.
     * @throws ExtractionError when the bytes cannot be read as this format
     */
    extract(buffer: Buffer): Promise<ExtractionResult>;
}
