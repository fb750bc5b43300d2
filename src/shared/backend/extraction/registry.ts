import { logger } from 'src/shared/backend/logger';
import type { ITextExtractor } from 'src/shared/backend/ports';
import { DocxTextExtractor } from './docx.extractor';
import { UnsupportedFormatError } from './errors';
import { PdfTextExtractor } from './pdf.extractor';
import { PlainTextExtractor } from './text.extractor';
import type { DocumentFormat, ExtractionResult } from './types';
import { XlsxTextExtractor } from './xlsx.extractor';

/**
 * Routes a buffer to the extractor registered for its format.
 */
export class TextExtractorRegistry {
    private readonly extractors = new Map<DocumentFormat, ITextExtractor>();

    constructor(extractors: readonly ITextExtractor[] = defaultExtractors()) {
        for (const extractor of extractors) {
            this.extractors.set(extractor.format, extractor);
        }
    }

    supports(format: DocumentFormat): boolean {
        return this.extractors.has(format);
    }

    async extract(buffer: Buffer, format: DocumentFormat): Promise<ExtractionResult> {
        const extractor = this.extractors.get(format);
        if (!extractor) {
            throw new UnsupportedFormatError(format);
        }

        const startTime = Date.now();
        const result = await extractor.extract(buffer);

        logger.debug(
            {
                format,
                bytes: buffer.length,
                units: result.units.length,
                charCount: result.metadata.charCount,
                latencyMs: Date.now() - startTime,
            },
            'Text extracted',
        );

        return result;
    }
}

function defaultExtractors(): ITextExtractor[] {
    return [new PdfTextExtractor(), new DocxTextExtractor(), new XlsxTextExtractor(), new PlainTextExtractor()];
}
