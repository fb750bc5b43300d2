import { logger } from 'src/shared/backend/logger';
import type { ITextExtractor } from 'src/shared/backend/ports';
import { describeError, ExtractionError } from './errors';
import { isPdfDocument } from './format';
import type { ExtractionResult } from './types';

/**
 * Extracts the text layer of a PDF with `pdf-parse`.
 * Pages come back as one unit; image-only PDFs yield empty text, not an error.
 */
export class PdfTextExtractor implements ITextExtractor {
    readonly format = 'pdf' as const;

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        if (!isPdfDocument(buffer)) {
            throw new ExtractionError(this.format, 'missing %PDF header');
        }

        const pdf = (await import('pdf-parse')).default;

        let parsed: Awaited<ReturnType<typeof pdf>>;
        try {
            parsed = await pdf(buffer);
        } catch (error) {
            throw new ExtractionError(this.format, describeError(error));
        }

        const text = parsed.text.trim();
        if (!text) {
            logger.warn({ pages: parsed.numpages }, 'PDF has no text layer');
        }

        return {
            format: this.format,
            units: [{ label: 'document', text }],
            metadata: {
                charCount: text.length,
                extractionMethod: 'pdf-parse',
                pages: parsed.numpages,
            },
        };
    }
}
