import mammoth from 'mammoth';
import { logger } from 'src/shared/backend/logger';
import type { ITextExtractor } from 'src/shared/backend/ports';
import { describeError, ExtractionError } from './errors';
import { isZipContainer } from './format';
import type { ExtractionResult } from './types';

/** Extracts paragraph text from a DOCX buffer using `mammoth`. */
export class DocxTextExtractor implements ITextExtractor {
    readonly format = 'docx' as const;

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        if (!isZipContainer(buffer)) {
            throw new ExtractionError(this.format, 'not a Word document package');
        }

        let result: Awaited<ReturnType<typeof mammoth.extractRawText>>;
        try {
            result = await mammoth.extractRawText({ buffer });
        } catch (error) {
            throw new ExtractionError(this.format, describeError(error));
        }

        if (result.messages.length > 0) {
            logger.debug({ messages: result.messages.map((m) => m.message) }, 'mammoth reported conversion messages');
        }

        return {
            format: this.format,
            units: [{ label: 'document', text: result.value }],
            metadata: {
                charCount: result.value.length,
                extractionMethod: 'mammoth',
            },
        };
    }
}
