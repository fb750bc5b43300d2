import { logger } from 'src/shared/backend/logger';
import { sanitizeFilename } from 'src/shared/backend/lib/sanitize';
import { FORMAT_CONTENT_TYPES, type DocumentFormat } from 'src/shared/backend/extraction';
import type { IMaskedFileBuilder } from 'src/shared/backend/ports';
import { rewriteDocument } from './rewrite-document';
import { rewriteWorkbook } from './rewrite-workbook';

export type MaskedFileInput = {
    filename: string;
    format: DocumentFormat;
    source: Buffer;
    /** Masked text of all units, used where the original format cannot be rebuilt */
    maskedText: string;
    maskText: (text: string) => string;
};

export type MaskedFile = {
    filename: string;
    contentType: string;
    content: Buffer;
};

/**
 * Builds the downloadable copy of a masked document.
 * Workbooks are rebuilt cell by cell and Word documents paragraph by paragraph;
 * PDFs come back as plain text.
 */
export class MaskedFileBuilder implements IMaskedFileBuilder {
    async build(input: MaskedFileInput): Promise<MaskedFile> {
        const name = sanitizeFilename(input.filename);

        if (input.format === 'xlsx') {
            const { content, cellsMasked } = rewriteWorkbook(input.source, input.maskText);
            logger.debug({ cellsMasked, bytes: content.length }, 'Workbook rebuilt');
            return {
                filename: `masked_${withExtension(name, 'xlsx')}`,
                contentType: FORMAT_CONTENT_TYPES.xlsx,
                content,
            };
        }

        if (input.format === 'docx') {
            const { content, paragraphsMasked } = await rewriteDocument(input.source, input.maskText);
            logger.debug({ paragraphsMasked, bytes: content.length }, 'Word document rebuilt');
            return {
                filename: `masked_${withExtension(name, 'docx')}`,
                contentType: FORMAT_CONTENT_TYPES.docx,
                content,
            };
        }

        return {
            filename: input.format === 'txt' ? `masked_${withExtension(name, 'txt')}` : `masked_${name}.txt`,
            contentType: FORMAT_CONTENT_TYPES.txt,
            content: Buffer.from(input.maskedText, 'utf8'),
        };
    }
}

function withExtension(name: string, extension: string): string {
    return name.toLowerCase().endsWith(`.${extension}`) ? name : `${name}.${extension}`;
}
