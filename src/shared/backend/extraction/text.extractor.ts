import type { ITextExtractor } from 'src/shared/backend/ports';
import type { ExtractionResult } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Plain text: strict UTF-8 first, Latin-1 when the bytes are not valid UTF-8. */
export class PlainTextExtractor implements ITextExtractor {
    readonly format = 'txt' as const;

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        let text: string;
        let encoding: 'utf-8' | 'latin1';
        try {
            text = utf8.decode(buffer);
            encoding = 'utf-8';
        } catch {
            text = buffer.toString('latin1');
            encoding = 'latin1';
        }

        return {
            format: this.format,
            units: [{ label: 'document', text }],
            metadata: {
                charCount: text.length,
                extractionMethod: 'text-decoder',
                encoding,
            },
        };
    }
}
