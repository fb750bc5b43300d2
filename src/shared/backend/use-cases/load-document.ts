import {
    resolveDocumentFormat,
    type DocumentFormat,
    type ExtractedUnit,
    type TextExtractorRegistry,
} from 'src/shared/backend/extraction';
import { FileTooLargeError } from './errors';

export type DocumentSource =
    | { kind: 'upload'; filename: string; declaredFormat?: string; content: Buffer }
    | { kind: 'text'; text: string };

export type LoadedDocument =
    | { kind: 'upload'; filename: string; format: DocumentFormat; units: ExtractedUnit[]; content: Buffer }
    | { kind: 'text'; filename: null; format: 'txt'; units: ExtractedUnit[] };

export type LoadDocumentDeps = {
    extractors: TextExtractorRegistry;
    maxUploadBytes: number;
};

/**
 * Turn a request's document into scannable units.
 * The format is checked before the size and the size before any bytes are parsed;
 * extraction failures propagate unchanged so nothing is scanned from a half-read file.
 */
export async function loadDocument(source: DocumentSource, deps: LoadDocumentDeps): Promise<LoadedDocument> {
    if (source.kind === 'text') {
        const size = Buffer.byteLength(source.text, 'utf8');
        if (size > deps.maxUploadBytes) {
            throw new FileTooLargeError(size, deps.maxUploadBytes);
        }
        return { kind: 'text', filename: null, format: 'txt', units: [{ label: 'input', text: source.text }] };
    }

    const format = resolveDocumentFormat(source.filename, source.declaredFormat);
    if (source.content.length > deps.maxUploadBytes) {
        throw new FileTooLargeError(source.content.length, deps.maxUploadBytes);
    }

    const extracted = await deps.extractors.extract(source.content, format);
    return { kind: 'upload', filename: source.filename, format, units: extracted.units, content: source.content };
}
