export const DOCUMENT_FORMATS = ['pdf', 'docx', 'xlsx', 'txt'] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

/** One independently scanned piece of a document: a sheet, or the whole text. */
export type ExtractedUnit = {
    label: string;
    text: string;
};

export type ExtractionResult = {
    format: DocumentFormat;
    units: ExtractedUnit[];
    metadata: {
        charCount: number;
        extractionMethod: string;
        [key: string]: unknown;
    };
};

export function isDocumentFormat(value: string): value is DocumentFormat {
    return DOCUMENT_FORMATS.some((format) => format === value);
}
