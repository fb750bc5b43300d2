export { DOCUMENT_FORMATS, isDocumentFormat, type DocumentFormat, type ExtractedUnit, type ExtractionResult } from './types';
export { ExtractionError, UnsupportedFormatError, describeError } from './errors';
export { FORMAT_CONTENT_TYPES, isPdfDocument, isZipContainer, resolveDocumentFormat } from './format';
export { PdfTextExtractor } from './pdf.extractor';
export { DocxTextExtractor } from './docx.extractor';
export { XlsxTextExtractor } from './xlsx.extractor';
export { PlainTextExtractor } from './text.extractor';
export { TextExtractorRegistry } from './registry';
