import { UnsupportedFormatError } from './errors';
import { isDocumentFormat, type DocumentFormat } from './types';

export const FORMAT_CONTENT_TYPES: Readonly<Record<DocumentFormat, string>> = Object.freeze({
    pdf: 'application/pdf',
    docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    txt: 'text/plain; charset=utf-8',
});

/**
 * Pick the document format: an explicitly declared format wins, otherwise the
 * file extension decides. Both are matched case-insensitively.
 * @throws UnsupportedFormatError for anything outside pdf, docx, xlsx, txt
 */
export function resolveDocumentFormat(filename: string, declared?: string): DocumentFormat {
    const requested = declared?.trim() ? declared.trim().replace(/^\./, '') : extensionOf(filename);
    const normalized = requested.toLowerCase();

    if (!isDocumentFormat(normalized)) {
        throw new UnsupportedFormatError(requested);
    }
    return normalized;
}

function extensionOf(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    return dot > 0 ? base.slice(dot + 1) : '';
}

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const PDF_HEADER = '%PDF-';
const PDF_HEADER_WINDOW = 1_024;

function startsWith(buffer: Buffer, signature: readonly number[]): boolean {
    return buffer.length >= signature.length && signature.every((byte, i) => buffer[i] === byte);
}

/** DOCX and XLSX are both OOXML packages inside a ZIP container. */
export function isZipContainer(buffer: Buffer): boolean {
    return startsWith(buffer, ZIP_SIGNATURE);
}

/** Readers accept junk before the header as long as it appears in the first kilobyte. */
export function isPdfDocument(buffer: Buffer): boolean {
    return buffer.subarray(0, PDF_HEADER_WINDOW).includes(PDF_HEADER);
}
