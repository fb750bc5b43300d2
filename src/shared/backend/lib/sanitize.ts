/**
 * Sanitize an uploaded file name: keep the last path segment, strip control characters and trim
 */
export function sanitizeFilename(filename: string, fallback = 'document'): string {
    const base = filename.split(/[\\/]/).pop() ?? '';
    // eslint-disable-next-line no-control-regex
    const cleaned = base.replace(/[\u0000-\u001f\u007f]/g, '').trim();
    return cleaned || fallback;
}
