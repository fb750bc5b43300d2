export class ValidationError extends Error {
    readonly code = 'VALIDATION';
}

export class FileTooLargeError extends Error {
    readonly code = 'FILE_TOO_LARGE';

    constructor(
        readonly sizeBytes: number,
        readonly limitBytes: number,
    ) {
        super(`File too large: ${formatMegabytes(sizeBytes)}MB. Limit is ${formatMegabytes(limitBytes)}MB.`);
    }
}

function formatMegabytes(bytes: number): string {
    return (bytes / 1024 / 1024).toFixed(2);
}
