import { z } from 'zod';
import { PII_CATEGORIES, type PiiCategory } from 'src/shared/backend/pii-detection';
import { ValidationError } from 'src/shared/backend/use-cases/errors';
import type { DocumentSource } from 'src/shared/backend/use-cases/load-document';

const uploadFieldsSchema = z.object({
    format: z.string().trim().min(1).optional(),
    categories: z.array(z.enum(PII_CATEGORIES, { error: 'Unknown category' })),
    ignored: z.array(z.string()),
});

export type UploadForm = {
    source: Extract<DocumentSource, { kind: 'upload' }>;
    categories?: PiiCategory[];
    ignoredValues: string[];
};

/**
 * Read a multipart upload: `file` (required), `format` (optional override of the
 * extension), repeated `categories` (defaults to all) and repeated `ignored` values.
 */
export async function readUploadForm(form: FormData): Promise<UploadForm> {
    const file = form.get('file');
    if (file === null || typeof file === 'string') {
        throw new ValidationError('Attach a document in the "file" field');
    }

    const format = form.get('format');
    const parsed = uploadFieldsSchema.safeParse({
        format: typeof format === 'string' ? format : undefined,
        categories: textValues(form.getAll('categories')),
        ignored: textValues(form.getAll('ignored')),
    });
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(`Invalid upload form: ${issue ? `${issue.path.join('.')} ${issue.message}` : parsed.error.message}`);
    }

    const { categories, ignored } = parsed.data;
    return {
        source: {
            kind: 'upload',
            filename: file.name,
            declaredFormat: parsed.data.format,
            content: Buffer.from(await file.arrayBuffer()),
        },
        categories: categories.length > 0 ? categories : undefined,
        ignoredValues: ignored,
    };
}

function textValues(values: readonly unknown[]): string[] {
    return values.filter((value): value is string => typeof value === 'string');
}
