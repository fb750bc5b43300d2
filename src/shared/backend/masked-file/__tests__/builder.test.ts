import * as XLSX from 'xlsx';
import { PiiDetectionService } from 'src/shared/backend/pii-detection';
import { buildDocx, documentXml, paragraph, readDocumentXml, table } from 'src/shared/backend/extraction/__tests__/fixtures/docx';
import { MaskedFileBuilder } from '../builder';
import { rewriteDocument } from '../rewrite-document';
import { rewriteWorkbook } from '../rewrite-workbook';

const service = new PiiDetectionService();
const maskText = (text: string) => service.maskText(text);

function buildWorkbook(rows: unknown[][]): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'People');
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

function readRows(content: Buffer): unknown[][] {
    const workbook = XLSX.read(content, { type: 'buffer' });
    const sheet = workbook.Sheets['People'];
    if (!sheet) throw new Error('sheet missing');
    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
}

describe('MaskedFileBuilder', () => {
    const builder = new MaskedFileBuilder();

    it('returns masked text for a text upload', async () => {
        const file = await builder.build({
            filename: 'notes.txt',
            format: 'txt',
            source: Buffer.from('mail a@b.co'),
            maskedText: 'mail [EMAIL MASKED]',
            maskText,
        });

        expect(file.filename).toBe('masked_notes.txt');
        expect(file.contentType).toBe('text/plain; charset=utf-8');
        expect(file.content.toString('utf8')).toBe('mail [EMAIL MASKED]');
    });

    it('adds a .txt extension to text uploads without one', async () => {
        const file = await builder.build({
            filename: 'NOTES',
            format: 'txt',
            source: Buffer.alloc(0),
            maskedText: '',
            maskText,
        });
        expect(file.filename).toBe('masked_NOTES.txt');
    });

    it('returns PDF documents as masked text files', async () => {
        const file = await builder.build({
            filename: 'reports/q3.pdf',
            format: 'pdf',
            source: Buffer.from('%PDF-1.4'),
            maskedText: 'SSN: [SSN MASKED]',
            maskText,
        });

        expect(file.filename).toBe('masked_q3.pdf.txt');
        expect(file.contentType).toBe('text/plain; charset=utf-8');
        expect(file.content.toString('utf8')).toBe('SSN: [SSN MASKED]');
    });

    it('rebuilds Word documents with masked paragraphs', async () => {
        const source = await buildDocx(paragraph('Mail a@b.co'));

        const file = await builder.build({
            filename: 'letter.docx',
            format: 'docx',
            source,
            maskedText: 'unused',
            maskText,
        });

        expect(file.filename).toBe('masked_letter.docx');
        expect(file.contentType).toBe('application/vnd.openxmlformats-officedocument.wordprocessingml.document');
        expect(await readDocumentXml(file.content)).toBe(documentXml(paragraph('Mail [EMAIL MASKED]')));
    });

    it('rebuilds workbooks with masked cells', async () => {
        const source = buildWorkbook([
            ['Email', 'a@b.co'],
            ['SSN', 123456789],
        ]);

        const file = await builder.build({
            filename: '..\\exports\\people.xlsx',
            format: 'xlsx',
            source,
            maskedText: 'unused',
            maskText,
        });

        expect(file.filename).toBe('masked_people.xlsx');
        expect(file.contentType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        expect(readRows(file.content)).toEqual([
            ['Email', '[EMAIL MASKED]'],
            ['SSN', '[SSN MASKED]'],
        ]);
    });
});

describe('rewriteWorkbook', () => {
    it('counts only the cells that changed', () => {
        const source = buildWorkbook([
            ['Name', 'Contact'],
            ['Ann', 'ann@example.com or 555-234-5678'],
            ['Bob', 42],
        ]);

        const { content, cellsMasked } = rewriteWorkbook(source, maskText);

        expect(cellsMasked).toBe(1);
        expect(readRows(content)).toEqual([
            ['Name', 'Contact'],
            ['Ann', '[EMAIL MASKED] or [PHONE MASKED]'],
            ['Bob', 42],
        ]);
    });
});

describe('rewriteDocument', () => {
    it('masks paragraphs and table cells and leaves the rest alone', async () => {
        const source = await buildDocx(
            paragraph('Quarterly notes') + table([['Name', 'SSN'], ['Ann', '123-45-6789']]) + paragraph('Call 555-234-5678'),
        );

        const { content, paragraphsMasked } = await rewriteDocument(source, maskText);

        expect(paragraphsMasked).toBe(2);
        expect(await readDocumentXml(content)).toBe(
            documentXml(
                paragraph('Quarterly notes') +
                    table([['Name', 'SSN'], ['Ann', '[SSN MASKED]']]) +
                    paragraph('Call [PHONE MASKED]'),
            ),
        );
    });

    it('masks a value split across runs into the first run', async () => {
        const source = await buildDocx(paragraph('Card 4111 1111 ', '1111 1111', ' ok'));

        const { content } = await rewriteDocument(source, maskText);

        expect(await readDocumentXml(content)).toBe(
            documentXml(paragraph('Card [CREDIT CARD MASKED] ok', '', '')),
        );
    });

    it('keeps escaped characters escaped', async () => {
        const source = await buildDocx(paragraph('Tom &amp; Jerry &lt;a@b.co&gt;'));

        const { content } = await rewriteDocument(source, maskText);

        expect(await readDocumentXml(content)).toBe(documentXml(paragraph('Tom &amp; Jerry &lt;[EMAIL MASKED]&gt;')));
    });

    it('reports packages without a document part', async () => {
        const workbook = buildWorkbook([['a@b.co']]);

        await expect(rewriteDocument(workbook, maskText)).rejects.toMatchObject({
            format: 'docx',
            reason: 'missing word/document.xml',
        });
    });
});
