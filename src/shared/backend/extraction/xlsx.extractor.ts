import * as XLSX from 'xlsx';
import type { ITextExtractor } from 'src/shared/backend/ports';
import { describeError, ExtractionError } from './errors';
import { isZipContainer } from './format';
import type { ExtractedUnit, ExtractionResult } from './types';

/**
 * Reads a workbook with SheetJS and returns one unit per sheet.
 * Non-empty cells of a row are joined with a space, rows with a newline.
 */
export class XlsxTextExtractor implements ITextExtractor {
    readonly format = 'xlsx' as const;

    async extract(buffer: Buffer): Promise<ExtractionResult> {
        if (!isZipContainer(buffer)) {
            throw new ExtractionError(this.format, 'not an Excel workbook package');
        }

        let workbook: XLSX.WorkBook;
        try {
            workbook = XLSX.read(buffer, { type: 'buffer' });
        } catch (error) {
            throw new ExtractionError(this.format, describeError(error));
        }

        const units: ExtractedUnit[] = [];
        for (const sheetName of workbook.SheetNames) {
            const sheet = workbook.Sheets[sheetName];
            if (!sheet) continue;

            const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false });
            const lines = rows.map((row) => row.filter(isPresent).map(String).join(' ')).filter(Boolean);
            units.push({ label: sheetName, text: lines.join('\n') });
        }

        return {
            format: this.format,
            units,
            metadata: {
                charCount: units.reduce((sum, unit) => sum + unit.text.length, 0),
                extractionMethod: 'xlsx',
                sheets: workbook.SheetNames.length,
            },
        };
    }
}

function isPresent(value: unknown): boolean {
    return value !== null && value !== undefined && value !== '';
}
