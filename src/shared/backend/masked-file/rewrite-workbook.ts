import * as XLSX from 'xlsx';
import { describeError, ExtractionError } from 'src/shared/backend/extraction';

/**
 * Re-read a workbook and pass every string or numeric cell through `maskText`.
 * Cells whose text changes are replaced by plain string cells; everything else
 * (sheet order, names, untouched cells) is written back as read.
 */
export function rewriteWorkbook(source: Buffer, maskText: (text: string) => string): { content: Buffer; cellsMasked: number } {
    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.read(source, { type: 'buffer' });
    } catch (error) {
        throw new ExtractionError('xlsx', describeError(error));
    }

    let cellsMasked = 0;
    for (const sheetName of workbook.SheetNames) {
        const sheet = workbook.Sheets[sheetName];
        const ref = sheet?.['!ref'];
        if (!sheet || typeof ref !== 'string') continue;

        const range = XLSX.utils.decode_range(ref);
        for (let r = range.s.r; r <= range.e.r; r++) {
            for (let c = range.s.c; c <= range.e.c; c++) {
                const address = XLSX.utils.encode_cell({ r, c });
                const cell: XLSX.CellObject | undefined = sheet[address];
                if (!cell || (cell.t !== 's' && cell.t !== 'n') || cell.v === undefined) continue;

                const text = String(cell.v);
                const masked = maskText(text);
                if (masked === text) continue;

                sheet[address] = { t: 's', v: masked } satisfies XLSX.CellObject;
                cellsMasked += 1;
            }
        }
    }

    const content: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return { content, cellsMasked };
}
