import * as XLSX from 'xlsx';
import { cellToText, isBlankCell, normalizeColumnName } from '../../utils/textNormalizer';
import { FaqColumns } from '../../utils/types';
import { FaqSchemaError } from './errors';

export type SheetRow = unknown[];

// xlsx files are ZIP archives; the xlsx library would otherwise read HTML or CSV bodies as sheets
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function isXlsxPayload(buffer: Buffer): boolean {
    return buffer.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE);
}

/** First worksheet as an array of rows, header row included. */
export function readSheetRows(buffer: Buffer): SheetRow[] {
    if (!isXlsxPayload(buffer)) {
        throw new Error('spreadsheet export is not an xlsx workbook');
    }
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const [firstSheetName] = workbook.SheetNames;
    if (!firstSheetName) {
        throw new Error('workbook has no sheets');
    }
    const sheet = workbook.Sheets[firstSheetName];
    return XLSX.utils.sheet_to_json<SheetRow>(sheet, { header: 1, defval: null, raw: false, blankrows: false });
}

export function locateColumns(header: SheetRow): FaqColumns & { indexes: { question: number; answer: number; category: number } } {
    const all = header.map(cell => normalizeColumnName(cellToText(cell)));
    const question = all.findIndex(c => c.includes('question'));
    const answer = all.findIndex(c => c.includes('response') || c.includes('answer'));
    const category = all.findIndex(c => c.includes('category'));

    if (question < 0 || answer < 0) {
        throw new FaqSchemaError(all);
    }

    return {
        question: all[question],
        answer: all[answer],
        category: category >= 0 ? all[category] : null,
        all,
        indexes: { question, answer, category },
    };
}

/**
 * One text block per row: "Category: ...\nQ: ...\nA: ..." when the sheet has a
 * category column and the row fills it, "Q: ...\nA: ..." otherwise.
 * Rows without a question or an answer are dropped.
 */
export function buildDocuments(rows: SheetRow[]): { documents: string[]; columns: FaqColumns } {
    const [header = [], ...body] = rows;
    const { indexes, ...columns } = locateColumns(header);

    const documents: string[] = [];
    for (const row of body) {
        const q = row[indexes.question];
        const a = row[indexes.answer];
        if (isBlankCell(q) || isBlankCell(a)) continue;

        const qa = `Q: ${cellToText(q)}\nA: ${cellToText(a)}`;
        const cat = indexes.category >= 0 ? row[indexes.category] : null;
        documents.push(isBlankCell(cat) ? qa : `Category: ${cellToText(cat)}\n${qa}`);
    }
    return { documents, columns };
}
