import path from 'node:path';
import { promises as fsp } from 'node:fs';
import * as XLSX from 'xlsx';
import { UnsupportedFormatError } from '../errors.js';
import type { RawRow, RawTable } from './types.js';

export type SourceFormat = 'csv' | 'spreadsheet';

const FORMAT_BY_EXTENSION: Record<string, SourceFormat> = {
  '.csv': 'csv',
  '.xlsx': 'spreadsheet',
  '.xls': 'spreadsheet',
};

export function detectFormat(filePath: string): SourceFormat | null {
  return FORMAT_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? null;
}

async function readWorkbook(filePath: string, format: SourceFormat): Promise<XLSX.WorkBook> {
  if (format === 'csv') {
    // raw keeps every cell as the text it was written as; typing happens in the normalizer
    const text = (await fsp.readFile(filePath, 'utf8')).replace(/^\uFEFF/, '');
    return XLSX.read(text, { type: 'string', raw: true });
  }
  const buffer = await fsp.readFile(filePath);
  return XLSX.read(buffer, { type: 'buffer' });
}

export function sheetToTable(sheet: XLSX.WorkSheet): RawTable | null {
  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  const [header, ...body] = grid;
  if (!header || !header.length) {
    return null;
  }

  const columns = header.map((cell) => (cell == null ? '' : String(cell)));
  const rows = body.map((cells): RawRow => {
    const row: Record<string, unknown> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? null;
    });
    return row;
  });
  return { columns, rows };
}

/**
 * Loads the first worksheet of a `.csv`, `.xlsx` or `.xls` file.
 * Returns `null` when the sheet has no header row.
 */
export async function readSource(filePath: string): Promise<RawTable | null> {
  const format = detectFormat(filePath);
  if (!format) {
    throw new UnsupportedFormatError(filePath);
  }

  const workbook = await readWorkbook(filePath, format);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return null;
  }
  return sheetToTable(sheet);
}
