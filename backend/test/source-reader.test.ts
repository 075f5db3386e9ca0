import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UnsupportedFormatError } from '../src/errors.js';
import { detectFormat, readSource } from '../src/etl/source-reader.js';
import { HEADER } from './helpers/factories.js';
import { makeTempDir, writeCsv, writeWorkbookFile } from './helpers/files.js';

describe('detectFormat', () => {
  it('maps extensions case-insensitively', () => {
    expect(detectFormat('payroll.csv')).toBe('csv');
    expect(detectFormat('PAYROLL.CSV')).toBe('csv');
    expect(detectFormat('march.xlsx')).toBe('spreadsheet');
    expect(detectFormat('legacy.XLS')).toBe('spreadsheet');
  });

  it('rejects everything else', () => {
    expect(detectFormat('notes.txt')).toBeNull();
    expect(detectFormat('archive.zip')).toBeNull();
    expect(detectFormat('csv')).toBeNull();
  });
});

describe('readSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('reads csv cells as written', async () => {
    const file = await writeCsv(dir, 'march.csv', [
      HEADER.join(','),
      '101,"Smith, Jane",it,20,45,2024-03-15,late shift',
    ]);

    const table = await readSource(file);

    expect(table?.columns).toEqual(HEADER);
    expect(table?.rows).toEqual([
      {
        'Emp ID': '101',
        'Emp Name': 'Smith, Jane',
        Department: 'it',
        'Hourly Rate': '20',
        'Hours Worked': '45',
        'Pay Date': '2024-03-15',
        Notes: 'late shift',
      },
    ]);
  });

  it('strips a byte order mark from the first header', async () => {
    const file = await writeCsv(dir, 'bom.csv', ['\uFEFF' + HEADER.join(','), '1,A,hr,10,10,2024-03-15,x']);

    const table = await readSource(file);

    expect(table?.columns[0]).toBe('Emp ID');
  });

  it('returns the header with no rows for a header-only csv', async () => {
    const file = await writeCsv(dir, 'empty.csv', [HEADER.join(',')]);

    const table = await readSource(file);

    expect(table).toEqual({ columns: HEADER, rows: [] });
  });

  it('reads the first worksheet of a workbook with native cell types', async () => {
    const file = await writeWorkbookFile(dir, 'april.xlsx', [
      HEADER,
      [201, 'Bob Jones', 'IT', 25, 40, '2024-04-15', 'ok'],
      [202, 'carl', 'unknown', 10, 10, 45397, 'serial date'],
    ]);

    const table = await readSource(file);

    expect(table?.columns).toEqual(HEADER);
    expect(table?.rows).toEqual([
      {
        'Emp ID': 201,
        'Emp Name': 'Bob Jones',
        Department: 'IT',
        'Hourly Rate': 25,
        'Hours Worked': 40,
        'Pay Date': '2024-04-15',
        Notes: 'ok',
      },
      {
        'Emp ID': 202,
        'Emp Name': 'carl',
        Department: 'unknown',
        'Hourly Rate': 10,
        'Hours Worked': 10,
        'Pay Date': 45397,
        Notes: 'serial date',
      },
    ]);
  });

  it('fills cells missing from a short workbook row with null', async () => {
    const file = await writeWorkbookFile(dir, 'short.xlsx', [HEADER, [7, 'Dana', 'Hr', 12, 8, '2024-03-15']]);

    const table = await readSource(file);

    expect(table?.rows[0]?.Notes).toBeNull();
  });

  it('throws for an unsupported extension', async () => {
    const file = path.join(dir, 'notes.txt');
    await fsp.writeFile(file, 'not a payroll file', 'utf8');

    await expect(readSource(file)).rejects.toBeInstanceOf(UnsupportedFormatError);
    await expect(readSource(file)).rejects.toThrow(`Unsupported file format: ${file}`);
  });
});
