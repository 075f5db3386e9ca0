import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { HEADER } from './factories.js';
import { writeCsv, writeWorkbookFile } from './files.js';

export type PayrollFolder = {
  march: string;
  april: string;
  broken: string;
  text: string;
};

/**
 * Two valid sources (one csv with a bad date row, one workbook), one csv
 * without a Notes column and one unrelated text file.
 */
export async function writePayrollFolder(dir: string): Promise<PayrollFolder> {
  const march = await writeCsv(dir, 'a_march.csv', [
    HEADER.join(','),
    '101,alice smith,it,20,45,2024-03-15,',
    '102,BOB STONE,hr,15,30,2024-03-15,part time',
    '103,eve,it,20,10,not a date,',
  ]);
  const april = await writeWorkbookFile(dir, 'b_april.xlsx', [
    HEADER,
    [201, 'Bob Jones', 'IT', 25, 40, '2024-04-15', ''],
    [202, 'carl', 'unknown', 10, 10, 45397, 'serial date'],
  ]);
  const broken = await writeCsv(dir, 'c_broken.csv', [HEADER.slice(0, 6).join(','), '301,Zed,Sales,10,10,2024-03-15']);
  const text = path.join(dir, 'readme.txt');
  await fsp.writeFile(text, 'payroll drop folder', 'utf8');
  return { march, april, broken, text };
}
