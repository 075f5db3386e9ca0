import path from 'node:path';
import { promises as fsp } from 'node:fs';
import * as XLSX from 'xlsx';
import { fileTimestamp } from '../utils/timestamp.js';
import { DEPARTMENT_SUMMARY_COLUMNS, PAY_RECORD_COLUMNS, columnHeader, columnValues, type TableColumn } from './columns.js';
import type { CombinedBatch } from './types.js';

async function writeWorkbook<T>(file: string, columns: TableColumn<T>[], rows: T[]): Promise<void> {
  const sheet = XLSX.utils.aoa_to_sheet([columnHeader(columns), ...rows.map((row) => columnValues(columns, row))]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Sheet1');
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await fsp.writeFile(file, buffer);
}

/**
 * Writes the cleaned records, the department summary and the overtime
 * warnings of a batch as three timestamped workbooks. Returns their paths.
 */
export async function writeBatchWorkbooks(batch: CombinedBatch, exportDir: string, now = new Date()): Promise<string[]> {
  await fsp.mkdir(exportDir, { recursive: true });
  const timestamp = fileTimestamp(now);
  const targets = {
    records: path.join(exportDir, `cleaned_processed_payroll_${timestamp}.xlsx`),
    summary: path.join(exportDir, `department_summary_${timestamp}.xlsx`),
    overtime: path.join(exportDir, `hours_warning_report_${timestamp}.xlsx`),
  };

  await writeWorkbook(targets.records, PAY_RECORD_COLUMNS, batch.records);
  await writeWorkbook(targets.summary, DEPARTMENT_SUMMARY_COLUMNS, batch.departmentSummary);
  await writeWorkbook(targets.overtime, PAY_RECORD_COLUMNS, batch.overtime);

  return [targets.records, targets.summary, targets.overtime];
}
