import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { EmptyInputError, EtlError } from '../errors.js';
import type { LoadValidation, PayrollStore, SaveSummary, WriteMode } from '../services/payroll-store.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import { mergeFileResults, summarizeByDepartment } from './aggregator.js';
import { normalizeTable } from './normalize.js';
import { calculateBatch } from './pay-calculator.js';
import { detectFormat, readSource } from './source-reader.js';
import type { DepartmentSummary, FileResult } from './types.js';
import { writeBatchWorkbooks } from './workbook-export.js';

export type FileOutcome =
  | { status: 'processed'; file: string; result: FileResult }
  | { status: 'skipped'; file: string; code: EtlError['code'] | 'READ_FAILED'; reason: string };

export type SkippedFile = Extract<FileOutcome, { status: 'skipped' }>;

export type BatchOptions = {
  files: string[];
  mode: WriteMode;
  store: PayrollStore;
  logger: Logger;
  /** When set, the three batch workbooks are written here before loading. */
  exportDir?: string;
  now?: Date;
};

export type BatchReport = {
  mode: WriteMode;
  processedFiles: string[];
  skippedFiles: SkippedFile[];
  recordCount: number;
  overtimeCount: number;
  droppedRowCount: number;
  departmentSummary: DepartmentSummary[];
  saved: SaveSummary;
  validation: LoadValidation;
  exports: string[];
};

type Accumulator = {
  results: FileResult[];
  processedFiles: string[];
  skippedFiles: SkippedFile[];
};

/** Source files directly inside `dir`, sorted by name. */
export async function discoverSourceFiles(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && detectFormat(entry.name) !== null)
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

/** Extract, clean and calculate one file. Errors never escape: a bad file becomes a skipped outcome. */
export async function processFile(file: string, logger: Logger): Promise<FileOutcome> {
  const name = path.basename(file);
  logger.info(`Processing file: ${file}`);
  try {
    const table = await readSource(file);
    const { rows, dropped } = normalizeTable(table);
    if (dropped.length) {
      logger.warn(`${name}: dropped ${dropped.length} invalid row(s)`);
    }
    const { records, overtime } = calculateBatch(rows);
    logger.info(`${name}: ${records.length} record(s), ${overtime.length} overtime`);
    return {
      status: 'processed',
      file,
      result: { records, overtime, departmentSummary: summarizeByDepartment(records), dropped },
    };
  } catch (error) {
    const reason = errorMessage(error);
    if (error instanceof EmptyInputError) {
      logger.warn(`${name}: ${reason}`);
    } else {
      logger.error(`${name}: ${reason}`);
    }
    return {
      status: 'skipped',
      file,
      code: error instanceof EtlError ? error.code : 'READ_FAILED',
      reason,
    };
  }
}

function collect(acc: Accumulator, outcome: FileOutcome): Accumulator {
  if (outcome.status === 'skipped') {
    return { ...acc, skippedFiles: [...acc.skippedFiles, outcome] };
  }
  return {
    ...acc,
    results: [...acc.results, outcome.result],
    processedFiles: [...acc.processedFiles, outcome.file],
  };
}

/**
 * Processes files one at a time, in the given order, then commits the
 * combined batch in `mode`.
 *
 * @throws NoInputFilesError when no file could be processed; nothing is written
 */
export async function runBatch({ files, mode, store, logger, exportDir, now }: BatchOptions): Promise<BatchReport> {
  const outcomes: FileOutcome[] = [];
  for (const file of files) {
    outcomes.push(await processFile(file, logger));
  }

  const { results, processedFiles, skippedFiles } = outcomes.reduce(collect, {
    results: [],
    processedFiles: [],
    skippedFiles: [],
  });
  const batch = mergeFileResults(results);

  const exports = exportDir ? await writeBatchWorkbooks(batch, exportDir, now) : [];
  if (exports.length) {
    logger.info(`Workbooks exported to ${exportDir}`);
  }

  const saved = await store.save(batch, mode);
  const validation = await store.validateLoad();

  return {
    mode,
    processedFiles,
    skippedFiles,
    recordCount: batch.records.length,
    overtimeCount: batch.overtime.length,
    droppedRowCount: results.reduce((total, result) => total + result.dropped.length, 0),
    departmentSummary: batch.departmentSummary,
    saved,
    validation,
    exports,
  };
}
