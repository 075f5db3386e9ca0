import { promises as fsp } from 'node:fs';
import path from 'node:path';
import type { AppConfig } from '../config.js';
import { NoInputFilesError } from '../errors.js';
import { discoverSourceFiles, runBatch, type BatchReport } from '../etl/pipeline.js';
import type { PayrollReports, ReportExport } from '../services/payroll-reports.js';
import type { PayrollStore, WriteMode } from '../services/payroll-store.js';
import { errorMessage, type Logger } from '../utils/logger.js';

export const USAGE = 'Usage: etl <data_folder> [--append] [--no-workbooks]';

export type EtlArgs = {
  dataFolder?: string;
  mode: WriteMode;
  exportWorkbooks: boolean;
};

export type EtlCommandDeps = {
  config: AppConfig;
  store: PayrollStore;
  reports: PayrollReports;
  logger: Logger;
  now?: Date;
};

export type EtlCommandResult = {
  batch: BatchReport | null;
  reportExport: ReportExport | null;
};

export function parseEtlArgs(argv: string[]): EtlArgs {
  const args: EtlArgs = { mode: 'replace', exportWorkbooks: true };
  for (const arg of argv) {
    if (arg === '--append') {
      args.mode = 'append';
    } else if (arg === '--no-workbooks') {
      args.exportWorkbooks = false;
    } else if (!arg.startsWith('--') && args.dataFolder === undefined) {
      args.dataFolder = arg;
    }
  }
  return args;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fsp.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function runImport(folder: string, args: EtlArgs, deps: EtlCommandDeps): Promise<BatchReport | null> {
  const { config, store, logger, now } = deps;
  logger.info(`Using data folder: ${folder}`);
  const files = await discoverSourceFiles(folder);
  try {
    const batch = await runBatch({
      files,
      mode: args.mode,
      store,
      logger,
      exportDir: args.exportWorkbooks ? config.paths.exportRoot : undefined,
      now,
    });
    logger.info(
      `All files processed: ${batch.processedFiles.length} processed, ${batch.skippedFiles.length} skipped, ` +
        `${batch.recordCount} record(s) loaded (${batch.mode})`
    );
    return batch;
  } catch (error) {
    if (error instanceof NoInputFilesError) {
      logger.error('No valid files were processed.');
      return null;
    }
    throw error;
  }
}

/**
 * Imports every source file in the data folder, then exports the analytical
 * reports. Without a usable folder only the reports over the existing store
 * are exported.
 */
export async function runEtlCommand(argv: string[], deps: EtlCommandDeps): Promise<EtlCommandResult> {
  const { config, reports, logger, now } = deps;
  const args = parseEtlArgs(argv);

  let batch: BatchReport | null = null;
  if (!args.dataFolder) {
    logger.error(USAGE);
    logger.info('Running analysis on existing database instead...');
  } else {
    const folder = path.resolve(args.dataFolder);
    if (await isDirectory(folder)) {
      batch = await runImport(folder, args, deps);
    } else {
      logger.error(`Provided path is not a directory: ${folder}`);
      logger.info('Running analysis on existing database instead...');
    }
  }

  let reportExport: ReportExport | null = null;
  try {
    reportExport = await reports.exportAll(config.paths.exportRoot, now);
  } catch (error) {
    logger.error(`Database error during export: ${errorMessage(error)}`);
  }

  return { batch, reportExport };
}
