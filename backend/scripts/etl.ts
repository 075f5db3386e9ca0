import 'dotenv/config';
import { runEtlCommand } from '../src/cli/etl-command.js';
import { loadConfig } from '../src/config.js';
import { createDatabase, createPool } from '../src/db.js';
import { createPayrollReports } from '../src/services/payroll-reports.js';
import { createPayrollStore } from '../src/services/payroll-store.js';
import { createConsoleLogger, errorMessage } from '../src/utils/logger.js';

const config = loadConfig();
const logger = createConsoleLogger('etl');
const db = createDatabase(createPool(config.database));

try {
  const { batch, reportExport } = await runEtlCommand(process.argv.slice(2), {
    config,
    store: createPayrollStore(db, logger),
    reports: createPayrollReports(db, logger),
    logger,
  });
  if (batch) {
    logger.info(`Workbooks: ${batch.exports.length ? batch.exports.join(', ') : 'not exported'}`);
  }
  if (reportExport) {
    logger.info(`Reports: ${reportExport.folder}`);
  }
  if (!batch) {
    process.exitCode = 1;
  }
} catch (error) {
  logger.error(errorMessage(error));
  process.exitCode = 1;
} finally {
  await db.close();
}
