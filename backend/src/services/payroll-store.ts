import type { PoolClient } from 'pg';
import type { Database } from '../db.js';
import { DEPARTMENT_SUMMARY_COLUMNS, PAY_RECORD_COLUMNS, columnValues, type TableColumn } from '../etl/columns.js';
import type { CombinedBatch, DepartmentSummary, PayRecord } from '../etl/types.js';
import { errorMessage, type Logger } from '../utils/logger.js';

export type WriteMode = 'append' | 'replace';

export type RelationConfig<T> = {
  table: string;
  columns: TableColumn<T>[];
};

export const PAYROLL_RECORDS: RelationConfig<PayRecord> = { table: 'payroll_records', columns: PAY_RECORD_COLUMNS };
export const DEPARTMENT_SUMMARY: RelationConfig<DepartmentSummary> = {
  table: 'department_summary',
  columns: DEPARTMENT_SUMMARY_COLUMNS,
};
export const OVERTIME_WARNINGS: RelationConfig<PayRecord> = { table: 'overtime_warnings', columns: PAY_RECORD_COLUMNS };

const RELATION_TABLES = [PAYROLL_RECORDS.table, DEPARTMENT_SUMMARY.table, OVERTIME_WARNINGS.table];

export type SaveSummary = {
  mode: WriteMode;
  payrollRecords: number;
  departmentSummary: number;
  overtimeWarnings: number;
};

export type DepartmentNetPay = {
  department: string;
  totalNetPay: number;
};

export type LoadValidation = {
  ok: boolean;
  totals: DepartmentNetPay[];
  error?: string;
};

export type PayrollStore = {
  ensureSchema(): Promise<void>;
  save(batch: CombinedBatch, mode: WriteMode): Promise<SaveSummary>;
  validateLoad(): Promise<LoadValidation>;
};

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createTableSql<T>(config: RelationConfig<T>): string {
  const columns = config.columns.map((column) => `${quoteIdent(column.name)} ${column.type}`).join(', ');
  return `create table if not exists ${config.table} (${columns})`;
}

export function createPayrollStore(db: Database, logger: Logger): PayrollStore {
  async function ensureSchema(): Promise<void> {
    await db.query(createTableSql(PAYROLL_RECORDS));
    await db.query(createTableSql(DEPARTMENT_SUMMARY));
    await db.query(createTableSql(OVERTIME_WARNINGS));
  }

  async function insertRows<T>(config: RelationConfig<T>, rows: T[], client: PoolClient): Promise<number> {
    const columnList = config.columns.map((column) => quoteIdent(column.name)).join(', ');
    const placeholders = config.columns.map((_, index) => `$${index + 1}`).join(', ');
    const text = `insert into ${config.table} (${columnList}) values (${placeholders})`;
    for (const row of rows) {
      await db.query(text, columnValues(config.columns, row), client);
    }
    return rows.length;
  }

  async function save(batch: CombinedBatch, mode: WriteMode): Promise<SaveSummary> {
    logger.info(`Loading data into database (${mode})...`);
    await ensureSchema();

    const summary = await db.withTransaction(async (client) => {
      if (mode === 'replace') {
        for (const table of RELATION_TABLES) {
          await db.query(`delete from ${table}`, [], client);
        }
      }
      return {
        mode,
        payrollRecords: await insertRows(PAYROLL_RECORDS, batch.records, client),
        departmentSummary: await insertRows(DEPARTMENT_SUMMARY, batch.departmentSummary, client),
        overtimeWarnings: await insertRows(OVERTIME_WARNINGS, batch.overtime, client),
      };
    });

    logger.info(
      `Loaded ${summary.payrollRecords} payroll record(s), ${summary.departmentSummary} department summary row(s), ` +
        `${summary.overtimeWarnings} overtime warning(s)`
    );
    return summary;
  }

  async function validateLoad(): Promise<LoadValidation> {
    logger.info('Validating data load...');
    let totals: DepartmentNetPay[];
    try {
      const { rows } = await db.query<{ Department: string; 'Total Net Pay': string | number | null }>(
        `select "Department", sum("Net Pay") as "Total Net Pay"
         from payroll_records
         group by "Department"
         order by "Department"`
      );
      totals = rows.map((row) => ({ department: row.Department, totalNetPay: Number(row['Total Net Pay'] ?? 0) }));
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Data validation failed: ${message}`);
      return { ok: false, totals: [], error: message };
    }

    if (!totals.length) {
      logger.error('Data validation failed. No records found in the database.');
      return { ok: false, totals };
    }
    logger.info(
      `Data validation successful. Net pay by department: ${totals
        .map((total) => `${total.department}=${total.totalNetPay.toFixed(2)}`)
        .join(', ')}`
    );
    return { ok: true, totals };
  }

  return { ensureSchema, save, validateLoad };
}
