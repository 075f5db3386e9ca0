import path from 'node:path';
import { promises as fsp } from 'node:fs';
import type { QueryResultRow } from 'pg';
import type { Database } from '../db.js';
import { columnHeader, columnValues, type TableColumn } from '../etl/columns.js';
import type { DepartmentSummary, PayRecord } from '../etl/types.js';
import { toCsv, type CsvCell } from '../utils/csv.js';
import type { Logger } from '../utils/logger.js';
import { fileTimestamp } from '../utils/timestamp.js';
import { DEPARTMENT_SUMMARY, OVERTIME_WARNINGS, PAYROLL_RECORDS, quoteIdent, type RelationConfig } from './payroll-store.js';

export const TOP_EARNERS_LIMIT = 5;

export type TopEarner = {
  employeeId: string;
  employeeName: string;
  department: string;
  netPay: number;
};

export type MonthlyNetPay = {
  month: string;
  totalNetPay: number;
};

export type DepartmentHours = {
  department: string;
  avgHoursWorked: number;
};

export type ReportExport = {
  folder: string;
  files: string[];
};

export type PayrollReports = {
  topEarners(limit?: number): Promise<TopEarner[]>;
  monthlyNetPay(): Promise<MonthlyNetPay[]>;
  averageHoursByDepartment(): Promise<DepartmentHours[]>;
  listPayrollRecords(): Promise<PayRecord[]>;
  listDepartmentSummary(): Promise<DepartmentSummary[]>;
  listOvertimeWarnings(): Promise<PayRecord[]>;
  exportAll(exportRoot: string, now?: Date): Promise<ReportExport>;
};

function selectList<T>(columns: TableColumn<T>[]): string {
  return columns
    .map((column) => {
      const name = quoteIdent(column.name);
      return column.type === 'date' ? `to_char(${name}, 'YYYY-MM-DD') as ${name}` : name;
    })
    .join(', ');
}

function toPayRecord(row: QueryResultRow): PayRecord {
  return {
    employeeId: String(row['Emp ID'] ?? ''),
    employeeName: String(row['Emp Name'] ?? ''),
    department: String(row['Department'] ?? ''),
    hourlyRate: Number(row['Hourly Rate']),
    hoursWorked: Number(row['Hours Worked']),
    payDate: String(row['Pay Date']),
    notes: String(row['Notes'] ?? ''),
    grossPay: Number(row['Gross Pay']),
    hoursFlag: row['Hours Flag'] === 'Overtime' ? 'Overtime' : 'Regular',
    taxRate: Number(row['Tax Rate']),
    tax: Number(row['Tax']),
    netPay: Number(row['Net Pay']),
    overtimeHours: Number(row['Overtime Hours']),
    regularHours: Number(row['Regular Hours']),
  };
}

function toDepartmentSummary(row: QueryResultRow): DepartmentSummary {
  return {
    department: String(row['Department'] ?? ''),
    grossPay: Number(row['Gross Pay']),
    tax: Number(row['Tax']),
    netPay: Number(row['Net Pay']),
    employeeCount: Number(row['Employee Count']),
  };
}

function relationCsv<T>(config: RelationConfig<T>, rows: T[]): string {
  return toCsv(
    columnHeader(config.columns),
    rows.map((row) => columnValues(config.columns, row).map((value): CsvCell => (value == null ? null : String(value))))
  );
}

export function createPayrollReports(db: Database, logger: Logger): PayrollReports {
  async function topEarners(limit = TOP_EARNERS_LIMIT): Promise<TopEarner[]> {
    const { rows } = await db.query(
      `select "Emp ID", "Emp Name", "Department", "Net Pay"
       from payroll_records
       order by "Net Pay" desc
       limit ${Math.max(1, Math.trunc(limit))}`
    );
    return rows.map((row) => ({
      employeeId: String(row['Emp ID'] ?? ''),
      employeeName: String(row['Emp Name'] ?? ''),
      department: String(row['Department'] ?? ''),
      netPay: Number(row['Net Pay']),
    }));
  }

  async function monthlyNetPay(): Promise<MonthlyNetPay[]> {
    const { rows } = await db.query<{ Month: string; 'Total Net Pay': string | number }>(
      `select to_char("Pay Date", 'YYYY-MM') as "Month", sum("Net Pay") as "Total Net Pay"
       from payroll_records
       group by to_char("Pay Date", 'YYYY-MM')
       order by "Month"`
    );
    return rows.map((row) => ({ month: row.Month, totalNetPay: Number(row['Total Net Pay']) }));
  }

  async function averageHoursByDepartment(): Promise<DepartmentHours[]> {
    const { rows } = await db.query<{ Department: string; 'Avg Hours Worked': string | number }>(
      `select "Department", avg("Hours Worked") as "Avg Hours Worked"
       from payroll_records
       group by "Department"
       order by "Department"`
    );
    return rows.map((row) => ({ department: row.Department, avgHoursWorked: Number(row['Avg Hours Worked']) }));
  }

  // listings are ordered by pay date then employee id, not load order
  async function listPayrollRecords(): Promise<PayRecord[]> {
    const { rows } = await db.query(
      `select ${selectList(PAYROLL_RECORDS.columns)} from payroll_records order by "Pay Date", "Emp ID"`
    );
    return rows.map(toPayRecord);
  }

  async function listDepartmentSummary(): Promise<DepartmentSummary[]> {
    const { rows } = await db.query(
      `select ${selectList(DEPARTMENT_SUMMARY.columns)} from department_summary order by "Department"`
    );
    return rows.map(toDepartmentSummary);
  }

  async function listOvertimeWarnings(): Promise<PayRecord[]> {
    const { rows } = await db.query(
      `select ${selectList(OVERTIME_WARNINGS.columns)} from overtime_warnings order by "Pay Date", "Emp ID"`
    );
    return rows.map(toPayRecord);
  }

  async function exportAll(exportRoot: string, now = new Date()): Promise<ReportExport> {
    const timestamp = fileTimestamp(now);
    const folder = path.join(exportRoot, `payroll_exports_${timestamp}`);
    await fsp.mkdir(folder, { recursive: true });
    logger.info(`Exporting all reports to ${folder}`);

    const top = await topEarners();
    const monthly = await monthlyNetPay();
    const hours = await averageHoursByDepartment();
    const records = await listPayrollRecords();
    const summary = await listDepartmentSummary();
    const overtime = await listOvertimeWarnings();

    const reports: Array<{ name: string; rowCount: number; csv: () => string }> = [
      {
        name: 'top_earners',
        rowCount: top.length,
        csv: () =>
          toCsv(
            ['Emp ID', 'Emp Name', 'Department', 'Net Pay'],
            top.map((row) => [row.employeeId, row.employeeName, row.department, row.netPay])
          ),
      },
      {
        name: 'monthly_payroll_summary',
        rowCount: monthly.length,
        csv: () => toCsv(['Month', 'Total Net Pay'], monthly.map((row) => [row.month, row.totalNetPay])),
      },
      {
        name: 'avg_hours_by_department',
        rowCount: hours.length,
        csv: () => toCsv(['Department', 'Avg Hours Worked'], hours.map((row) => [row.department, row.avgHoursWorked])),
      },
      { name: 'complete_payroll_records', rowCount: records.length, csv: () => relationCsv(PAYROLL_RECORDS, records) },
      { name: 'department_summary', rowCount: summary.length, csv: () => relationCsv(DEPARTMENT_SUMMARY, summary) },
      { name: 'overtime_warnings', rowCount: overtime.length, csv: () => relationCsv(OVERTIME_WARNINGS, overtime) },
    ];

    const files: string[] = [];
    for (const report of reports) {
      if (!report.rowCount) {
        logger.warn(`No rows for ${report.name}; skipping export`);
        continue;
      }
      const file = path.join(folder, `${report.name}_${timestamp}.csv`);
      await fsp.writeFile(file, report.csv(), 'utf8');
      files.push(file);
      logger.info(`Exported ${report.name} to ${file}`);
    }
    return { folder, files };
  }

  return {
    topEarners,
    monthlyNetPay,
    averageHoursByDepartment,
    listPayrollRecords,
    listDepartmentSummary,
    listOvertimeWarnings,
    exportAll,
  };
}
