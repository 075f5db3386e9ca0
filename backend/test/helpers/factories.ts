import type { NormalizedRow, RawRow, RawTable } from '../../src/etl/types.js';
import type { LogLevel, Logger } from '../../src/utils/logger.js';

export const HEADER = ['Emp ID', 'Emp Name', 'Department', 'Hourly Rate', 'Hours Worked', 'Pay Date', 'Notes'];

export function makeRow(partial?: Partial<NormalizedRow>): NormalizedRow {
  return {
    employeeId: partial?.employeeId ?? '100',
    employeeName: partial?.employeeName ?? 'Alice Smith',
    department: partial?.department ?? 'It',
    hourlyRate: partial?.hourlyRate ?? 20,
    hoursWorked: partial?.hoursWorked ?? 40,
    payDate: partial?.payDate ?? '2024-03-15',
    notes: partial?.notes ?? '',
  };
}

export function makeRawRow(partial?: Record<string, unknown>): RawRow {
  return {
    'Emp ID': 100,
    'Emp Name': 'alice smith',
    Department: 'it',
    'Hourly Rate': 20,
    'Hours Worked': 40,
    'Pay Date': '2024-03-15',
    Notes: null,
    ...partial,
  };
}

export function makeTable(rows: RawRow[], columns: string[] = HEADER): RawTable {
  return { columns, rows };
}

export type LogEntry = { level: LogLevel; message: string };

export type MemoryLogger = Logger & { entries: LogEntry[] };

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (message) => entries.push({ level: 'info', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message }),
  };
}
