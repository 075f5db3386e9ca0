import type { DepartmentSummary, PayRecord } from './types.js';

// Column names are read by the reporting queries; keep them literal.

export type SqlType = 'text' | 'date' | 'double precision' | 'integer';

export type TableColumn<T> = {
  name: string;
  field: keyof T & string;
  type: SqlType;
};

export const PAY_RECORD_COLUMNS: TableColumn<PayRecord>[] = [
  { name: 'Emp ID', field: 'employeeId', type: 'text' },
  { name: 'Emp Name', field: 'employeeName', type: 'text' },
  { name: 'Department', field: 'department', type: 'text' },
  { name: 'Hourly Rate', field: 'hourlyRate', type: 'double precision' },
  { name: 'Hours Worked', field: 'hoursWorked', type: 'double precision' },
  { name: 'Pay Date', field: 'payDate', type: 'date' },
  { name: 'Notes', field: 'notes', type: 'text' },
  { name: 'Gross Pay', field: 'grossPay', type: 'double precision' },
  { name: 'Hours Flag', field: 'hoursFlag', type: 'text' },
  { name: 'Tax Rate', field: 'taxRate', type: 'double precision' },
  { name: 'Tax', field: 'tax', type: 'double precision' },
  { name: 'Net Pay', field: 'netPay', type: 'double precision' },
  { name: 'Overtime Hours', field: 'overtimeHours', type: 'double precision' },
  { name: 'Regular Hours', field: 'regularHours', type: 'double precision' },
];

export const DEPARTMENT_SUMMARY_COLUMNS: TableColumn<DepartmentSummary>[] = [
  { name: 'Department', field: 'department', type: 'text' },
  { name: 'Gross Pay', field: 'grossPay', type: 'double precision' },
  { name: 'Tax', field: 'tax', type: 'double precision' },
  { name: 'Net Pay', field: 'netPay', type: 'double precision' },
  { name: 'Employee Count', field: 'employeeCount', type: 'integer' },
];

export function columnHeader<T>(columns: TableColumn<T>[]): string[] {
  return columns.map((column) => column.name);
}

export function columnValues<T>(columns: TableColumn<T>[], row: T): Array<T[keyof T & string]> {
  return columns.map((column) => row[column.field]);
}
