import type { HoursFlag, NormalizedRow, PayRecord } from './types.js';

export const OVERTIME_THRESHOLD_HOURS = 40;

export const DEFAULT_TAX_RATE = 0.1;

// keyed by the title-cased department name
const DEPARTMENT_TAX_RATES: ReadonlyMap<string, number> = new Map([
  ['It', 0.15],
  ['Hr', 0.12],
  ['Finance', 0.14],
  ['Sales', 0.16],
  ['Marketing', 0.13],
]);

export function taxRateFor(department: string): number {
  return DEPARTMENT_TAX_RATES.get(department) ?? DEFAULT_TAX_RATE;
}

export function hoursFlagFor(hoursWorked: number): HoursFlag {
  return hoursWorked > OVERTIME_THRESHOLD_HOURS ? 'Overtime' : 'Regular';
}

export function calculatePay(row: NormalizedRow): PayRecord {
  const grossPay = row.hourlyRate * row.hoursWorked;
  const taxRate = taxRateFor(row.department);
  const tax = grossPay * taxRate;

  return {
    ...row,
    grossPay,
    hoursFlag: hoursFlagFor(row.hoursWorked),
    taxRate,
    tax,
    netPay: grossPay - tax,
    overtimeHours: Math.max(row.hoursWorked - OVERTIME_THRESHOLD_HOURS, 0),
    regularHours: Math.min(row.hoursWorked, OVERTIME_THRESHOLD_HOURS),
  };
}

export function calculateBatch(rows: NormalizedRow[]): { records: PayRecord[]; overtime: PayRecord[] } {
  const records = rows.map(calculatePay);
  // copies, so the overtime view never aliases the records handed to the store
  const overtime = records.filter((record) => record.hoursFlag === 'Overtime').map((record) => ({ ...record }));
  return { records, overtime };
}
