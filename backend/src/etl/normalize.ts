import { format, isValid, parse, parseISO } from 'date-fns';
import { EmptyInputError, MissingColumnsError } from '../errors.js';
import {
  REQUIRED_COLUMNS,
  type DroppedRow,
  type NormalizeResult,
  type NormalizedRow,
  type RawRow,
  type RawTable,
} from './types.js';

const DATE_PATTERNS = ['M/d/yyyy', 'yyyy/M/d', 'd-MMM-yyyy', 'MMM d, yyyy', 'MMMM d, yyyy'];

const REFERENCE_DATE = new Date(2000, 0, 1);

export function normalizeText(value: unknown): string {
  if (value == null) return '';
  if (value instanceof Date) return isValid(value) ? format(value, 'yyyy-MM-dd') : '';
  return String(value).trim();
}

/** Upper-cases the first letter of every alphabetic run and lower-cases the rest. */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function normalizeNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function excelSerialToDate(serial: number): Date {
  // day 0 of the 1900 date system, Lotus leap-year bug included
  return new Date(1899, 11, 30 + Math.floor(serial));
}

/** Parses a pay date cell into `YYYY-MM-DD`, or `null` when it is not a calendar date. */
export function parsePayDate(value: unknown): string | null {
  let parsed: Date | null = null;

  if (value instanceof Date) {
    parsed = value;
  } else if (typeof value === 'number') {
    parsed = Number.isFinite(value) && value >= 1 ? excelSerialToDate(value) : null;
  } else if (typeof value === 'string' && value.trim()) {
    const text = value.trim();
    parsed = parseISO(text);
    for (const pattern of DATE_PATTERNS) {
      if (isValid(parsed)) break;
      parsed = parse(text, pattern, REFERENCE_DATE);
    }
  }

  return parsed && isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : null;
}

function missingColumns(table: RawTable): string[] {
  const present = new Set(table.columns);
  return REQUIRED_COLUMNS.filter((column) => !present.has(column));
}

function normalizeRow(row: RawRow, rowNumber: number): NormalizedRow | DroppedRow {
  const payDate = parsePayDate(row['Pay Date']);
  if (!payDate) {
    return { rowNumber, reason: 'invalid_pay_date' };
  }
  const hourlyRate = normalizeNumber(row['Hourly Rate']);
  if (hourlyRate === null || hourlyRate <= 0) {
    return { rowNumber, reason: 'invalid_hourly_rate' };
  }
  const hoursWorked = normalizeNumber(row['Hours Worked']);
  if (hoursWorked === null || hoursWorked <= 0) {
    return { rowNumber, reason: 'invalid_hours_worked' };
  }

  return {
    employeeId: normalizeText(row['Emp ID']),
    employeeName: toTitleCase(normalizeText(row['Emp Name'])),
    department: toTitleCase(normalizeText(row['Department'])),
    hourlyRate,
    hoursWorked,
    payDate,
    notes: normalizeText(row['Notes']),
  };
}

/**
 * Validates the column set of a raw table, then cleans each row.
 * Rows with an unparseable pay date or a non-positive/non-numeric rate or
 * hours value are dropped and reported in `dropped`.
 *
 * @throws EmptyInputError when there is no table or it has no rows
 * @throws MissingColumnsError when any required column is absent
 */
export function normalizeTable(table: RawTable | null): NormalizeResult {
  if (!table || !table.rows.length) {
    throw new EmptyInputError();
  }

  const missing = missingColumns(table);
  if (missing.length) {
    throw new MissingColumnsError(missing);
  }

  const result: NormalizeResult = { rows: [], dropped: [] };
  table.rows.forEach((row, index) => {
    const normalized = normalizeRow(row, index + 1);
    if ('reason' in normalized) {
      result.dropped.push(normalized);
    } else {
      result.rows.push(normalized);
    }
  });
  return result;
}
