import { NoInputFilesError } from '../errors.js';
import type { CombinedBatch, DepartmentSummary, FileResult, PayRecord } from './types.js';

type Totals = {
  grossPay: number;
  tax: number;
  netPay: number;
  employeeCount: number;
};

function byDepartment(a: DepartmentSummary, b: DepartmentSummary): number {
  if (a.department === b.department) return 0;
  return a.department < b.department ? -1 : 1;
}

function rollUp<T>(items: T[], departmentOf: (item: T) => string, totalsOf: (item: T) => Totals): DepartmentSummary[] {
  const groups = new Map<string, Totals>();
  for (const item of items) {
    const key = departmentOf(item);
    const current = groups.get(key) ?? { grossPay: 0, tax: 0, netPay: 0, employeeCount: 0 };
    const next = totalsOf(item);
    groups.set(key, {
      grossPay: current.grossPay + next.grossPay,
      tax: current.tax + next.tax,
      netPay: current.netPay + next.netPay,
      employeeCount: current.employeeCount + next.employeeCount,
    });
  }
  return Array.from(groups, ([department, totals]) => ({ department, ...totals })).sort(byDepartment);
}

/** One summary row per department, ordered by department name. */
export function summarizeByDepartment(records: PayRecord[]): DepartmentSummary[] {
  return rollUp(
    records,
    (record) => record.department,
    (record) => ({ grossPay: record.grossPay, tax: record.tax, netPay: record.netPay, employeeCount: 1 })
  );
}

/** Sums already-aggregated summaries; counts are added, not recounted. */
export function mergeDepartmentSummaries(summaries: DepartmentSummary[][]): DepartmentSummary[] {
  return rollUp(
    summaries.flat(),
    (summary) => summary.department,
    (summary) => summary
  );
}

/**
 * Combines per-file results in processing order.
 *
 * @throws NoInputFilesError when no file produced a result
 */
export function mergeFileResults(results: FileResult[]): CombinedBatch {
  if (!results.length) {
    throw new NoInputFilesError();
  }
  return {
    records: results.flatMap((result) => result.records),
    overtime: results.flatMap((result) => result.overtime),
    departmentSummary: mergeDepartmentSummaries(results.map((result) => result.departmentSummary)),
  };
}
