export const REQUIRED_COLUMNS = [
  'Emp ID',
  'Emp Name',
  'Department',
  'Hourly Rate',
  'Hours Worked',
  'Pay Date',
  'Notes',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export type RawRow = Readonly<Record<string, unknown>>;

/** A sheet as read from disk: header order plus one record per data row. */
export type RawTable = {
  columns: string[];
  rows: RawRow[];
};

export type NormalizedRow = {
  readonly employeeId: string;
  readonly employeeName: string;
  readonly department: string;
  readonly hourlyRate: number;
  readonly hoursWorked: number;
  /** Calendar date, `YYYY-MM-DD`. */
  readonly payDate: string;
  readonly notes: string;
};

export type DropReason = 'invalid_pay_date' | 'invalid_hourly_rate' | 'invalid_hours_worked';

export type DroppedRow = {
  rowNumber: number;
  reason: DropReason;
};

export type NormalizeResult = {
  rows: NormalizedRow[];
  dropped: DroppedRow[];
};

export type HoursFlag = 'Regular' | 'Overtime';

export type PayRecord = NormalizedRow & {
  readonly grossPay: number;
  readonly hoursFlag: HoursFlag;
  readonly taxRate: number;
  readonly tax: number;
  readonly netPay: number;
  readonly overtimeHours: number;
  readonly regularHours: number;
};

export type DepartmentSummary = {
  readonly department: string;
  readonly grossPay: number;
  readonly tax: number;
  readonly netPay: number;
  readonly employeeCount: number;
};

export type FileResult = {
  records: PayRecord[];
  overtime: PayRecord[];
  departmentSummary: DepartmentSummary[];
  dropped: DroppedRow[];
};

export type CombinedBatch = {
  records: PayRecord[];
  overtime: PayRecord[];
  departmentSummary: DepartmentSummary[];
};
