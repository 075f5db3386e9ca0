import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TAX_RATE,
  OVERTIME_THRESHOLD_HOURS,
  calculateBatch,
  calculatePay,
  taxRateFor,
} from '../src/etl/pay-calculator.js';
import { makeRow } from './helpers/factories.js';

describe('taxRateFor', () => {
  it('returns the configured department rates', () => {
    expect(taxRateFor('It')).toBe(0.15);
    expect(taxRateFor('Hr')).toBe(0.12);
    expect(taxRateFor('Finance')).toBe(0.14);
    expect(taxRateFor('Sales')).toBe(0.16);
    expect(taxRateFor('Marketing')).toBe(0.13);
  });

  it('falls back to the default for anything else, including non-title-cased keys', () => {
    expect(taxRateFor('Unknown')).toBe(DEFAULT_TAX_RATE);
    expect(taxRateFor('IT')).toBe(0.1);
    expect(taxRateFor('')).toBe(0.1);
  });
});

describe('calculatePay', () => {
  it('splits overtime and taxes an It row', () => {
    const record = calculatePay(makeRow({ department: 'It', hourlyRate: 20, hoursWorked: 45 }));

    expect(record).toMatchObject({
      grossPay: 900,
      hoursFlag: 'Overtime',
      taxRate: 0.15,
      tax: 135,
      netPay: 765,
      overtimeHours: 5,
      regularHours: 40,
    });
  });

  it('keeps a regular Hr row without overtime', () => {
    const record = calculatePay(makeRow({ department: 'Hr', hourlyRate: 15, hoursWorked: 30 }));

    expect(record).toMatchObject({
      grossPay: 450,
      hoursFlag: 'Regular',
      taxRate: 0.12,
      tax: 54,
      netPay: 396,
      overtimeHours: 0,
      regularHours: 30,
    });
  });

  it('uses the default rate for an unrecognized department', () => {
    const record = calculatePay(makeRow({ department: 'Unknown', hourlyRate: 10, hoursWorked: 10 }));

    expect(record.taxRate).toBe(0.1);
    expect(record.grossPay).toBe(100);
    expect(record.tax).toBe(10);
    expect(record.netPay).toBe(90);
  });

  it('treats exactly 40 hours as regular', () => {
    const record = calculatePay(makeRow({ hoursWorked: OVERTIME_THRESHOLD_HOURS }));
    expect(record.hoursFlag).toBe('Regular');
    expect(record.overtimeHours).toBe(0);
    expect(record.regularHours).toBe(40);
  });

  it('keeps the input fields', () => {
    const row = makeRow({ employeeId: '42', notes: 'bonus week' });
    expect(calculatePay(row)).toMatchObject(row);
  });

  it('holds the pay identities across a range of inputs', () => {
    const departments = ['It', 'Hr', 'Finance', 'Sales', 'Marketing', 'Legal'];
    const hours = [0.5, 12.25, 39.99, 40, 40.01, 52.5, 80];
    const rates = [7.25, 18, 33.4];

    for (const department of departments) {
      for (const hoursWorked of hours) {
        for (const hourlyRate of rates) {
          const record = calculatePay(makeRow({ department, hoursWorked, hourlyRate }));
          expect(record.grossPay).toBe(hourlyRate * hoursWorked);
          expect(record.netPay).toBe(record.grossPay - record.grossPay * taxRateFor(department));
          expect(record.regularHours + record.overtimeHours).toBeCloseTo(hoursWorked, 10);
          expect(record.regularHours).toBeLessThanOrEqual(40);
          expect(record.hoursFlag === 'Overtime').toBe(hoursWorked > 40);
        }
      }
    }
  });
});

describe('calculateBatch', () => {
  it('returns the overtime rows as independent copies', () => {
    const { records, overtime } = calculateBatch([
      makeRow({ employeeId: '1', hoursWorked: 45 }),
      makeRow({ employeeId: '2', hoursWorked: 38 }),
      makeRow({ employeeId: '3', hoursWorked: 60 }),
    ]);

    expect(records).toHaveLength(3);
    expect(overtime.map((record) => record.employeeId)).toEqual(['1', '3']);
    expect(overtime[0]).toEqual(records[0]);
    expect(overtime[0]).not.toBe(records[0]);
  });

  it('returns empty views for no rows', () => {
    expect(calculateBatch([])).toEqual({ records: [], overtime: [] });
  });
});
