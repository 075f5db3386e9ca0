import { Router } from 'express';
import { z } from 'zod';
import type { PayrollReports } from '../services/payroll-reports.js';
import type { PayrollStore } from '../services/payroll-store.js';
import { asyncHandler } from '../utils/async-handler.js';

const topEarnersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export function createReportsRouter(reports: PayrollReports, store: PayrollStore): Router {
  const router = Router();

  router.get(
    '/top-earners',
    asyncHandler(async (req, res) => {
      const { limit } = topEarnersQuerySchema.parse(req.query);
      res.json(await reports.topEarners(limit));
    })
  );

  router.get(
    '/monthly',
    asyncHandler(async (_req, res) => {
      res.json(await reports.monthlyNetPay());
    })
  );

  router.get(
    '/average-hours',
    asyncHandler(async (_req, res) => {
      res.json(await reports.averageHoursByDepartment());
    })
  );

  router.get(
    '/department-summary',
    asyncHandler(async (_req, res) => {
      res.json(await reports.listDepartmentSummary());
    })
  );

  router.get(
    '/overtime-warnings',
    asyncHandler(async (_req, res) => {
      res.json(await reports.listOvertimeWarnings());
    })
  );

  router.get(
    '/validation',
    asyncHandler(async (_req, res) => {
      const validation = await store.validateLoad();
      res.status(validation.ok ? 200 : 404).json(validation);
    })
  );

  return router;
}
