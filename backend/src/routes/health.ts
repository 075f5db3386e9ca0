import { Router } from 'express';
import type { Database } from '../db.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(db: Database): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const now = await db.query<{ now: Date | string }>('select now() as now');
      res.json({ status: 'ok', time: now.rows[0]?.now ?? null });
    })
  );

  return router;
}
