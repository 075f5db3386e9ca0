import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { conflict } from '../errors.js';
import { runBatch } from '../etl/pipeline.js';
import { collectSessionSourceFiles, createImportSession } from '../services/import-session.js';
import type { PayrollStore } from '../services/payroll-store.js';
import { asyncHandler } from '../utils/async-handler.js';
import type { Logger } from '../utils/logger.js';

type ImportsRouterDeps = {
  config: AppConfig;
  store: PayrollStore;
  logger: Logger;
};

const importSchema = z.object({
  mode: z.enum(['append', 'replace']).default('replace'),
  exportWorkbooks: z
    .union([z.string(), z.boolean()])
    .optional()
    .transform((value) => {
      if (value === undefined) return false;
      if (typeof value === 'boolean') return value;
      const normalized = value.toLowerCase();
      return normalized === 'true' || normalized === '1' || normalized === 'on';
    }),
});

export function createImportsRouter({ config, store, logger }: ImportsRouterDeps): Router {
  const router = Router();
  let running = false;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      files: config.uploads.maxFiles,
      fileSize: config.uploads.maxFileSize,
    },
  });

  router.post(
    '/',
    upload.array('files', config.uploads.maxFiles),
    asyncHandler(async (req, res) => {
      const payload = importSchema.parse(req.body);
      if (running) {
        throw conflict('an import is already running');
      }

      running = true;
      try {
        const session = await createImportSession(config.paths.importRoot, Array.isArray(req.files) ? req.files : []);
        logger.info(`Import session ${session.id}: ${session.storedFiles.join(', ')}`);

        const files = await collectSessionSourceFiles(session.dir);
        const report = await runBatch({
          files,
          mode: payload.mode,
          store,
          logger,
          exportDir: payload.exportWorkbooks ? config.paths.exportRoot : undefined,
        });

        res.json({ sessionId: session.id, ...report });
      } finally {
        running = false;
      }
    })
  );

  return router;
}
