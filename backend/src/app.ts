import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import type { AppConfig } from './config.js';
import type { Database } from './db.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createImportsRouter } from './routes/imports.js';
import { createReportsRouter } from './routes/reports.js';
import { createPayrollReports } from './services/payroll-reports.js';
import { createPayrollStore } from './services/payroll-store.js';
import type { Logger } from './utils/logger.js';

export type AppDeps = {
  config: AppConfig;
  db: Database;
  logger: Logger;
  /** morgan access log; off in tests */
  accessLog?: boolean;
};

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export function createApp({ config, db, logger, accessLog = true }: AppDeps): Express {
  const openApiDocument = YAML.parse(readFileSync(openApiPath, 'utf8'));
  const store = createPayrollStore(db, logger);
  const reports = createPayrollReports(db, logger);

  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (accessLog) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', createHealthRouter(db));
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/imports', createImportsRouter({ config, store, logger }));
  app.use('/api/v1/reports', createReportsRouter(reports, store));

  app.use(createErrorHandler(logger));
  return app;
}
