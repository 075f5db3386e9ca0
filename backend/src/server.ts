import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createDatabase, createPool } from './db.js';
import { createConsoleLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createConsoleLogger('api');
const db = createDatabase(createPool(config.database));

const app = createApp({ config, db, logger });
const server = app.listen(config.api.port, () => {
  logger.info(`up on :${config.api.port}`);
});

function shutdown(): void {
  server.close(() => {
    db.close().catch((error: unknown) => {
      logger.error(`failed to close database pool: ${String(error)}`);
    });
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
