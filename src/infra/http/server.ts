import { loadConfig } from '../../config.js';
import { logger } from '../../logger.js';
import { UserService } from '../../application/account/userService.js';
import { PgUserRepo } from '../db/userRepo.js';
import { createPool } from '../db/pool.js';
import { createApp } from './app.js';

const config = loadConfig();
if (process.env.NODE_ENV !== 'test') {
  logger.level = config.logLevel;
}

const pool = createPool(config.databaseUrl);
const userRepo = new PgUserRepo(pool);
const userService = new UserService(userRepo, { resetKeyTtlMs: config.resetKeyTtlMs });

const app = createApp({
  userRepo,
  userService,
  jwtSecret: config.jwtSecret,
  tokenTtlSeconds: config.jwtTtlSeconds,
  healthCheck: () => pool.query('SELECT 1'),
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
  logger.info(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to close database pool');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
