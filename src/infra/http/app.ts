import express from 'express';
import { UserService } from '../../application/account/userService.js';
import { UserRepository } from '../../domain/auth/user.js';
import { createAuthRoutes } from './routes/auth.js';
import { createAccountRoutes } from './routes/account.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { createHttpLogger } from './middleware/httpLogger.js';

export interface AppDependencies {
  userRepo: UserRepository;
  userService: UserService;
  jwtSecret: string;
  tokenTtlSeconds: number;
  /** Resolves when the backing store answers; used by /healthz. */
  healthCheck: () => Promise<unknown>;
}

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

const RESET_INIT_PATH = '/api/account/reset-password/init';

export function createApp(deps: AppDependencies): express.Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(createHttpLogger());
  // The reset request body is a bare e-mail, whatever the declared content type
  app.use(RESET_INIT_PATH, express.text({ type: '*/*' }));
  app.use(express.json({ strict: false }));
  app.use(createApiRateLimiter());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use('/api', createAuthRoutes(deps));
  app.use('/api', createAccountRoutes(deps));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
