import pg from 'pg';
import { logger } from '../../logger.js';

const log = logger.child({ component: 'db' });

const POOL_MAX = 20;
const IDLE_TIMEOUT_MS = 30_000;
const CONNECT_TIMEOUT_MS = 2_000;

/**
 * Connection pool for the users database. Nothing connects until the first query,
 * so an absent connection string falls back to the PG* variables at that point.
 */
export function createPool(connectionString: string | undefined): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: POOL_MAX,
    idleTimeoutMillis: IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
  });

  pool.on('connect', () => {
    log.debug('Database connection established');
  });

  // An idle client lost its connection; the pool replaces it on the next checkout
  pool.on('error', (err) => {
    log.error({ err }, 'Idle database client failed');
  });

  return pool;
}
