import { pino, stdTimeFunctions, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function resolveLevel(value: string | undefined): LevelWithSilent {
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  const level = LEVELS.find((l) => l === value?.trim().toLowerCase());
  return level ?? 'info';
}

/**
 * Process-wide JSON logger. Components derive children with `logger.child({ component })`.
 */
export const logger = pino({
  name: 'account-api',
  level: resolveLevel(process.env.LOG_LEVEL),
  timestamp: stdTimeFunctions.isoTime,
  redact: ['req.headers.authorization', 'password', 'newPassword', 'currentPassword'],
});
