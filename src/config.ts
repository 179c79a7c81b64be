import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET environment variable is required' })
    .min(1, 'JWT_SECRET environment variable is required'),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  RESET_KEY_TTL_HOURS: z.coerce.number().positive().default(24),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const databaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL environment variable is required' })
    .min(1, 'DATABASE_URL environment variable is required'),
});

export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  jwtSecret: string;
  jwtTtlSeconds: number;
  resetKeyTtlMs: number;
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function readEnv(env: NodeJS.ProcessEnv | undefined): NodeJS.ProcessEnv {
  if (!env) {
    dotenv.config();
  }
  return env ?? process.env;
}

function describeProblems(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
}

/**
 * Read and validate configuration from the environment.
 * Pass an explicit env object to bypass `.env` loading.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(readEnv(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeProblems(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    jwtSecret: vars.JWT_SECRET,
    jwtTtlSeconds: vars.JWT_TTL_SECONDS,
    resetKeyTtlMs: vars.RESET_KEY_TTL_HOURS * 60 * 60 * 1000,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Connection string for tools that only talk to the database, such as migrations.
 */
export function loadDatabaseUrl(env?: NodeJS.ProcessEnv): string {
  const parsed = databaseEnvSchema.safeParse(readEnv(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeProblems(parsed.error)}`);
  }
  return parsed.data.DATABASE_URL;
}
