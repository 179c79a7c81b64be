import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { Pool } from 'pg';
import { createPool } from './pool.js';
import { loadDatabaseUrl } from '../../config.js';
import { logger } from '../../logger.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');
const log = logger.child({ component: 'migrate' });

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: Pool, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    log.info({ version: migration.version, file: migration.filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  let pool: Pool | null = null;
  try {
    pool = createPool(loadDatabaseUrl());
    log.info('Starting migrations');

    await ensureMigrationsTable(pool);
    const migrations = await getMigrations();
    const applied = await getAppliedMigrations(pool);
    const pending = migrations.filter((m) => !applied.includes(m.version));

    if (pending.length === 0) {
      log.info('No pending migrations');
      return;
    }

    log.info({ count: pending.length }, 'Found pending migrations');
    for (const migration of pending) {
      await applyMigration(pool, migration);
    }
    log.info('All migrations applied successfully');
  } catch (error) {
    log.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool?.end();
  }
}

void migrate();
