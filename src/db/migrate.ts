import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../config/logger.config';
import { closePool, createPool } from './pool';

const MIGRATIONS_TABLE = 'migrations';

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      run_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<Set<string>> {
  const res = await pool.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE};`);
  return new Set(res.rows.map((row) => row.name));
}

function getMigrationsDir(): string {
  return path.join(__dirname, '..', '..', 'migrations');
}

function loadMigrationFiles(migrationsDir: string): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && /^\d+_/.test(file))
    .sort();
}

async function runMigrationFile(pool: Pool, migrationsDir: string, fileName: string): Promise<void> {
  const sql = fs.readFileSync(path.join(migrationsDir, fileName), 'utf8');
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1) ON CONFLICT (name) DO NOTHING;`, [
      fileName,
    ]);
    await client.query('COMMIT');
    logger.info('Migration completed', { migration: fileName });
  } catch (err) {
    await client.query('ROLLBACK');
    logger.error('Migration failed', { migration: fileName, error: String(err) });
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Apply every migration file not yet recorded in the migrations table, in
 * file name order. Each file runs in its own transaction.
 * @returns names of the files applied by this run
 */
export async function runMigrations(
  pool: Pool,
  migrationsDir: string = getMigrationsDir()
): Promise<string[]> {
  await ensureMigrationsTable(pool);

  const applied = await getAppliedMigrations(pool);
  const pending = loadMigrationFiles(migrationsDir).filter((file) => !applied.has(file));

  logger.info('Running migrations', { pending: pending.length, applied: applied.size });

  for (const file of pending) {
    await runMigrationFile(pool, migrationsDir, file);
  }

  return pending;
}

async function main(): Promise<void> {
  const pool = createPool();
  try {
    await runMigrations(pool);
  } finally {
    await closePool(pool);
  }
}

// Run as a script
if (require.main === module) {
  main().catch((err) => {
    logger.error('Migration process failed', { error: String(err) });
    process.exit(1);
  });
}
