import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { pool } from './db.js';
import { createLogger } from './logger.js';

const log = createLogger('migrations');

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const MIGRATIONS_DIR = path.resolve(__dirname, '..', 'migrations');

/** The slice of a pg client the runner uses. */
export type MigrationClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
};

export type MigrationDb = {
  connect(): Promise<MigrationClient>;
};

export type MigrationOptions = {
  db?: MigrationDb;
  migrationsDir?: string;
};

function migrationId(row: unknown): string | null {
  if (!row || typeof row !== 'object') return null;
  const { id } = row as { id?: unknown };
  return typeof id === 'string' ? id : null;
}

/**
 * Applies each `*.sql` file not yet listed in `schema_migrations`, in file name order.
 * Every file runs in its own transaction together with its bookkeeping row.
 * Returns the ids applied by this run.
 */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const db = options.db ?? pool;
  const migrationsDir = options.migrationsDir ?? MIGRATIONS_DIR;

  const files = (await fs.readdir(migrationsDir)).filter((name) => name.endsWith('.sql')).sort();

  const client = await db.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    const { rows } = await client.query('SELECT id FROM schema_migrations');
    const done = new Set(rows.map(migrationId));
    const pending = files.filter((file) => !done.has(file));

    for (const file of pending) {
      const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
      log.info({ migration: file }, 'Applying migration');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (id) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          log.warn({ err: rollbackError, migration: file }, 'Rollback failed');
        });
        throw error;
      }
    }

    log.info({ applied: pending.length, total: files.length }, 'Schema up to date');
    return pending;
  } finally {
    client.release();
  }
}
