import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { logger as rootLogger, type Logger } from '../core/logger';

/** The slice of a pg Pool/Client the repositories rely on. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

export function createPool(databaseUrl: string): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 2,
    idleTimeoutMillis: 30_000,
  });
}

export async function loadMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR) {
  const files = (await readdir(migrationsDir)).filter((name) => name.endsWith('.sql')).sort();
  const migrations: Array<{ name: string; sql: string }> = [];
  for (const name of files) {
    migrations.push({ name, sql: await readFile(path.join(migrationsDir, name), 'utf8') });
  }
  return migrations;
}

/** Applies every migration file in name order inside one transaction; the SQL itself is idempotent. */
export const runMigrations = async (
  pool: Pool,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
  logger: Logger = rootLogger,
): Promise<number> => {
  const migrations = await loadMigrations(migrationsDir);

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    for (const migration of migrations) {
      await client.query(migration.sql);
    }
    await client.query('COMMIT');
    logger.info('Migrations applied successfully', { files: migrations.map((m) => m.name) });
    return migrations.length;
  } catch (err) {
    await client.query('ROLLBACK');
    logger.error('Migration failed', { error: err });
    throw err;
  } finally {
    client.release();
  }
};

/**
 * Owns the pool for the lifetime of the run. `close` ends it at most once and
 * logs (rather than rethrows) a failure to close.
 */
export class DatabaseHandle {
  private closed = false;

  constructor(
    readonly pool: Pool,
    private readonly logger: Logger = rootLogger,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.pool.end();
      this.logger.info('Database connection closed');
    } catch (error) {
      this.logger.error('Error closing database connection', { error });
    }
  }
}
