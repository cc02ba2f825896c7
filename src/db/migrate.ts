import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getPool, closePool, withTransaction } from './client.js';

const SQL_DIR = join(dirname(fileURLToPath(import.meta.url)), '../../sql');

export const SCHEMA = 'oi_engine';

/** `NNN_name.sql` files not yet recorded, in apply order. */
export function pendingMigrations(files: string[], applied: ReadonlySet<string>): string[] {
  return files
    .filter(f => /^\d+_.*\.sql$/.test(f) && !applied.has(f))
    .sort();
}

/**
 * Versioned schema setup, run once at boot. Each file is applied and
 * recorded in its own transaction.
 */
export async function runMigrations(): Promise<string[]> {
  const pool = getPool();
  await pool.query(`CREATE SCHEMA IF NOT EXISTS ${SCHEMA}`);
  await pool.query(
    `CREATE TABLE IF NOT EXISTS ${SCHEMA}._migrations (
       filename TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  );

  const { rows } = await pool.query<{ filename: string }>(`SELECT filename FROM ${SCHEMA}._migrations`);
  const pending = pendingMigrations(await readdir(SQL_DIR), new Set(rows.map(r => r.filename)));

  for (const file of pending) {
    const sql = await readFile(join(SQL_DIR, file), 'utf-8');
    try {
      await withTransaction(async client => {
        await client.query(sql);
        await client.query(`INSERT INTO ${SCHEMA}._migrations (filename) VALUES ($1)`, [file]);
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Migration ${file} failed: ${message}`);
    }
    console.log(`[Migrate] Applied ${file}`);
  }

  console.log(`[Migrate] Schema ${SCHEMA} up to date (${pending.length} applied)`);
  return pending;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then(() => closePool())
    .then(() => process.exit(0))
    .catch(err => {
      console.error('[Migrate]', err);
      process.exit(1);
    });
}
