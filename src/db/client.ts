import { Pool } from 'pg';
import type { PoolClient } from 'pg';
import { config } from '../config.js';

let pool: Pool | null = null;

/** Lazily created shared pool. Ticks are serialised, so a handful of connections suffices. */
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      application_name: 'oi-tug-of-war',
      max: 5,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });
    pool.on('error', (err) => {
      console.error('[DB] Idle client error:', err.message);
    });
  }
  return pool;
}

/** Run `fn` inside BEGIN/COMMIT on one client; rolls back and rethrows on failure. */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
  console.log('[DB] Pool closed');
}
