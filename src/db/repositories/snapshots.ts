import { z } from 'zod';
import { getPool } from '../client.js';
import { parseSnapshot, strikeMap, strikeMetricsSchema, toStrikeMetrics } from '../../types/market.js';
import type { StrikeMetrics } from '../../types/market.js';
import type { SnapshotStore, StoredSnapshot } from '../../pipeline/tick-pipeline.js';

interface SnapshotRow {
  id: string;
  captured_at: Date;
  spot_price: string;
  expiry: string;
  strikes: unknown;
  volatility_index: string | null;
  futures_oi_change: string | null;
}

const strikesColumn = z.array(strikeMetricsSchema);

function toNullableNumber(v: string | null): number | null {
  if (v === null) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

function rowToStored(row: SnapshotRow): StoredSnapshot | null {
  const parsed = parseSnapshot({
    timestamp: row.captured_at,
    spot_price: row.spot_price,
    expiry: row.expiry,
    strikes: row.strikes,
  });
  if (!parsed.ok) {
    console.warn(`[DB] Snapshot ${row.id} rejected: ${parsed.error}`);
    return null;
  }
  return {
    id: row.id,
    snapshot: parsed.snapshot,
    volatilityIndex: toNullableNumber(row.volatility_index),
    futuresOiChange: toNullableNumber(row.futures_oi_change),
  };
}

export async function getLatestUnprocessedSnapshot(): Promise<StoredSnapshot | null> {
  const pool = getPool();
  const { rows } = await pool.query<SnapshotRow>(
    `SELECT s.id, s.captured_at, s.spot_price, s.expiry, s.strikes,
            s.volatility_index, s.futures_oi_change
     FROM oi_engine.oi_snapshots s
     WHERE NOT EXISTS (SELECT 1 FROM oi_engine.analyses a WHERE a.snapshot_id = s.id)
     ORDER BY s.captured_at DESC
     LIMIT 1`,
  );
  const row = rows[0];
  return row ? rowToStored(row) : null;
}

export async function getRecentSpotPrices(before: string, limit: number): Promise<number[]> {
  const pool = getPool();
  const { rows } = await pool.query<{ spot_price: string }>(
    `SELECT spot_price FROM (
       SELECT spot_price, captured_at
       FROM oi_engine.oi_snapshots
       WHERE captured_at < $1
       ORDER BY captured_at DESC
       LIMIT $2
     ) recent
     ORDER BY captured_at ASC`,
    [before, limit],
  );
  return rows.map(r => Number(r.spot_price)).filter(p => Number.isFinite(p) && p > 0);
}

export async function getPreviousStrikes(before: string): Promise<ReadonlyMap<number, StrikeMetrics> | null> {
  const pool = getPool();
  const { rows } = await pool.query<{ strikes: unknown }>(
    `SELECT strikes FROM oi_engine.oi_snapshots
     WHERE captured_at < $1
     ORDER BY captured_at DESC
     LIMIT 1`,
    [before],
  );
  const row = rows[0];
  if (!row) return null;
  const parsed = strikesColumn.safeParse(row.strikes);
  return parsed.success ? strikeMap(parsed.data.map(toStrikeMetrics)) : null;
}

export async function deleteSnapshotsOlderThan(days: number): Promise<number> {
  const pool = getPool();
  const result = await pool.query(
    `DELETE FROM oi_engine.oi_snapshots WHERE captured_at < NOW() - make_interval(days => $1)`,
    [days],
  );
  return result.rowCount ?? 0;
}

export const pgSnapshotStore: SnapshotStore = {
  latestUnprocessed: getLatestUnprocessedSnapshot,
  recentSpotPrices: getRecentSpotPrices,
  previousStrikes: getPreviousStrikes,
};
