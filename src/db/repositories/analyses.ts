import { getPool } from '../client.js';
import type { PoolClient } from 'pg';
import type { Analysis } from '../../types/analysis.js';
import type { OiChangePair } from '../../types/market.js';
import type { AnalysisStore } from '../../pipeline/tick-pipeline.js';

export async function insertAnalysis(client: PoolClient, analysis: Analysis, snapshotId: string): Promise<void> {
  await client.query(
    `INSERT INTO oi_engine.analyses (
       id, snapshot_id, analyzed_at, spot_price, expiry, atm_strike,
       combined_score, verdict, signal_strength, confidence,
       call_oi_change, put_oi_change, pcr, max_pain, confirmation_status, payload
     ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16)`,
    [
      analysis.id,
      snapshotId,
      analysis.timestamp,
      analysis.spotPrice,
      analysis.expiry,
      analysis.atmStrike,
      analysis.combinedScore,
      analysis.verdict,
      analysis.signalStrength,
      analysis.confidence,
      Math.round(analysis.callOiChange),
      Math.round(analysis.putOiChange),
      analysis.pcr,
      analysis.maxPain,
      analysis.confirmationStatus,
      JSON.stringify(analysis),
    ],
  );
}

export async function getRecentOiChanges(before: string, limit: number): Promise<OiChangePair[]> {
  const pool = getPool();
  const { rows } = await pool.query<{ call_oi_change: string; put_oi_change: string }>(
    `SELECT call_oi_change, put_oi_change FROM (
       SELECT call_oi_change, put_oi_change, analyzed_at
       FROM oi_engine.analyses
       WHERE analyzed_at < $1
       ORDER BY analyzed_at DESC
       LIMIT $2
     ) recent
     ORDER BY analyzed_at ASC`,
    [before, limit],
  );
  return rows.map(r => ({ callOiChange: Number(r.call_oi_change), putOiChange: Number(r.put_oi_change) }));
}

export async function deleteAnalysesOlderThan(days: number): Promise<number> {
  const pool = getPool();
  const result = await pool.query(
    `DELETE FROM oi_engine.analyses WHERE analyzed_at < NOW() - make_interval(days => $1)`,
    [days],
  );
  return result.rowCount ?? 0;
}

export const pgAnalysisStore: AnalysisStore = {
  recentOiChanges: getRecentOiChanges,
};
