/**
 * Retention cleanup and end-of-day summary.
 *
 * Snapshots and analyses older than the retention window are deleted
 * (analyses first; they reference snapshots). Trade setups are kept for
 * statistics.
 */

import { deleteAnalysesOlderThan } from '../db/repositories/analyses.js';
import { deleteSnapshotsOlderThan } from '../db/repositories/snapshots.js';
import { getTradeSetupsForDate } from '../db/repositories/trade-setups.js';
import { computeSetupStats } from '../agents/setup-stats.js';
import { localDate } from '../lib/market-clock.js';
import { notifyAlert, notifyDailySummary } from '../telegram/notifier.js';

export interface CleanupResult {
  success: boolean;
  deletedRows: Record<string, number>;
  error?: string;
}

export async function runRetentionCleanup(retentionDays: number): Promise<CleanupResult> {
  console.log(`[DailyCleanup] Purging rows older than ${retentionDays} day(s)`);
  try {
    const analyses = await deleteAnalysesOlderThan(retentionDays);
    const snapshots = await deleteSnapshotsOlderThan(retentionDays);
    console.log(`[DailyCleanup] Done, analyses: ${analyses}, snapshots: ${snapshots}`);
    return { success: true, deletedRows: { analyses, snapshots } };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.error('[DailyCleanup] Failed:', error);
    await notifyAlert(`Retention cleanup failed: ${error}`);
    return { success: false, deletedRows: {}, error };
  }
}

export async function sendDailySummary(timeZone: string, now: Date = new Date()): Promise<void> {
  const date = localDate(now, timeZone);
  const setups = await getTradeSetupsForDate(date, timeZone);
  const stats = computeSetupStats(setups);
  console.log(
    `[DailyCleanup] Summary ${date}: ${stats.total} setups, win rate ${stats.winRate}%, P&L ${stats.totalPnlPct}%`,
  );
  await notifyDailySummary(date, stats);
}
