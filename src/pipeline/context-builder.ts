import type { MarketContext, OiChangePair, StrikeMetrics } from '../types/market.js';

export interface SnapshotHistory {
  /** Spot prices captured strictly before `before`, oldest first */
  recentSpotPrices(before: string, limit: number): Promise<number[]>;
  /** Strike map of the snapshot immediately before `before` */
  previousStrikes(before: string): Promise<ReadonlyMap<number, StrikeMetrics> | null>;
}

export interface OiChangeHistory {
  /** (call, put) OI-change totals of analyses before `before`, oldest first */
  recentOiChanges(before: string, limit: number): Promise<OiChangePair[]>;
}

export interface ContextOptions {
  before: string;
  priceHistoryLength: number;
  oiHistoryLength: number;
  volatilityIndex: number | null;
  futuresOiChange: number | null;
}

/**
 * Assemble the rolling context the engine needs for one tick. The three
 * lookups are independent and run concurrently.
 */
export async function buildMarketContext(
  snapshots: SnapshotHistory,
  analyses: OiChangeHistory,
  opts: ContextOptions,
): Promise<MarketContext> {
  const [priceHistory, previousStrikes, priorOiChanges] = await Promise.all([
    snapshots.recentSpotPrices(opts.before, opts.priceHistoryLength),
    snapshots.previousStrikes(opts.before),
    analyses.recentOiChanges(opts.before, opts.oiHistoryLength),
  ]);

  return {
    priceHistory: priceHistory.filter(p => Number.isFinite(p) && p > 0),
    priorOiChanges,
    previousStrikes,
    volatilityIndex: opts.volatilityIndex,
    futuresOiChange: opts.futuresOiChange,
  };
}
