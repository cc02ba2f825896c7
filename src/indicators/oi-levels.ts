import { sortedStrikes } from '../types/market.js';
import type { StrikeMetrics } from '../types/market.js';
import type { OiCluster, OiClusters } from '../types/analysis.js';

const CLUSTER_PERCENTILE = 75;
const MAX_CLUSTERS = 5;

/**
 * Strike at which option writers pay out the least intrinsic value at expiry.
 * Brute-force over every strike; ties resolve to the lower strike.
 */
export function computeMaxPain(strikes: ReadonlyMap<number, StrikeMetrics>): number {
  const list = sortedStrikes(strikes);
  let best = 0;
  let bestPayout = Infinity;

  for (const expiry of list) {
    let payout = 0;
    for (const s of list) {
      const m = strikes.get(s);
      if (!m) continue;
      if (expiry > s) payout += m.ceOi * (expiry - s);
      if (expiry < s) payout += m.peOi * (s - expiry);
    }
    if (payout < bestPayout) {
      bestPayout = payout;
      best = expiry;
    }
  }
  return best;
}

/** Linear-interpolated percentile (0..100) of an unsorted list. */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (rank - lo);
}

/**
 * Resistance: strikes above spot whose call OI is in the top quartile of the chain.
 * Support: strikes below spot whose put OI is in the top quartile.
 */
export function findOiClusters(
  strikes: ReadonlyMap<number, StrikeMetrics>,
  spotPrice: number,
): OiClusters {
  const all = [...strikes.values()];
  const callCut = percentile(all.map(m => m.ceOi), CLUSTER_PERCENTILE);
  const putCut = percentile(all.map(m => m.peOi), CLUSTER_PERCENTILE);

  const byOiDesc = (a: OiCluster, b: OiCluster) => b.oi - a.oi || a.strike - b.strike;

  const resistance = all
    .filter(m => m.strike > spotPrice && m.ceOi > 0 && m.ceOi >= callCut)
    .map(m => ({ strike: m.strike, oi: m.ceOi }))
    .sort(byOiDesc)
    .slice(0, MAX_CLUSTERS);

  const support = all
    .filter(m => m.strike < spotPrice && m.peOi > 0 && m.peOi >= putCut)
    .map(m => ({ strike: m.strike, oi: m.peOi }))
    .sort(byOiDesc)
    .slice(0, MAX_CLUSTERS);

  return {
    resistance,
    support,
    strongestResistance: resistance[0]?.strike ?? null,
    strongestSupport: support[0]?.strike ?? null,
  };
}
