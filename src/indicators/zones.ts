import { sortedStrikes } from '../types/market.js';
import type { StrikeMetrics } from '../types/market.js';

export interface StrikeZones {
  atmStrike: number;
  /** Strikes below ATM, ascending. Put side = OTM_PUT, call side = ITM_CALL. */
  below: number[];
  /** Strikes above ATM, ascending. Call side = OTM_CALL, put side = ITM_PUT. */
  above: number[];
}

/** Strike closest to spot; on a tie the lower strike wins. Returns 0 for an empty chain. */
export function findAtmStrike(spotPrice: number, strikes: number[]): number {
  let best = 0;
  let bestDist = Infinity;
  for (const s of strikes) {
    const d = Math.abs(s - spotPrice);
    if (d < bestDist || (d === bestDist && s < best)) {
      best = s;
      bestDist = d;
    }
  }
  return best;
}

/**
 * Split the chain into the `width`-strike windows immediately below and
 * above the ATM strike.
 */
export function partitionZones(
  spotPrice: number,
  strikes: ReadonlyMap<number, StrikeMetrics>,
  width = 3,
): StrikeZones | null {
  const sorted = sortedStrikes(strikes);
  if (sorted.length === 0) return null;

  const atmStrike = findAtmStrike(spotPrice, sorted);
  const atmIdx = sorted.indexOf(atmStrike);
  const n = Math.max(0, Math.floor(width));

  return {
    atmStrike,
    below: sorted.slice(Math.max(0, atmIdx - n), atmIdx),
    above: sorted.slice(atmIdx + 1, atmIdx + 1 + n),
  };
}

/** ATM plus both windows: the strikes every zone aggregate is computed over. */
export function activeStrikes(zones: StrikeZones): number[] {
  return [...zones.below, zones.atmStrike, ...zones.above];
}
