import { clamp } from './strength.js';
import type { StrikeMetrics } from '../types/market.js';
import type { IvSkew, SignalDirection } from '../types/analysis.js';

const SKEW_SCALE = 5;
const SKEW_THRESHOLD = 5;

function averageIv(values: number[]): number {
  const usable = values.filter(v => v > 0);
  return usable.length === 0 ? 0 : usable.reduce((a, b) => a + b, 0) / usable.length;
}

/**
 * OTM put IV minus OTM call IV. Cheap puts relative to calls (negative skew)
 * read bullish; expensive puts read bearish. Unknown IV on either side
 * leaves the skew neutral.
 */
export function computeIvSkew(otmPuts: StrikeMetrics[], otmCalls: StrikeMetrics[]): IvSkew {
  const otmPutIv = averageIv(otmPuts.map(m => m.peIv));
  const otmCallIv = averageIv(otmCalls.map(m => m.ceIv));
  if (otmPutIv === 0 || otmCallIv === 0) {
    return { otmPutIv, otmCallIv, skew: 0, skewScore: 0, direction: 'neutral' };
  }

  const skew = otmPutIv - otmCallIv;
  const skewScore = clamp(skew * SKEW_SCALE, -100, 100);
  let direction: SignalDirection = 'neutral';
  if (skewScore < -SKEW_THRESHOLD) direction = 'bullish';
  else if (skewScore > SKEW_THRESHOLD) direction = 'bearish';

  return { otmPutIv, otmCallIv, skew, skewScore, direction };
}
