import { clamp } from './strength.js';
import type { StrikeMetrics } from '../types/market.js';
import type { PremiumMomentum } from '../types/analysis.js';

const SCORE_SCALE = 5;
const CONTRADICTION_SCORE = 10;
const CONTRADICTION_PREMIUM = 20;
const ADJUSTMENT_FACTOR = 0.3;

function pctChange(current: number, previous: number): number {
  if (previous <= 0 || current <= 0) return 0;
  return ((current - previous) / previous) * 100;
}

/**
 * ATM call vs put premium change since the previous snapshot.
 * A side with no usable price on either snapshot contributes 0%.
 */
export function computePremiumMomentum(
  current: StrikeMetrics | undefined,
  previous: StrikeMetrics | undefined,
  combinedScore: number,
): PremiumMomentum {
  if (!current || !previous) {
    return { callPctChange: 0, putPctChange: 0, premiumMomentumScore: 0, adjustment: 0 };
  }
  const callPctChange = pctChange(current.ceLtp, previous.ceLtp);
  const putPctChange = pctChange(current.peLtp, previous.peLtp);
  const premiumMomentumScore = clamp((callPctChange - putPctChange) * SCORE_SCALE, -100, 100);

  let adjustment = 0;
  if (combinedScore < -CONTRADICTION_SCORE && premiumMomentumScore > CONTRADICTION_PREMIUM) {
    adjustment = premiumMomentumScore * ADJUSTMENT_FACTOR;
  } else if (combinedScore > CONTRADICTION_SCORE && premiumMomentumScore < -CONTRADICTION_PREMIUM) {
    adjustment = premiumMomentumScore * ADJUSTMENT_FACTOR;
  }

  return { callPctChange, putPctChange, premiumMomentumScore, adjustment };
}
