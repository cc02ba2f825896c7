import { scoreDirection } from './verdict.js';
import type { ConfirmationStatus, OiClusters, SignalDirection, TrapWarning } from '../types/analysis.js';

const STRONG_SCORE = 40;
const TRAP_DISTANCE_PCT = 1;

/**
 * OI-vs-price agreement. A strong OI reading against the price move is a
 * reversal alert; a weaker one is a plain conflict.
 */
export function confirmationStatus(combinedScore: number, priceDir: SignalDirection): ConfirmationStatus {
  const oiDir = scoreDirection(combinedScore);
  if (oiDir === 'neutral' || priceDir === 'neutral') return 'NEUTRAL';
  if (oiDir === priceDir) return 'CONFIRMED';
  return Math.abs(combinedScore) >= STRONG_SCORE ? 'REVERSAL_ALERT' : 'CONFLICT';
}

export function detectTrap(
  combinedScore: number,
  priceDir: SignalDirection,
  clusters: OiClusters,
  spotPrice: number,
): TrapWarning | null {
  if (spotPrice <= 0) return null;

  if (priceDir === 'bullish' && combinedScore <= -STRONG_SCORE) {
    const near = clusters.resistance
      .map(c => c.strike)
      .filter(s => s > spotPrice && ((s - spotPrice) / spotPrice) * 100 <= TRAP_DISTANCE_PCT)
      .sort((a, b) => a - b)[0];
    if (near !== undefined) {
      const distancePct = ((near - spotPrice) / spotPrice) * 100;
      return {
        type: 'BULL_TRAP',
        level: near,
        distancePct,
        message: `Price rising into call wall at ${near} (${distancePct.toFixed(2)}% away) while OI is strongly bearish`,
      };
    }
  }

  if (priceDir === 'bearish' && combinedScore >= STRONG_SCORE) {
    const near = clusters.support
      .map(c => c.strike)
      .filter(s => s < spotPrice && ((spotPrice - s) / spotPrice) * 100 <= TRAP_DISTANCE_PCT)
      .sort((a, b) => b - a)[0];
    if (near !== undefined) {
      const distancePct = ((spotPrice - near) / spotPrice) * 100;
      return {
        type: 'BEAR_TRAP',
        level: near,
        distancePct,
        message: `Price falling onto put wall at ${near} (${distancePct.toFixed(2)}% away) while OI is strongly bullish`,
      };
    }
  }

  return null;
}
