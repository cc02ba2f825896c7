import { clamp } from './strength.js';
import type { MarketRegime, SignalDirection } from '../types/analysis.js';

const MOMENTUM_SCALE = 20;
const NEAR_EXTREME_PCT = 0.1;
const TREND_MOMENTUM = 25;
const MIN_RANGE_PCT = 0.2;
const PRICE_MOVE_PCT = 0.05;

/** Price window including the current spot as its newest element. */
export function priceWindow(history: number[], spotPrice: number): number[] {
  return [...history.filter(p => p > 0 && Number.isFinite(p)), spotPrice];
}

/** ((latest − oldest) / oldest) × 100 × 20, clamped to ±100. */
export function computeMomentum(window: number[]): number {
  if (window.length < 2) return 0;
  const oldest = window[0] ?? 0;
  const latest = window[window.length - 1] ?? 0;
  if (oldest <= 0) return 0;
  return clamp(((latest - oldest) / oldest) * 100 * MOMENTUM_SCALE, -100, 100);
}

export function priceChangePct(window: number[]): number {
  if (window.length < 2) return 0;
  const oldest = window[0] ?? 0;
  const latest = window[window.length - 1] ?? 0;
  if (oldest <= 0) return 0;
  return ((latest - oldest) / oldest) * 100;
}

export function priceDirection(changePct: number): SignalDirection {
  if (changePct > PRICE_MOVE_PCT) return 'bullish';
  if (changePct < -PRICE_MOVE_PCT) return 'bearish';
  return 'neutral';
}

/**
 * Trending when price sits within 0.1% of the window's high (low), momentum
 * exceeds ±25 and the window spans more than 0.2% of price.
 */
export function detectRegime(window: number[], momentum: number): MarketRegime {
  const price = window[window.length - 1] ?? 0;
  const high = window.length > 0 ? Math.max(...window) : 0;
  const low = window.length > 0 ? Math.min(...window) : 0;
  const rangePct = price > 0 ? ((high - low) / price) * 100 : 0;

  let regime: MarketRegime['regime'] = 'range_bound';
  if (price > 0 && rangePct > MIN_RANGE_PCT) {
    const fromHigh = ((high - price) / price) * 100;
    const fromLow = ((price - low) / price) * 100;
    if (fromHigh <= NEAR_EXTREME_PCT && momentum > TREND_MOMENTUM) regime = 'trending_up';
    else if (fromLow <= NEAR_EXTREME_PCT && momentum < -TREND_MOMENTUM) regime = 'trending_down';
  }

  const trending = regime !== 'range_bound';
  return {
    regime,
    momentum,
    rangePct,
    oiChangeWeight: trending ? 0.3 : 0.7,
    totalOiWeight: trending ? 0.7 : 0.3,
  };
}

export interface ScoreBlend {
  divergence: boolean;
  zoneWeight: number;
  momentumWeight: number;
  combinedScore: number;
}

/**
 * Blend zone average with momentum. When OI and price disagree momentum gets
 * 0.45 of the weight, otherwise 0.20; with no momentum the zone average stands.
 */
export function blendWithMomentum(zoneAvg: number, momentum: number, changePct: number): ScoreBlend {
  const oiDir = Math.sign(zoneAvg);
  const priceDir = priceDirection(changePct);
  const priceSign = priceDir === 'bullish' ? 1 : priceDir === 'bearish' ? -1 : 0;
  const divergence = oiDir !== 0 && priceSign !== 0 && oiDir !== priceSign;

  if (momentum === 0) {
    return { divergence, zoneWeight: 1, momentumWeight: 0, combinedScore: zoneAvg };
  }
  const momentumWeight = divergence ? 0.45 : 0.2;
  const zoneWeight = divergence ? 0.55 : 0.8;
  return {
    divergence,
    zoneWeight,
    momentumWeight,
    combinedScore: zoneWeight * zoneAvg + momentumWeight * momentum,
  };
}
