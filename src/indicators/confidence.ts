import { clamp } from './strength.js';
import { scoreDirection } from './verdict.js';
import type { ConfidenceBreakdown, ConfirmationStatus, SignalDirection } from '../types/analysis.js';

export interface ConfidenceInputs {
  combinedScore: number;
  ivSkewDirection: SignalDirection;
  volumePcr: number;            // put volume / call volume; 0 when unknown
  spotPrice: number;
  maxPain: number;
  confirmationStatus: ConfirmationStatus;
  volatilityIndex: number | null;
  futuresOiChange: number | null;
  priceChangePct: number;
}

const BASE = 50;

function scoreBucket(absScore: number): number {
  if (absScore >= 40) return 25;
  if (absScore >= 25) return 15;
  if (absScore >= 10) return 5;
  return -10;
}

function ivSkewPoints(signal: SignalDirection, skew: SignalDirection): number {
  if (signal === 'neutral' || skew === 'neutral') return 0;
  return skew === signal ? 15 : -15;
}

/**
 * Heavy put volume reads bearish, heavy call volume bullish.
 * Strong alignment ±10, mild ±5, the band around 1.0 scores nothing.
 */
function volumePcrPoints(signal: SignalDirection, pcr: number): number {
  if (signal === 'neutral' || !(pcr > 0) || !Number.isFinite(pcr)) return 0;
  let bias = 0;
  if (pcr < 0.7) bias = 10;
  else if (pcr < 0.9) bias = 5;
  else if (pcr > 1.3) bias = -10;
  else if (pcr > 1.1) bias = -5;
  return signal === 'bullish' ? bias : -bias;
}

function maxPainPoints(spotPrice: number, maxPain: number): number {
  if (spotPrice <= 0 || maxPain <= 0) return 0;
  const distPct = (Math.abs(spotPrice - maxPain) / spotPrice) * 100;
  if (distPct < 0.5) return 10;
  if (distPct < 1) return 5;
  if (distPct > 2) return -5;
  return 0;
}

const CONFIRMATION_POINTS: Record<ConfirmationStatus, number> = {
  CONFIRMED: 15,
  REVERSAL_ALERT: 10,
  CONFLICT: -15,
  NEUTRAL: 0,
};

function volatilityPoints(vix: number | null): number {
  if (vix === null || !(vix > 0)) return 0;
  if (vix > 25) return -20;
  if (vix > 20) return -10;
  if (vix < 12) return 5;
  return 0;
}

/**
 * Futures OI building with price = fresh positioning in that direction.
 * Buildup agreeing +15, buildup opposing −15, unwinding opposing −10.
 */
function futuresPoints(signal: SignalDirection, oiChange: number | null, priceChangePct: number): number {
  if (signal === 'neutral' || oiChange === null || oiChange === 0 || priceChangePct === 0) return 0;
  const priceDir: SignalDirection = priceChangePct > 0 ? 'bullish' : 'bearish';
  if (oiChange > 0) return priceDir === signal ? 15 : -15;
  // OI falling: short covering on a rise, long unwinding on a fall
  return priceDir === signal ? 0 : -10;
}

/** 0..100 trust score for the verdict, starting at 50. */
export function computeConfidence(inputs: ConfidenceInputs): ConfidenceBreakdown {
  const signal = scoreDirection(inputs.combinedScore);
  const parts = {
    base: BASE,
    scoreBucket: scoreBucket(Math.abs(inputs.combinedScore)),
    ivSkew: ivSkewPoints(signal, inputs.ivSkewDirection),
    volumePcr: volumePcrPoints(signal, inputs.volumePcr),
    maxPainProximity: maxPainPoints(inputs.spotPrice, inputs.maxPain),
    confirmation: CONFIRMATION_POINTS[inputs.confirmationStatus],
    volatilityIndex: volatilityPoints(inputs.volatilityIndex),
    futuresOi: futuresPoints(signal, inputs.futuresOiChange, inputs.priceChangePct),
  };
  const raw = Object.values(parts).reduce((a, b) => a + b, 0);
  return { ...parts, total: clamp(raw, 0, 100) };
}
