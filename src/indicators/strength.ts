import type { SignalDirection, StrengthScores, ZoneBreakdown, ZoneName } from '../types/analysis.js';

export const NET_STRENGTH_THRESHOLD = 15;

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(max, Math.max(min, value));
}

/**
 * (numerator / denominator − 1) × 50, clamped to ±100.
 * A non-positive denominator has no ratio: a positive numerator then counts
 * as full strength, anything else as none.
 */
export function ratioScore(numerator: number, denominator: number): number {
  if (denominator <= 0) return numerator > 0 ? 100 : 0;
  return clamp((numerator / denominator - 1) * 50, -100, 100);
}

export function computeStrength(zones: Record<ZoneName, ZoneBreakdown>): StrengthScores {
  const otmPut = zones.OTM_PUT.force;
  const itmCall = zones.ITM_CALL.force;
  const otmCall = zones.OTM_CALL.force;
  const itmPut = zones.ITM_PUT.force;

  const putStrengthScore = ratioScore(otmPut, itmCall + otmCall);
  const callStrengthScore = ratioScore(otmCall, itmPut + otmPut);
  const netStrength = putStrengthScore - callStrengthScore;

  let direction: SignalDirection = 'neutral';
  if (netStrength > NET_STRENGTH_THRESHOLD) direction = 'bullish';
  else if (netStrength < -NET_STRENGTH_THRESHOLD) direction = 'bearish';

  return { putStrengthScore, callStrengthScore, netStrength, direction };
}

/**
 * Below-spot and above-spot net force (put writing minus call writing),
 * each normalised by the larger magnitude of the two and scaled to ±100.
 * `atmNetForce` is added to whichever side of spot the ATM strike sits on.
 */
export function computeZoneScores(
  zones: Record<ZoneName, ZoneBreakdown>,
  atmNetForce: number,
  atmBelowSpot: boolean,
): { belowSpotScore: number; aboveSpotScore: number } {
  let below = zones.OTM_PUT.force - zones.ITM_CALL.force;
  let above = zones.ITM_PUT.force - zones.OTM_CALL.force;
  if (atmBelowSpot) below += atmNetForce;
  else above += atmNetForce;

  const norm = Math.max(Math.abs(below), Math.abs(above));
  if (!(norm > 0) || !Number.isFinite(norm)) {
    return { belowSpotScore: 0, aboveSpotScore: 0 };
  }
  return {
    belowSpotScore: (below / norm) * 100,
    aboveSpotScore: (above / norm) * 100,
  };
}

/** 0.7 × mean(zone scores) + 0.3 × net strength; the legacy weight is tunable. */
export function zoneAverage(
  belowSpotScore: number,
  aboveSpotScore: number,
  netStrength: number,
  legacyWeight = 0.7,
): number {
  return legacyWeight * ((belowSpotScore + aboveSpotScore) / 2) + (1 - legacyWeight) * netStrength;
}
