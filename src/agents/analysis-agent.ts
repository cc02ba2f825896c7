import { v4 as uuidv4 } from 'uuid';
import { activeStrikes, partitionZones } from '../indicators/zones.js';
import { buildZone, oiScale, strikeForce } from '../indicators/force.js';
import { clamp, computeStrength, computeZoneScores, zoneAverage } from '../indicators/strength.js';
import {
  blendWithMomentum,
  computeMomentum,
  detectRegime,
  priceChangePct,
  priceDirection,
  priceWindow,
} from '../indicators/momentum.js';
import { computeOiAcceleration } from '../indicators/oi-acceleration.js';
import { computePremiumMomentum } from '../indicators/premium-momentum.js';
import { computeMaxPain, findOiClusters } from '../indicators/oi-levels.js';
import { computeIvSkew } from '../indicators/iv-skew.js';
import { confirmationStatus, detectTrap } from '../indicators/confirmation.js';
import { computeConfidence } from '../indicators/confidence.js';
import { classifyScore, scoreDirection } from '../indicators/verdict.js';
import type { VerdictThresholds } from '../indicators/verdict.js';
import type { MarketContext, Snapshot, StrikeMetrics } from '../types/market.js';
import type { Analysis, ZoneBreakdown, ZoneName } from '../types/analysis.js';

export interface EngineSettings {
  /** Strikes per side of ATM in each zone window */
  zoneWidth: number;
  /** Share of total OI (vs OI change) inside the force formula */
  totalOiWeight: number;
  /** Share of the below/above-spot scores vs the 4-zone net strength */
  legacyZoneWeight: number;
  verdictThresholds: VerdictThresholds;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  zoneWidth: 3,
  totalOiWeight: 0.15,
  legacyZoneWeight: 0.7,
  verdictThresholds: { strong: 40, moderate: 15 },
};

function pick(strikes: ReadonlyMap<number, StrikeMetrics>, list: number[]): StrikeMetrics[] {
  return list.flatMap(s => {
    const m = strikes.get(s);
    return m ? [m] : [];
  });
}

function finiteOr(value: number, fallback = 0): number {
  return Number.isFinite(value) ? value : fallback;
}

function ratio(num: number, den: number): number {
  return den > 0 ? num / den : 0;
}

/**
 * Tug-of-War engine: one snapshot plus its rolling context in, one Analysis out.
 * Returns null only when the chain has no strikes; every other degenerate
 * input resolves to neutral numbers.
 */
export function analyzeSnapshot(
  snapshot: Snapshot,
  context: MarketContext,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS,
): Analysis | null {
  const { strikes, spotPrice } = snapshot;
  const zones = partitionZones(spotPrice, strikes, settings.zoneWidth);
  if (!zones) return null;

  const belowMetrics = pick(strikes, zones.below);
  const aboveMetrics = pick(strikes, zones.above);
  const atm = strikes.get(zones.atmStrike);
  const active = pick(strikes, activeStrikes(zones));

  // ── Zone forces ─────────────────────────────────────────────────────────
  const w = settings.totalOiWeight;
  const scale = oiScale(active);
  const zoneMap: Record<ZoneName, ZoneBreakdown> = {
    OTM_PUT: buildZone('OTM_PUT', belowMetrics, 'PE', w, scale),
    ITM_CALL: buildZone('ITM_CALL', belowMetrics, 'CE', w, scale),
    OTM_CALL: buildZone('OTM_CALL', aboveMetrics, 'CE', w, scale),
    ITM_PUT: buildZone('ITM_PUT', aboveMetrics, 'PE', w, scale),
  };
  const atmNetForce = atm
    ? strikeForce(atm, 'PE', w, scale).force - strikeForce(atm, 'CE', w, scale).force
    : 0;

  const strength = computeStrength(zoneMap);
  const { belowSpotScore, aboveSpotScore } = computeZoneScores(
    zoneMap,
    atmNetForce,
    zones.atmStrike <= spotPrice,
  );
  const zoneAvg = finiteOr(zoneAverage(belowSpotScore, aboveSpotScore, strength.netStrength, settings.legacyZoneWeight));

  // ── Momentum & regime ───────────────────────────────────────────────────
  const window = priceWindow(context.priceHistory, spotPrice);
  const momentum = computeMomentum(window);
  const changePct = priceChangePct(window);
  const marketRegime = detectRegime(window, momentum);
  const blend = blendWithMomentum(zoneAvg, momentum, changePct);

  // ── OI acceleration ─────────────────────────────────────────────────────
  const callOiChange = active.reduce((a, m) => a + m.ceOiChange, 0);
  const putOiChange = active.reduce((a, m) => a + m.peOiChange, 0);
  const oiAcceleration = computeOiAcceleration({ callOiChange, putOiChange }, context.priorOiChanges, momentum);
  let combined = blend.combinedScore + oiAcceleration.adjustment;

  // ── Premium momentum ────────────────────────────────────────────────────
  const premiumMomentum = computePremiumMomentum(
    atm,
    context.previousStrikes?.get(zones.atmStrike),
    combined,
  );
  combined = clamp(finiteOr(combined + premiumMomentum.adjustment), -100, 100);

  const { verdict, strength: signalStrength } = classifyScore(combined, settings.verdictThresholds);

  // ── Levels & auxiliary signals ──────────────────────────────────────────
  const maxPain = computeMaxPain(strikes);
  const oiClusters = findOiClusters(strikes, spotPrice);
  const ivSkew = computeIvSkew(belowMetrics, aboveMetrics);
  const priceDir = priceDirection(changePct);
  const status = confirmationStatus(combined, priceDir);
  const trapWarning = detectTrap(combined, priceDir, oiClusters, spotPrice);

  const totalCallOi = active.reduce((a, m) => a + m.ceOi, 0);
  const totalPutOi = active.reduce((a, m) => a + m.peOi, 0);
  let callVolume = 0;
  let putVolume = 0;
  for (const m of strikes.values()) {
    callVolume += m.ceVolume;
    putVolume += m.peVolume;
  }
  const volumePcr = ratio(putVolume, callVolume);

  const confidenceBreakdown = computeConfidence({
    combinedScore: combined,
    ivSkewDirection: ivSkew.direction,
    volumePcr,
    spotPrice,
    maxPain,
    confirmationStatus: status,
    volatilityIndex: context.volatilityIndex,
    futuresOiChange: context.futuresOiChange,
    priceChangePct: changePct,
  });

  return {
    id: uuidv4(),
    timestamp: snapshot.timestamp,
    spotPrice,
    expiry: snapshot.expiry,
    atmStrike: zones.atmStrike,
    zones: zoneMap,
    belowSpotScore,
    aboveSpotScore,
    strength,
    zoneAverage: zoneAvg,
    momentum,
    priceChangePct: changePct,
    divergence: blend.divergence,
    weights: { zone: blend.zoneWeight, momentum: blend.momentumWeight },
    callOiChange,
    putOiChange,
    totalCallOi,
    totalPutOi,
    pcr: ratio(totalPutOi, totalCallOi),
    volumePcr,
    marketRegime,
    oiAcceleration,
    premiumMomentum,
    ivSkew,
    maxPain,
    oiClusters,
    confirmationStatus: status,
    trapWarning,
    combinedScore: combined,
    verdict,
    signalStrength,
    direction: scoreDirection(combined),
    confidence: confidenceBreakdown.total,
    confidenceBreakdown,
  };
}

/** Holds engine settings so callers don't thread them through every tick. */
export class AnalysisAgent {
  constructor(private readonly settings: EngineSettings = DEFAULT_ENGINE_SETTINGS) {}

  run(snapshot: Snapshot, context: MarketContext): Analysis | null {
    const analysis = analyzeSnapshot(snapshot, context, this.settings);
    if (!analysis) {
      console.warn(`[Engine] ${snapshot.timestamp}: no strikes in snapshot, skipping`);
      return null;
    }
    console.log(
      `[Engine] ${analysis.timestamp} spot=${analysis.spotPrice.toFixed(2)} atm=${analysis.atmStrike} ` +
      `score=${analysis.combinedScore.toFixed(1)} → ${analysis.verdict} ` +
      `(confidence ${analysis.confidence.toFixed(0)}, ${analysis.marketRegime.regime}, ${analysis.confirmationStatus})`,
    );
    return analysis;
  }
}
