import { strikeMap } from '../types/market.js';
import type { MarketContext, Snapshot, StrikeMetrics } from '../types/market.js';
import type { Analysis, ZoneBreakdown, ZoneName } from '../types/analysis.js';
import type { Learner, LearnerDecision, VerdictSkipDecision, ConfidenceThresholds } from '../types/learner.js';
import type { TradeSetup, TradeSetupProposal } from '../types/trade.js';

/** Exchange-local (Asia/Kolkata, UTC+05:30) wall clock on a Monday → ISO UTC. */
export function ist(hhmm: string, date = '2026-10-19'): string {
  return new Date(`${date}T${hhmm}:00+05:30`).toISOString();
}

export const EMPTY_CONTEXT: MarketContext = {
  priceHistory: [],
  priorOiChanges: [],
  previousStrikes: null,
  volatilityIndex: null,
  futuresOiChange: null,
};

export function strike(value: number, fields: Partial<StrikeMetrics> = {}): StrikeMetrics {
  return {
    strike: value,
    ceOi: 0,
    ceOiChange: 0,
    ceVolume: 0,
    ceIv: 0,
    ceLtp: 0,
    peOi: 0,
    peOiChange: 0,
    peVolume: 0,
    peIv: 0,
    peLtp: 0,
    ...fields,
  };
}

export function snapshot(spotPrice: number, strikes: StrikeMetrics[], timestamp = ist('10:00')): Snapshot {
  return { timestamp, spotPrice, expiry: '2026-10-22', strikes: strikeMap(strikes) };
}

function emptyZone(zone: ZoneName): ZoneBreakdown {
  return { zone, strikes: [], totalOi: 0, totalOiChange: 0, force: 0 };
}

/**
 * A bullish analysis that clears every creation gate: CONFIRMED, trending up,
 * premium momentum and IV skew both aligned, confidence 65.
 */
export function analysis(overrides: Partial<Analysis> = {}): Analysis {
  return {
    id: 'analysis-1',
    timestamp: ist('10:00'),
    spotPrice: 24000,
    expiry: '2026-10-22',
    atmStrike: 24000,
    zones: {
      OTM_PUT: emptyZone('OTM_PUT'),
      ITM_CALL: emptyZone('ITM_CALL'),
      OTM_CALL: emptyZone('OTM_CALL'),
      ITM_PUT: emptyZone('ITM_PUT'),
    },
    belowSpotScore: 60,
    aboveSpotScore: 20,
    strength: { putStrengthScore: 40, callStrengthScore: 10, netStrength: 30, direction: 'bullish' },
    zoneAverage: 37,
    momentum: 30,
    priceChangePct: 1.5,
    divergence: false,
    weights: { zone: 0.8, momentum: 0.2 },
    callOiChange: 150_000,
    putOiChange: 350_000,
    totalCallOi: 2_000_000,
    totalPutOi: 2_400_000,
    pcr: 1.2,
    volumePcr: 1,
    marketRegime: { regime: 'trending_up', momentum: 30, rangePct: 1.5, oiChangeWeight: 0.3, totalOiWeight: 0.7 },
    oiAcceleration: { phase: 'neutral', callAcceleration: 0, putAcceleration: 0, netAcceleration: 0, adjustment: 0 },
    premiumMomentum: { callPctChange: 4, putPctChange: 1, premiumMomentumScore: 15, adjustment: 0 },
    ivSkew: { otmPutIv: 12, otmCallIv: 14, skew: -2, skewScore: -10, direction: 'bullish' },
    maxPain: 24100,
    oiClusters: { resistance: [], support: [], strongestResistance: 24200, strongestSupport: 23800 },
    confirmationStatus: 'CONFIRMED',
    trapWarning: null,
    combinedScore: 35,
    verdict: 'Bulls Winning',
    signalStrength: 'moderate',
    direction: 'bullish',
    confidence: 65,
    confidenceBreakdown: {
      base: 50,
      scoreBucket: 15,
      ivSkew: 15,
      volumePcr: 0,
      maxPainProximity: 5,
      confirmation: 15,
      volatilityIndex: 0,
      futuresOi: -35,
      total: 65,
    },
    ...overrides,
  };
}

export function bearishAnalysis(overrides: Partial<Analysis> = {}): Analysis {
  return analysis({
    combinedScore: -35,
    verdict: 'Bears Winning',
    direction: 'bearish',
    marketRegime: { regime: 'trending_down', momentum: -30, rangePct: 1.5, oiChangeWeight: 0.3, totalOiWeight: 0.7 },
    premiumMomentum: { callPctChange: 1, putPctChange: 4, premiumMomentumScore: -15, adjustment: 0 },
    ivSkew: { otmPutIv: 14, otmCallIv: 12, skew: 2, skewScore: 10, direction: 'bearish' },
    ...overrides,
  });
}

export function proposal(overrides: Partial<TradeSetupProposal> = {}): TradeSetupProposal {
  return {
    direction: 'BUY_CALL',
    strike: 23950,
    optionType: 'CE',
    moneyness: 'ITM',
    entryPremium: 100,
    slPremium: 80,
    target1Premium: 120,
    target2Premium: 140,
    riskPct: 20,
    ivAtStrike: 16,
    ...overrides,
  };
}

export function setup(overrides: Partial<TradeSetup> = {}): TradeSetup {
  return {
    ...proposal(),
    id: 'setup-1',
    analysisId: 'analysis-0',
    status: 'PENDING',
    createdAt: ist('09:45'),
    context: {
      spotAtCreation: 24000,
      verdictAtCreation: 'Bulls Winning',
      confidence: 65,
      ivAtCreation: 16,
      expiry: '2026-10-22',
      callOiChange: 150_000,
      putOiChange: 350_000,
      pcr: 1.2,
      maxPain: 24100,
      support: 23800,
      resistance: 24200,
    },
    qualityScore: 7,
    reasoning: 'test setup',
    activatedAt: null,
    activationPremium: null,
    resolvedAt: null,
    exitPremium: null,
    hitSl: null,
    hitTarget: null,
    profitLossPct: null,
    profitLossPoints: null,
    maxPremiumReached: null,
    minPremiumReached: null,
    lastCheckedAt: null,
    lastPremium: null,
    resolutionReason: null,
    ...overrides,
  };
}

/** Snapshot quoting one call premium at the default setup strike. */
export function premiumSnapshot(premium: number, timestamp: string, optionType: 'CE' | 'PE' = 'CE'): Snapshot {
  const fields = optionType === 'CE' ? { ceLtp: premium } : { peLtp: premium };
  return snapshot(24000, [strike(23950, fields), strike(24000), strike(24050)], timestamp);
}

export class FakeLearner implements Learner {
  paused = false;
  skip: string[] = [];
  thresholds: ConfidenceThresholds = {
    min: 50,
    max: 100,
    excludeRanges: [{ min: 70, max: 75 }, { min: 90, max: 95 }],
  };

  shouldTrade(): LearnerDecision {
    return this.paused ? { allowed: false, reason: 'paused' } : { allowed: true, reason: 'ok' };
  }

  getConfidenceThresholds(): ConfidenceThresholds {
    return this.thresholds;
  }

  shouldSkipVerdict(verdict: string): VerdictSkipDecision {
    return this.skip.includes(verdict) ? { skip: true, reason: 'skipped' } : { skip: false, reason: 'ok' };
  }
}
