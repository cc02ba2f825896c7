export type Verdict =
  | 'Bulls Strongly Winning'
  | 'Bulls Winning'
  | 'Slightly Bullish'
  | 'Neutral'
  | 'Slightly Bearish'
  | 'Bears Winning'
  | 'Bears Strongly Winning';

export type Strength = 'strong' | 'moderate' | 'weak' | 'none';

export type SignalDirection = 'bullish' | 'bearish' | 'neutral';

export type ZoneName = 'OTM_PUT' | 'ITM_CALL' | 'OTM_CALL' | 'ITM_PUT';

export type MarketRegimeName = 'trending_up' | 'trending_down' | 'range_bound';

export type ConfirmationStatus = 'CONFIRMED' | 'REVERSAL_ALERT' | 'CONFLICT' | 'NEUTRAL';

export type OiAccelerationPhase =
  | 'short_covering'
  | 'profit_booking'
  | 'unwinding'
  | 'accumulation'
  | 'distribution'
  | 'neutral';

export interface StrikeForce {
  strike: number;
  oi: number;
  oiChange: number;
  volume: number;
  conviction: number;
  force: number;
}

export interface ZoneBreakdown {
  zone: ZoneName;
  strikes: StrikeForce[];
  totalOi: number;
  totalOiChange: number;
  force: number;
}

export interface StrengthScores {
  putStrengthScore: number;
  callStrengthScore: number;
  netStrength: number;
  direction: SignalDirection;
}

export interface MarketRegime {
  regime: MarketRegimeName;
  momentum: number;
  rangePct: number;
  /** Blend of OI change vs total OI appropriate to the regime */
  oiChangeWeight: number;
  totalOiWeight: number;
}

export interface OiAcceleration {
  phase: OiAccelerationPhase;
  callAcceleration: number;
  putAcceleration: number;
  netAcceleration: number;
  adjustment: number;
}

export interface PremiumMomentum {
  callPctChange: number;
  putPctChange: number;
  premiumMomentumScore: number;
  adjustment: number;
}

export interface IvSkew {
  otmPutIv: number;
  otmCallIv: number;
  skew: number;
  skewScore: number;
  direction: SignalDirection;
}

export interface OiCluster {
  strike: number;
  oi: number;
}

export interface OiClusters {
  resistance: OiCluster[];
  support: OiCluster[];
  strongestResistance: number | null;
  strongestSupport: number | null;
}

export type TrapType = 'BULL_TRAP' | 'BEAR_TRAP';

export interface TrapWarning {
  type: TrapType;
  level: number;
  distancePct: number;
  message: string;
}

export interface ConfidenceBreakdown {
  base: number;
  scoreBucket: number;
  ivSkew: number;
  volumePcr: number;
  maxPainProximity: number;
  confirmation: number;
  volatilityIndex: number;
  futuresOi: number;
  total: number;            // clamped 0..100
}

/** Engine output for one snapshot. Never mutated once built. */
export interface Analysis {
  id: string;
  timestamp: string;
  spotPrice: number;
  expiry: string;
  atmStrike: number;

  zones: Record<ZoneName, ZoneBreakdown>;
  belowSpotScore: number;
  aboveSpotScore: number;
  strength: StrengthScores;
  zoneAverage: number;
  momentum: number;
  priceChangePct: number;
  divergence: boolean;
  weights: { zone: number; momentum: number };

  callOiChange: number;
  putOiChange: number;
  totalCallOi: number;
  totalPutOi: number;
  pcr: number;
  volumePcr: number;

  marketRegime: MarketRegime;
  oiAcceleration: OiAcceleration;
  premiumMomentum: PremiumMomentum;
  ivSkew: IvSkew;
  maxPain: number;
  oiClusters: OiClusters;
  confirmationStatus: ConfirmationStatus;
  trapWarning: TrapWarning | null;

  combinedScore: number;
  verdict: Verdict;
  signalStrength: Strength;
  direction: SignalDirection;
  confidence: number;
  confidenceBreakdown: ConfidenceBreakdown;
}
