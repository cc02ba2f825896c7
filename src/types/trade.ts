import type { OptionType } from './market.js';
import type { Verdict } from './analysis.js';

export type TradeDirection = 'BUY_CALL' | 'BUY_PUT';
export type Moneyness = 'ITM' | 'ATM' | 'OTM';

export type SetupStatus = 'PENDING' | 'ACTIVE' | 'WON' | 'LOST' | 'CANCELLED' | 'EXPIRED';

export const TERMINAL_STATUSES: readonly SetupStatus[] = ['WON', 'LOST', 'CANCELLED', 'EXPIRED'];

export function isTerminal(status: SetupStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Output of the setup builder, before the lifecycle manager accepts it. */
export interface TradeSetupProposal {
  direction: TradeDirection;
  strike: number;
  optionType: OptionType;
  moneyness: Moneyness;
  entryPremium: number;
  slPremium: number;
  target1Premium: number;
  target2Premium: number;
  riskPct: number;
  ivAtStrike: number;
}

export interface SetupContext {
  spotAtCreation: number;
  verdictAtCreation: Verdict;
  confidence: number;
  ivAtCreation: number;
  expiry: string;
  callOiChange: number;
  putOiChange: number;
  pcr: number;
  maxPain: number;
  support: number | null;
  resistance: number | null;
}

export interface TradeSetup extends TradeSetupProposal {
  id: string;
  analysisId: string;
  status: SetupStatus;
  createdAt: string;
  context: SetupContext;
  qualityScore: number;
  reasoning: string;

  activatedAt: string | null;
  activationPremium: number | null;
  resolvedAt: string | null;
  exitPremium: number | null;
  hitSl: boolean | null;
  hitTarget: boolean | null;
  profitLossPct: number | null;
  profitLossPoints: number | null;
  maxPremiumReached: number | null;
  minPremiumReached: number | null;
  lastCheckedAt: string | null;
  lastPremium: number | null;
  resolutionReason: string | null;
}

export type SetupEvent =
  | { kind: 'SETUP_CREATED'; setup: TradeSetup }
  | { kind: 'SETUP_ACTIVATED'; setup: TradeSetup }
  | { kind: 'SETUP_RESOLVED'; setup: TradeSetup; previousStatus: SetupStatus };

export interface SetupStats {
  total: number;
  byStatus: Record<SetupStatus, number>;
  resolved: number;
  winRate: number;          // 0..100 over WON+LOST
  avgWinPct: number;
  avgLossPct: number;
  totalPnlPct: number;
}

export interface LiveSetupView {
  setup: TradeSetup;
  currentPremium: number;
  livePnlPct: number;
  livePnlPoints: number;
}

/**
 * Cross-tick facts the creation gates need. Owned by persistence and passed
 * in by value each tick.
 */
export interface LifecycleState {
  lastSuggestedDirection: TradeDirection | null;
  lastSuggestedAt: string | null;
  lastCancelledAt: string | null;
  lastResolvedAt: string | null;
}

export const INITIAL_LIFECYCLE_STATE: LifecycleState = {
  lastSuggestedDirection: null,
  lastSuggestedAt: null,
  lastCancelledAt: null,
  lastResolvedAt: null,
};

export interface LifecycleSettings {
  /** Activate at or below entry × (1 + tolerance) */
  entryTolerancePct: number;
  /** Never chase beyond entry × (1 + cap) */
  maxEntryChasePct: number;
  resolutionCooldownCycles: number;
  cycleMinutes: number;
  cancellationCooldownMinutes: number;
  directionFlipCooldownMinutes: number;
  moveThresholdPct: number;
  bounceThresholdPct: number;
  /** Most recent prices (before this tick) the stale-move and bounce guards look at */
  moveLookbackTicks: number;
  minConfirmations: number;
  /** Range-bound regime: widest stop-loss allowed */
  rangeBoundMaxSlPct: number;
  timeZone: string;
  setupStart: string;
  setupEnd: string;
  forceCloseTime: string;
  marketClose: string;
}

export const DEFAULT_LIFECYCLE_SETTINGS: LifecycleSettings = {
  entryTolerancePct: 2,
  maxEntryChasePct: 10,
  resolutionCooldownCycles: 12,
  cycleMinutes: 1,
  cancellationCooldownMinutes: 30,
  directionFlipCooldownMinutes: 15,
  moveThresholdPct: 0.8,
  bounceThresholdPct: 0.3,
  moveLookbackTicks: 3,
  minConfirmations: 3,
  rangeBoundMaxSlPct: 15,
  timeZone: 'Asia/Kolkata',
  setupStart: '09:30',
  setupEnd: '15:15',
  forceCloseTime: '15:20',
  marketClose: '15:25',
};
