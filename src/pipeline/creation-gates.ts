import { isWithinWindow, minutesBetween } from '../lib/market-clock.js';
import { isTerminal } from '../types/trade.js';
import type { Analysis } from '../types/analysis.js';
import type { Learner } from '../types/learner.js';
import type { LifecycleSettings, LifecycleState, TradeSetup, TradeSetupProposal } from '../types/trade.js';

export interface GateCheckResult {
  passed: boolean;
  failedGates: string[];
}

export interface CreationGateInput {
  timestamp: string;
  analysis: Analysis;
  proposal: TradeSetupProposal | null;
  existing: TradeSetup | null;
  state: LifecycleState;
  /** Spot prices before this tick, oldest first */
  priceHistory: number[];
  learner: Learner;
}

/**
 * Independent confirmations of the signal: OI-price agreement, regime,
 * premium momentum and IV skew.
 */
export function countConfirmations(analysis: Analysis): number {
  const bullish = analysis.direction === 'bullish';
  let n = 0;
  if (analysis.confirmationStatus === 'CONFIRMED') n++;

  const regime = analysis.marketRegime.regime;
  if ((bullish && regime === 'trending_up') || (!bullish && regime === 'trending_down')) n++;

  const pm = analysis.premiumMomentum.premiumMomentumScore;
  if ((bullish && pm > 10) || (!bullish && pm < -10)) n++;

  const skew = analysis.ivSkew.skewScore;
  if ((bullish && skew < -5) || (!bullish && skew > 5)) n++;

  return n;
}

/** Spot already travelled past the threshold in the signal's direction. */
export function moveAlreadyHappened(
  analysis: Analysis,
  priceHistory: number[],
  thresholdPct: number,
): boolean {
  if (priceHistory.length < 2) return false;
  const past = priceHistory[0] ?? 0;
  if (past <= 0 || analysis.spotPrice <= 0) return false;
  const movePct = ((analysis.spotPrice - past) / past) * 100;
  if (analysis.direction === 'bullish') return movePct > thresholdPct;
  if (analysis.direction === 'bearish') return movePct < -thresholdPct;
  return false;
}

/** Bearish only: price already bounced off the window's low. */
export function bounceInProgress(
  analysis: Analysis,
  priceHistory: number[],
  thresholdPct: number,
): boolean {
  if (analysis.direction !== 'bearish' || priceHistory.length < 2) return false;
  const prices = priceHistory.filter(p => p > 0);
  if (prices.length === 0 || analysis.spotPrice <= 0) return false;
  const low = Math.min(...prices);
  return ((analysis.spotPrice - low) / low) * 100 > thresholdPct;
}

function inCooldown(since: string | null, now: string, minutes: number): number | null {
  if (!since) return null;
  const elapsed = minutesBetween(since, now);
  return elapsed < minutes ? Math.max(0, minutes - elapsed) : null;
}

/**
 * Every condition that must hold before a new PENDING setup is accepted.
 * All failures are collected so a rejection explains itself in one log line.
 */
export function checkCreationGates(input: CreationGateInput, settings: LifecycleSettings): GateCheckResult {
  const { timestamp, analysis, proposal, existing, state, priceHistory, learner } = input;
  const failed: string[] = [];

  // 1. Session window
  if (!isWithinWindow(timestamp, settings.setupStart, settings.setupEnd, settings.timeZone)) {
    failed.push(`TIME_GATE: outside ${settings.setupStart}-${settings.setupEnd}`);
  }

  // 2. One live setup at a time
  if (existing && !isTerminal(existing.status)) {
    failed.push(`EXISTING_SETUP_GATE: ${existing.status} setup ${existing.id} still open`);
  }

  // 3. Learner pause
  const trade = learner.shouldTrade(analysis.confidence, analysis.verdict);
  if (!trade.allowed) failed.push(`LEARNER_PAUSE_GATE: ${trade.reason}`);

  // 4. Confidence band
  const band = learner.getConfidenceThresholds();
  const conf = analysis.confidence;
  if (conf < band.min || conf > band.max) {
    failed.push(`CONFIDENCE_GATE: ${conf.toFixed(0)} outside ${band.min}-${band.max}`);
  }
  const excluded = band.excludeRanges.find(r => conf >= r.min && conf < r.max);
  if (excluded) {
    failed.push(`CONFIDENCE_EXCLUDE_GATE: ${conf.toFixed(0)} in excluded ${excluded.min}-${excluded.max}`);
  }

  // 5. Cooldowns
  const resolutionWait = inCooldown(
    state.lastResolvedAt,
    timestamp,
    settings.resolutionCooldownCycles * settings.cycleMinutes,
  );
  if (resolutionWait !== null) {
    failed.push(`RESOLUTION_COOLDOWN_GATE: ${resolutionWait.toFixed(0)} min remaining`);
  }
  const cancelWait = inCooldown(state.lastCancelledAt, timestamp, settings.cancellationCooldownMinutes);
  if (cancelWait !== null) {
    failed.push(`CANCELLATION_COOLDOWN_GATE: ${cancelWait.toFixed(0)} min remaining`);
  }
  if (proposal && state.lastSuggestedDirection && proposal.direction !== state.lastSuggestedDirection) {
    const flipWait = inCooldown(state.lastSuggestedAt, timestamp, settings.directionFlipCooldownMinutes);
    if (flipWait !== null) {
      failed.push(
        `DIRECTION_FLIP_GATE: ${state.lastSuggestedDirection} → ${proposal.direction}, ${flipWait.toFixed(0)} min remaining`,
      );
    }
  }

  // 6. Stale signal / failing short
  const recent = priceHistory.slice(-Math.max(1, settings.moveLookbackTicks));
  if (moveAlreadyHappened(analysis, recent, settings.moveThresholdPct)) {
    failed.push(`STALE_MOVE_GATE: spot already moved > ${settings.moveThresholdPct}% in signal direction`);
  }
  if (bounceInProgress(analysis, recent, settings.bounceThresholdPct)) {
    failed.push(`BOUNCE_GATE: spot bounced > ${settings.bounceThresholdPct}% off recent low`);
  }

  // 7. Candidate
  if (!proposal) {
    failed.push('CANDIDATE_GATE: no tradable strike');
    return { passed: false, failedGates: failed };
  }

  // 8. Learner-flagged verdicts
  const skip = learner.shouldSkipVerdict(analysis.verdict);
  if (skip.skip) failed.push(`VERDICT_SKIP_GATE: ${skip.reason}`);

  // 9. Regime rules
  const regime = analysis.marketRegime.regime;
  if (regime === 'range_bound') {
    if (proposal.moneyness === 'OTM') failed.push('RANGE_OTM_GATE: no OTM entries in range-bound market');
    if (proposal.riskPct > settings.rangeBoundMaxSlPct) {
      failed.push(`RANGE_SL_GATE: stop ${proposal.riskPct}% > ${settings.rangeBoundMaxSlPct}% in range-bound market`);
    }
  }
  const wanted = proposal.direction === 'BUY_CALL' ? 'trending_up' : 'trending_down';
  if (regime !== wanted) failed.push(`REGIME_ALIGNMENT_GATE: ${proposal.direction} needs ${wanted}, got ${regime}`);

  // 10. Confirmation
  if (analysis.confirmationStatus !== 'CONFIRMED' && analysis.confirmationStatus !== 'REVERSAL_ALERT') {
    failed.push(`CONFIRMATION_GATE: status ${analysis.confirmationStatus}`);
  }
  const confirmations = countConfirmations(analysis);
  if (confirmations < settings.minConfirmations) {
    failed.push(`CONFIRMATION_COUNT_GATE: ${confirmations}/4 < ${settings.minConfirmations}`);
  }

  return { passed: failed.length === 0, failedGates: failed };
}
