/**
 * Trade setup lifecycle.
 *
 *   PENDING → ACTIVE → WON | LOST
 *   PENDING → CANCELLED   (verdict flips against the setup, or learner pauses)
 *   PENDING → EXPIRED     (market close reached while still pending, or a
 *                          setup carried over from an earlier session)
 *
 * WON / LOST / CANCELLED / EXPIRED are absorbing. Every method here is
 * synchronous and free of I/O: the caller passes the current setup and
 * lifecycle state in and persists what comes back.
 */

import { v4 as uuidv4 } from 'uuid';
import { checkCreationGates } from '../pipeline/creation-gates.js';
import type { GateCheckResult } from '../pipeline/creation-gates.js';
import { isAtOrAfter, localDate } from '../lib/market-clock.js';
import { verdictDirection } from '../indicators/verdict.js';
import { ltpFor } from '../types/market.js';
import { DEFAULT_LIFECYCLE_SETTINGS, isTerminal } from '../types/trade.js';
import type { Snapshot } from '../types/market.js';
import type { Analysis } from '../types/analysis.js';
import type { Learner } from '../types/learner.js';
import type {
  LifecycleSettings,
  LifecycleState,
  SetupEvent,
  SetupStatus,
  TradeSetup,
  TradeSetupProposal,
} from '../types/trade.js';

const ALLOWED_TRANSITIONS: Record<SetupStatus, readonly SetupStatus[]> = {
  PENDING: ['ACTIVE', 'CANCELLED', 'EXPIRED'],
  ACTIVE: ['WON', 'LOST'],
  WON: [],
  LOST: [],
  CANCELLED: [],
  EXPIRED: [],
};

export interface TransitionResult {
  setup: TradeSetup;
  applied: boolean;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Apply a status change if the state machine allows it. A disallowed move
 * (anything out of a terminal state included) returns the setup untouched.
 */
export function transition(
  setup: TradeSetup,
  to: SetupStatus,
  patch: Partial<TradeSetup> = {},
): TransitionResult {
  if (!ALLOWED_TRANSITIONS[setup.status].includes(to)) {
    console.warn(`[SetupManager] Ignoring ${setup.status} → ${to} for setup ${setup.id}`);
    return { setup, applied: false };
  }
  return { setup: { ...setup, ...patch, status: to }, applied: true };
}

/** (exit − activation) relative to the activation premium, falling back to entry. */
export function profitLoss(setup: TradeSetup, exitPremium: number): { pct: number; points: number } {
  const basis = setup.activationPremium ?? setup.entryPremium;
  if (!(basis > 0)) return { pct: 0, points: 0 };
  const points = exitPremium - basis;
  return { pct: round2((points / basis) * 100), points: round2(points) };
}

// ── Quality & reasoning ──────────────────────────────────────────────────────

/**
 * 0–9 score of how well a setup lines up at creation.
 * CONFIRMED +2; confidence 60–85 +2 (50–60 or 85–95 +1); "Winning" verdict +1;
 * ITM +1; stop ≤ 15% +1; premium momentum aligned +1.
 */
export function qualityScore(analysis: Analysis, proposal: TradeSetupProposal): number {
  let score = 0;
  if (analysis.confirmationStatus === 'CONFIRMED') score += 2;

  const conf = analysis.confidence;
  if (conf >= 60 && conf <= 85) score += 2;
  else if ((conf >= 50 && conf < 60) || (conf > 85 && conf <= 95)) score += 1;

  if (analysis.verdict.includes('Winning')) score += 1;
  if (proposal.moneyness === 'ITM') score += 1;
  if (proposal.riskPct <= 15) score += 1;

  const pm = analysis.premiumMomentum.premiumMomentumScore;
  const bullish = analysis.direction === 'bullish';
  if ((bullish && pm > 10) || (!bullish && pm < -10)) score += 1;

  return score;
}

export function tradeReasoning(analysis: Analysis, proposal: TradeSetupProposal, quality: number): string {
  const direction = proposal.direction === 'BUY_PUT' ? 'BUY PUT' : 'BUY CALL';
  const callLakh = analysis.callOiChange / 100_000;
  const putLakh = analysis.putOiChange / 100_000;
  const sign = (n: number) => (n >= 0 ? '+' : '') + n.toFixed(1);
  const vsMaxPain = analysis.spotPrice < analysis.maxPain ? 'below' : 'above';

  let text =
    `${direction}: ${analysis.verdict} (${analysis.confidence.toFixed(0)}% confidence). ` +
    `Quality Score: ${quality}/9. ` +
    `Call OI ${sign(callLakh)}L vs Put OI ${sign(putLakh)}L. ` +
    `Spot ${analysis.spotPrice.toFixed(0)} ${vsMaxPain} max pain ${analysis.maxPain}. ` +
    `Selected ${proposal.strike} ${proposal.optionType} (${proposal.moneyness}) with ${proposal.riskPct.toFixed(0)}% risk.`;
  if (proposal.ivAtStrike > 0) text += ` IV: ${proposal.ivAtStrike.toFixed(1)}%`;
  return text;
}

export function createSetup(analysis: Analysis, proposal: TradeSetupProposal, timestamp: string): TradeSetup {
  const quality = qualityScore(analysis, proposal);
  return {
    ...proposal,
    id: uuidv4(),
    analysisId: analysis.id,
    status: 'PENDING',
    createdAt: timestamp,
    context: {
      spotAtCreation: analysis.spotPrice,
      verdictAtCreation: analysis.verdict,
      confidence: analysis.confidence,
      ivAtCreation: proposal.ivAtStrike,
      expiry: analysis.expiry,
      callOiChange: analysis.callOiChange,
      putOiChange: analysis.putOiChange,
      pcr: analysis.pcr,
      maxPain: analysis.maxPain,
      support: analysis.oiClusters.strongestSupport,
      resistance: analysis.oiClusters.strongestResistance,
    },
    qualityScore: quality,
    reasoning: tradeReasoning(analysis, proposal, quality),
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
  };
}

/**
 * Rebuild the cross-tick lifecycle state from stored setups. Cancellation
 * and WON/LOST resolution times feed separate cooldowns; expiry feeds none.
 */
export function lifecycleStateFrom(setups: readonly TradeSetup[]): LifecycleState {
  const latest = (values: Array<string | null>) =>
    values.reduce<string | null>((acc, v) => (v !== null && (acc === null || v > acc) ? v : acc), null);

  const newest = [...setups].sort((a, b) => b.createdAt.localeCompare(a.createdAt))[0];
  return {
    lastSuggestedDirection: newest?.direction ?? null,
    lastSuggestedAt: newest?.createdAt ?? null,
    lastCancelledAt: latest(setups.filter(s => s.status === 'CANCELLED').map(s => s.resolvedAt)),
    lastResolvedAt: latest(setups.filter(s => s.status === 'WON' || s.status === 'LOST').map(s => s.resolvedAt)),
  };
}

// ── Manager ──────────────────────────────────────────────────────────────────

export interface LifecycleTickInput {
  timestamp: string;
  snapshot: Snapshot;
  analysis: Analysis;
  proposal: TradeSetupProposal | null;
  /** Latest non-terminal setup, if any */
  setup: TradeSetup | null;
  state: LifecycleState;
  /** Spot prices before this tick, oldest first */
  priceHistory: number[];
  learner: Learner;
}

export interface LifecycleTickResult {
  /** The pre-existing setup after this tick (possibly now terminal) */
  setup: TradeSetup | null;
  created: TradeSetup | null;
  state: LifecycleState;
  events: SetupEvent[];
  gate: GateCheckResult | null;
}

export class SetupManager {
  constructor(private readonly settings: LifecycleSettings = DEFAULT_LIFECYCLE_SETTINGS) {}

  /** PENDING → ACTIVE when the premium is near or below entry; never past the chase cap. */
  checkActivation(setup: TradeSetup, premium: number, timestamp: string): TransitionResult {
    if (setup.status !== 'PENDING' || !(premium > 0)) return { setup, applied: false };

    const nearEntry = setup.entryPremium * (1 + this.settings.entryTolerancePct / 100);
    const chaseCap = setup.entryPremium * (1 + this.settings.maxEntryChasePct / 100);
    const tracked = { ...setup, lastCheckedAt: timestamp, lastPremium: premium };

    if (premium <= nearEntry || premium <= chaseCap) {
      const result = transition(tracked, 'ACTIVE', {
        activatedAt: timestamp,
        activationPremium: premium,
        maxPremiumReached: premium,
        minPremiumReached: premium,
      });
      if (result.applied) {
        const slippage = ((premium - setup.entryPremium) / setup.entryPremium) * 100;
        console.log(
          `[SetupManager] Setup ${setup.id} ACTIVATED at ${premium.toFixed(2)} ` +
          `(entry ${setup.entryPremium.toFixed(2)}, slippage ${slippage >= 0 ? '+' : ''}${slippage.toFixed(1)}%)`,
        );
      }
      return result;
    }

    const move = ((premium - setup.entryPremium) / setup.entryPremium) * 100;
    console.log(
      `[SetupManager] Setup ${setup.id} not activated: premium ${premium.toFixed(2)} is +${move.toFixed(1)}% ` +
      `over entry (cap +${this.settings.maxEntryChasePct}%)`,
    );
    return { setup: tracked, applied: false };
  }

  /** ACTIVE → LOST at or under the stop, ACTIVE → WON at or over target 1. */
  checkResolution(setup: TradeSetup, premium: number, timestamp: string): TransitionResult {
    if (setup.status !== 'ACTIVE' || !(premium > 0)) return { setup, applied: false };

    const tracked: TradeSetup = {
      ...setup,
      maxPremiumReached: Math.max(setup.maxPremiumReached ?? premium, premium),
      minPremiumReached: Math.min(setup.minPremiumReached ?? premium, premium),
      lastCheckedAt: timestamp,
      lastPremium: premium,
    };

    const hitSl = premium <= setup.slPremium;
    const hitTarget = !hitSl && premium >= setup.target1Premium;
    if (!hitSl && !hitTarget) return { setup: tracked, applied: false };

    const pnl = profitLoss(setup, premium);
    const result = transition(tracked, hitSl ? 'LOST' : 'WON', {
      resolvedAt: timestamp,
      exitPremium: premium,
      hitSl,
      hitTarget,
      profitLossPct: pnl.pct,
      profitLossPoints: pnl.points,
      resolutionReason: hitSl ? 'STOP_LOSS' : 'TARGET',
    });
    if (result.applied) {
      console.log(
        `[SetupManager] Setup ${setup.id} ${result.setup.status} (${hitSl ? 'SL' : 'target'} hit) ` +
        `exit=${premium.toFixed(2)} pnl=${pnl.pct.toFixed(1)}%`,
      );
    }
    return result;
  }

  cancel(setup: TradeSetup, reason: string, timestamp: string): TransitionResult {
    const result = transition(setup, 'CANCELLED', { resolvedAt: timestamp, resolutionReason: reason });
    if (result.applied) console.log(`[SetupManager] Setup ${setup.id} CANCELLED: ${reason}`);
    return result;
  }

  expire(setup: TradeSetup, timestamp: string): TransitionResult {
    const result = transition(setup, 'EXPIRED', { resolvedAt: timestamp, resolutionReason: 'MARKET_CLOSE' });
    if (result.applied) console.log(`[SetupManager] Setup ${setup.id} EXPIRED at market close`);
    return result;
  }

  /** Late-session exit of an ACTIVE setup: WON if in profit, otherwise LOST. */
  forceClose(setup: TradeSetup, premium: number, timestamp: string): TransitionResult {
    if (setup.status !== 'ACTIVE') return { setup, applied: false };
    const exit = premium > 0 ? premium : setup.lastPremium ?? setup.activationPremium ?? setup.entryPremium;
    const pnl = profitLoss(setup, exit);
    const result = transition(setup, pnl.pct > 0 ? 'WON' : 'LOST', {
      resolvedAt: timestamp,
      exitPremium: exit,
      hitSl: false,
      hitTarget: false,
      profitLossPct: pnl.pct,
      profitLossPoints: pnl.points,
      lastCheckedAt: timestamp,
      lastPremium: exit,
      resolutionReason: 'FORCE_CLOSE',
    });
    if (result.applied) {
      console.log(
        `[SetupManager] Setup ${setup.id} FORCE CLOSED as ${result.setup.status} pnl=${pnl.pct >= 0 ? '+' : ''}${pnl.pct.toFixed(2)}%`,
      );
    }
    return result;
  }

  /** End of session: PENDING expires, ACTIVE is closed at its last seen premium. */
  closeSession(setup: TradeSetup, timestamp: string): TransitionResult {
    if (setup.status === 'PENDING') return this.expire(setup, timestamp);
    if (setup.status === 'ACTIVE') return this.forceClose(setup, 0, timestamp);
    return { setup, applied: false };
  }

  /**
   * Drive an existing setup one tick forward. Cutoffs and cancellations are
   * checked before prices; a PENDING setup is not activated once the
   * force-close time has passed. A setup created on an earlier exchange-local
   * day is closed out before anything else: its prices belong to that day.
   */
  advance(
    setup: TradeSetup,
    snapshot: Snapshot,
    analysis: Analysis,
    learner: Learner,
    timestamp: string,
  ): TransitionResult {
    if (isTerminal(setup.status)) return { setup, applied: false };

    const { timeZone, marketClose, forceCloseTime } = this.settings;
    if (localDate(setup.createdAt, timeZone) < localDate(timestamp, timeZone)) {
      return this.closeSession(setup, timestamp);
    }
    const premium = ltpFor(snapshot.strikes.get(setup.strike), setup.optionType);

    if (setup.status === 'PENDING') {
      if (isAtOrAfter(timestamp, marketClose, timeZone)) return this.expire(setup, timestamp);

      const against = setup.direction === 'BUY_CALL' ? 'bearish' : 'bullish';
      if (verdictDirection(analysis.verdict) === against) {
        return this.cancel(setup, `VERDICT_FLIP: ${analysis.verdict}`, timestamp);
      }
      const trade = learner.shouldTrade(analysis.confidence, analysis.verdict);
      if (!trade.allowed) return this.cancel(setup, `LEARNER_PAUSE: ${trade.reason}`, timestamp);

      if (isAtOrAfter(timestamp, forceCloseTime, timeZone)) return { setup, applied: false };
      return this.checkActivation(setup, premium, timestamp);
    }

    const resolved = this.checkResolution(setup, premium, timestamp);
    if (resolved.applied) return resolved;
    if (isAtOrAfter(timestamp, forceCloseTime, timeZone)) {
      return this.forceClose(resolved.setup, premium, timestamp);
    }
    return resolved;
  }

  /**
   * One full lifecycle tick: advance whatever setup exists, then consider
   * accepting the new proposal. At most one setup is non-terminal afterwards.
   */
  tick(input: LifecycleTickInput): LifecycleTickResult {
    const { timestamp, snapshot, analysis, proposal, learner } = input;
    const events: SetupEvent[] = [];
    let state = { ...input.state };
    let setup = input.setup;

    if (setup && !isTerminal(setup.status)) {
      const previousStatus = setup.status;
      const step = this.advance(setup, snapshot, analysis, learner, timestamp);
      setup = step.setup;
      if (step.applied) {
        if (setup.status === 'ACTIVE') {
          events.push({ kind: 'SETUP_ACTIVATED', setup });
        } else {
          events.push({ kind: 'SETUP_RESOLVED', setup, previousStatus });
          if (setup.status === 'CANCELLED') state = { ...state, lastCancelledAt: timestamp };
          if (setup.status === 'WON' || setup.status === 'LOST') state = { ...state, lastResolvedAt: timestamp };
        }
      }
    }

    const gate = checkCreationGates(
      {
        timestamp,
        analysis,
        proposal,
        existing: setup,
        state,
        priceHistory: input.priceHistory,
        learner,
      },
      this.settings,
    );

    if (!gate.passed || !proposal) {
      console.log(`[Gates] No new setup: ${gate.failedGates.join(' | ')}`);
      return { setup, created: null, state, events, gate };
    }

    const created = createSetup(analysis, proposal, timestamp);
    state = { ...state, lastSuggestedDirection: created.direction, lastSuggestedAt: timestamp };
    events.push({ kind: 'SETUP_CREATED', setup: created });
    console.log(
      `[SetupManager] Created PENDING ${created.direction} ${created.strike} ${created.optionType} ` +
      `entry=${created.entryPremium.toFixed(2)} sl=${created.slPremium.toFixed(2)} ` +
      `t1=${created.target1Premium.toFixed(2)} quality=${created.qualityScore}/9`,
    );
    return { setup, created, state, events, gate };
  }
}
