import { AnalysisAgent } from '../agents/analysis-agent.js';
import { buildTradeSetup } from '../agents/setup-builder.js';
import { SetupManager } from '../agents/setup-manager.js';
import { liveSetupView } from '../agents/setup-stats.js';
import { buildMarketContext } from './context-builder.js';
import type { GateCheckResult } from './creation-gates.js';
import type { OiChangeHistory, SnapshotHistory } from './context-builder.js';
import type { Snapshot } from '../types/market.js';
import type { Analysis } from '../types/analysis.js';
import type { Learner } from '../types/learner.js';
import type {
  LifecycleState,
  LiveSetupView,
  SetupEvent,
  TradeSetup,
  TradeSetupProposal,
} from '../types/trade.js';
import type { EngineSettings } from '../agents/analysis-agent.js';
import type { LifecycleSettings } from '../types/trade.js';

export interface StoredSnapshot {
  id: string;
  snapshot: Snapshot;
  volatilityIndex: number | null;
  futuresOiChange: number | null;
}

export interface SnapshotStore extends SnapshotHistory {
  /** Newest snapshot that has no analysis yet, if any */
  latestUnprocessed(): Promise<StoredSnapshot | null>;
}

export type AnalysisStore = OiChangeHistory;

export interface TradeSetupStore {
  /** The single PENDING or ACTIVE setup, if any */
  getOpen(): Promise<TradeSetup | null>;
  getLifecycleState(): Promise<LifecycleState>;
  update(setup: TradeSetup): Promise<void>;
}

export interface TickWrite {
  snapshotId: string;
  analysis: Analysis;
  /** The pre-existing setup, when this tick changed it */
  updated: TradeSetup | null;
  created: TradeSetup | null;
}

export interface TickStore {
  /** Commits every write of one tick, or none of them. */
  persistTick(write: TickWrite): Promise<void>;
}

export interface SetupEventSink {
  publish(event: SetupEvent): Promise<void>;
}

export interface TickDeps {
  snapshots: SnapshotStore;
  analyses: AnalysisStore;
  setups: TradeSetupStore;
  ticks: TickStore;
  events: SetupEventSink;
  learner: Learner;
  engine: EngineSettings;
  lifecycle: LifecycleSettings;
  priceHistoryLength: number;
  oiHistoryLength: number;
}

export interface TickResult {
  snapshotId: string;
  analysis: Analysis | null;
  proposal: TradeSetupProposal | null;
  setup: TradeSetup | null;
  created: TradeSetup | null;
  /** Mark-to-market of whichever setup is still open after the tick */
  live: LiveSetupView | null;
  events: SetupEvent[];
  gate: GateCheckResult | null;
  error?: string;
}

function setupChanged(before: TradeSetup | null, after: TradeSetup | null): after is TradeSetup {
  return before !== null && after !== null && before !== after;
}

/**
 * One processing cycle for one snapshot:
 *   context → analysis → proposal → lifecycle tick → persist → notify.
 * Errors are caught here once and reported on the result.
 */
export async function runTick(input: StoredSnapshot, deps: TickDeps): Promise<TickResult> {
  const { snapshot } = input;
  const base: TickResult = {
    snapshotId: input.id,
    analysis: null,
    proposal: null,
    setup: null,
    created: null,
    live: null,
    events: [],
    gate: null,
  };
  console.log(`[Pipeline] Tick ${snapshot.timestamp} spot=${snapshot.spotPrice} strikes=${snapshot.strikes.size}`);

  try {
    // ── Phase 1: Context ──────────────────────────────────────────────────
    const context = await buildMarketContext(deps.snapshots, deps.analyses, {
      before: snapshot.timestamp,
      priceHistoryLength: deps.priceHistoryLength,
      oiHistoryLength: deps.oiHistoryLength,
      volatilityIndex: input.volatilityIndex,
      futuresOiChange: input.futuresOiChange,
    });

    // ── Phase 2: Analysis ─────────────────────────────────────────────────
    const analysis = new AnalysisAgent(deps.engine).run(snapshot, context);
    if (!analysis) {
      console.warn('[Pipeline] No analysis for snapshot (empty or degenerate chain)');
      return base;
    }

    // ── Phase 3: Proposal ─────────────────────────────────────────────────
    const proposal = buildTradeSetup(analysis, snapshot);

    // ── Phase 4: Lifecycle ────────────────────────────────────────────────
    const open = await deps.setups.getOpen();
    const state = await deps.setups.getLifecycleState();
    const tick = new SetupManager(deps.lifecycle).tick({
      timestamp: snapshot.timestamp,
      snapshot,
      analysis,
      proposal,
      setup: open,
      state,
      priceHistory: context.priceHistory,
      learner: deps.learner,
    });

    // ── Phase 5: Persist ──────────────────────────────────────────────────
    await deps.ticks.persistTick({
      snapshotId: input.id,
      analysis,
      updated: setupChanged(open, tick.setup) ? tick.setup : null,
      created: tick.created,
    });

    // ── Phase 6: Notify ───────────────────────────────────────────────────
    for (const event of tick.events) {
      try {
        await deps.events.publish(event);
      } catch (err) {
        console.error(`[Pipeline] Event ${event.kind} not delivered:`, err);
      }
    }

    const current = tick.created ?? tick.setup;
    const live = current ? liveSetupView(current, snapshot) : null;
    if (live) {
      console.log(
        `[Pipeline] Open ${live.setup.status} ${live.setup.strike} ${live.setup.optionType} ` +
        `premium=${live.currentPremium} pnl=${live.livePnlPct}%`,
      );
    }

    console.log(
      `[Pipeline] Done: ${analysis.verdict} score=${analysis.combinedScore.toFixed(1)} ` +
      `conf=${analysis.confidence.toFixed(0)} events=${tick.events.map(e => e.kind).join(',') || 'none'}`,
    );
    return {
      ...base,
      analysis,
      proposal,
      setup: tick.setup,
      created: tick.created,
      live,
      events: tick.events,
      gate: tick.gate,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[Pipeline] Error:', message);
    return { ...base, error: message };
  }
}
