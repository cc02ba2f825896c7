import { beforeEach, describe, expect, it } from 'vitest';
import { runTick } from '../tick-pipeline.js';
import { lifecycleStateFrom } from '../../agents/setup-manager.js';
import { DEFAULT_ENGINE_SETTINGS } from '../../agents/analysis-agent.js';
import { DEFAULT_LIFECYCLE_SETTINGS, isTerminal } from '../../types/trade.js';
import { strikeMap } from '../../types/market.js';
import { FakeLearner, ist, setup, snapshot, strike } from '../../__tests__/fixtures.js';
import type {
  AnalysisStore,
  SetupEventSink,
  SnapshotStore,
  StoredSnapshot,
  TickDeps,
  TickStore,
  TickWrite,
  TradeSetupStore,
} from '../tick-pipeline.js';
import type { Analysis } from '../../types/analysis.js';
import type { OiChangePair, StrikeMetrics } from '../../types/market.js';
import type { LifecycleState, SetupEvent, TradeSetup } from '../../types/trade.js';

class MemorySnapshots implements SnapshotStore {
  constructor(
    private readonly prices: number[] = [],
    private readonly previous: ReadonlyMap<number, StrikeMetrics> | null = null,
  ) {}

  async latestUnprocessed(): Promise<StoredSnapshot | null> {
    return null;
  }

  async recentSpotPrices(_before: string, limit: number): Promise<number[]> {
    return this.prices.slice(-limit);
  }

  async previousStrikes(): Promise<ReadonlyMap<number, StrikeMetrics> | null> {
    return this.previous;
  }
}

class MemoryAnalyses implements AnalysisStore {
  readonly rows: { analysis: Analysis; snapshotId: string }[] = [];

  async recentOiChanges(): Promise<OiChangePair[]> {
    return [];
  }
}

class MemorySetups implements TradeSetupStore {
  readonly setups: TradeSetup[] = [];
  updates = 0;
  failUpdate: Error | null = null;

  async getOpen(): Promise<TradeSetup | null> {
    return this.setups.find(s => !isTerminal(s.status)) ?? null;
  }

  async getLifecycleState(): Promise<LifecycleState> {
    return lifecycleStateFrom(this.setups);
  }

  async update(s: TradeSetup): Promise<void> {
    if (this.failUpdate) throw this.failUpdate;
    const idx = this.setups.findIndex(x => x.id === s.id);
    if (idx < 0) throw new Error(`Trade setup ${s.id} not found`);
    this.setups[idx] = s;
    this.updates++;
  }
}

/** Applies a tick's writes to a copy and swaps it in only when all succeed. */
class MemoryTicks implements TickStore {
  constructor(
    private readonly analyses: MemoryAnalyses,
    private readonly setups: MemorySetups,
  ) {}

  async persistTick(write: TickWrite): Promise<void> {
    const staged = new MemorySetups();
    staged.setups.push(...this.setups.setups);
    staged.failUpdate = this.setups.failUpdate;
    if (write.updated) await staged.update(write.updated);
    if (write.created) staged.setups.push(write.created);

    this.analyses.rows.push({ analysis: write.analysis, snapshotId: write.snapshotId });
    this.setups.setups.splice(0, this.setups.setups.length, ...staged.setups);
    this.setups.updates += staged.updates;
  }
}

class RecordingSink implements SetupEventSink {
  readonly events: SetupEvent[] = [];
  fail = false;

  async publish(event: SetupEvent): Promise<void> {
    if (this.fail) throw new Error('telegram unavailable');
    this.events.push(event);
  }
}

// One put-heavy ATM strike at spot: Bulls Winning with a 1957 net force.
const atmStrike = strike(24000, {
  ceOi: 250_000,
  ceOiChange: 15_000,
  ceLtp: 110,
  peOi: 220_000,
  peOiChange: 20_000,
  peLtp: 95,
});

function stored(overrides: Partial<StoredSnapshot> = {}): StoredSnapshot {
  return {
    id: 'snap-1',
    snapshot: snapshot(24000, [atmStrike]),
    volatilityIndex: 22,
    futuresOiChange: null,
    ...overrides,
  };
}

describe('runTick', () => {
  let analyses: MemoryAnalyses;
  let setups: MemorySetups;
  let sink: RecordingSink;

  const deps = (snapshots: SnapshotStore = new MemorySnapshots()): TickDeps => ({
    snapshots,
    analyses,
    setups,
    ticks: new MemoryTicks(analyses, setups),
    events: sink,
    learner: new FakeLearner(),
    engine: DEFAULT_ENGINE_SETTINGS,
    lifecycle: DEFAULT_LIFECYCLE_SETTINGS,
    priceHistoryLength: 10,
    oiHistoryLength: 5,
  });

  beforeEach(() => {
    analyses = new MemoryAnalyses();
    setups = new MemorySetups();
    sink = new RecordingSink();
  });

  it('creates a setup when a trending, confirmed signal clears every gate', async () => {
    // +1.69% over the window, +0.63% over the last three ticks
    const history = [23600, 23700, 23800, 23850, 23900, 23950];
    const previous = strikeMap([strike(24000, { ceLtp: 100, peLtp: 100 })]);

    const result = await runTick(stored(), deps(new MemorySnapshots(history, previous)));

    expect(result.error).toBeUndefined();
    expect(result.analysis?.verdict).toBe('Bulls Winning');
    expect(result.analysis?.marketRegime.regime).toBe('trending_up');
    expect(result.analysis?.confirmationStatus).toBe('CONFIRMED');
    // 50 + 15 score + 10 max pain + 15 confirmed − 10 volatility
    expect(result.analysis?.confidence).toBe(80);
    expect(result.gate).toEqual({ passed: true, failedGates: [] });
    expect(result.created).toMatchObject({
      status: 'PENDING',
      direction: 'BUY_CALL',
      strike: 24000,
      moneyness: 'ATM',
      entryPremium: 110,
      slPremium: 88,
      target1Premium: 132,
      target2Premium: 154,
    });
    expect(setups.setups).toHaveLength(1);
    expect(analyses.rows.map(r => r.snapshotId)).toEqual(['snap-1']);
    expect(sink.events.map(e => e.kind)).toEqual(['SETUP_CREATED']);
  });

  it('stores the analysis but creates nothing in a range-bound market', async () => {
    const result = await runTick(stored(), deps());

    expect(analyses.rows).toHaveLength(1);
    expect(result.created).toBeNull();
    expect(result.gate?.failedGates).toContain('REGIME_ALIGNMENT_GATE: BUY_CALL needs trending_up, got range_bound');
    expect(sink.events).toEqual([]);
  });

  it('activates an open setup from the snapshot premium and persists it', async () => {
    setups.setups.push(setup({ strike: 24000, entryPremium: 108 }));

    const result = await runTick(stored(), deps());

    expect(result.setup?.status).toBe('ACTIVE');
    expect(result.setup?.activationPremium).toBe(110);
    expect(result.live).toMatchObject({ currentPremium: 110, livePnlPct: 0, livePnlPoints: 0 });
    expect(setups.updates).toBe(1);
    expect(setups.setups[0]?.status).toBe('ACTIVE');
    expect(result.created).toBeNull();
    expect(sink.events.map(e => e.kind)).toEqual(['SETUP_ACTIVATED']);
  });

  it('keeps going when an event cannot be delivered', async () => {
    setups.setups.push(setup({ strike: 24000, entryPremium: 108 }));
    sink.fail = true;

    const result = await runTick(stored(), deps());

    expect(result.error).toBeUndefined();
    expect(result.events.map(e => e.kind)).toEqual(['SETUP_ACTIVATED']);
    expect(setups.setups[0]?.status).toBe('ACTIVE');
  });

  it('stores nothing and notifies nobody when a setup write fails', async () => {
    setups.setups.push(setup({ strike: 24000, status: 'ACTIVE', activatedAt: ist('09:50'), activationPremium: 100 }));
    setups.failUpdate = new Error('connection reset');

    // 70 is under the 80 stop: the tick resolves the setup as LOST
    const result = await runTick(stored({ snapshot: snapshot(24000, [{ ...atmStrike, ceLtp: 70 }]) }), deps());

    expect(result.error).toBe('connection reset');
    expect(result.analysis).toBeNull();
    expect(analyses.rows).toEqual([]);
    expect(setups.setups[0]?.status).toBe('ACTIVE');
    expect(sink.events).toEqual([]);
  });

  it('skips a snapshot with no strikes', async () => {
    const result = await runTick(stored({ snapshot: snapshot(24000, []) }), deps());

    expect(result.analysis).toBeNull();
    expect(result.error).toBeUndefined();
    expect(analyses.rows).toEqual([]);
  });
});
