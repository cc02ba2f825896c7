import { beforeEach, describe, expect, it, vi } from 'vitest';
import { runSessionClose } from '../session-close.js';
import { DEFAULT_LIFECYCLE_SETTINGS, INITIAL_LIFECYCLE_STATE, isTerminal } from '../../types/trade.js';
import { ist, setup } from '../../__tests__/fixtures.js';
import type { SetupEventSink, TradeSetupStore } from '../tick-pipeline.js';
import type { LifecycleState, SetupEvent, TradeSetup } from '../../types/trade.js';

class MemorySetups implements TradeSetupStore {
  readonly setups: TradeSetup[] = [];

  async getOpen(): Promise<TradeSetup | null> {
    return this.setups.find(s => !isTerminal(s.status)) ?? null;
  }

  async getLifecycleState(): Promise<LifecycleState> {
    return INITIAL_LIFECYCLE_STATE;
  }

  async update(s: TradeSetup): Promise<void> {
    const idx = this.setups.findIndex(x => x.id === s.id);
    if (idx < 0) throw new Error(`Trade setup ${s.id} not found`);
    this.setups[idx] = s;
  }
}

class RecordingSink implements SetupEventSink {
  readonly events: SetupEvent[] = [];

  async publish(event: SetupEvent): Promise<void> {
    this.events.push(event);
  }
}

describe('runSessionClose', () => {
  let setups: MemorySetups;
  let sink: RecordingSink;
  const deps = () => ({ setups, events: sink, lifecycle: DEFAULT_LIFECYCLE_SETTINGS });

  beforeEach(() => {
    setups = new MemorySetups();
    sink = new RecordingSink();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('expires a setup still pending at the close', async () => {
    setups.setups.push(setup());
    const ts = ist('15:25');

    const event = await runSessionClose(deps(), ts);

    expect(setups.setups[0]?.status).toBe('EXPIRED');
    expect(setups.setups[0]?.resolvedAt).toBe(ts);
    expect(event?.kind).toBe('SETUP_RESOLVED');
    expect(sink.events).toEqual([{ kind: 'SETUP_RESOLVED', setup: setups.setups[0], previousStatus: 'PENDING' }]);
  });

  it('closes an active setup at its last seen premium', async () => {
    setups.setups.push(setup({ status: 'ACTIVE', activationPremium: 100, lastPremium: 92 }));

    await runSessionClose(deps(), ist('15:25'));

    expect(setups.setups[0]).toMatchObject({
      status: 'LOST',
      exitPremium: 92,
      profitLossPct: -8,
      resolutionReason: 'FORCE_CLOSE',
    });
  });

  it('does nothing without an open setup', async () => {
    setups.setups.push(setup({ status: 'WON' }));

    expect(await runSessionClose(deps(), ist('15:25'))).toBeNull();
    expect(setups.setups[0]?.status).toBe('WON');
    expect(sink.events).toEqual([]);
  });
});
