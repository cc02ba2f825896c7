import { describe, expect, it } from 'vitest';
import { computeSetupStats, liveSetupView } from '../setup-stats.js';
import { ist, premiumSnapshot, setup } from '../../__tests__/fixtures.js';

describe('computeSetupStats', () => {
  it('aggregates over WON and LOST only', () => {
    const stats = computeSetupStats([
      setup({ id: 'a', status: 'WON', profitLossPct: 20 }),
      setup({ id: 'b', status: 'WON', profitLossPct: 10 }),
      setup({ id: 'c', status: 'LOST', profitLossPct: -20 }),
      setup({ id: 'd', status: 'CANCELLED' }),
      setup({ id: 'e', status: 'EXPIRED' }),
    ]);

    expect(stats).toEqual({
      total: 5,
      byStatus: { PENDING: 0, ACTIVE: 0, WON: 2, LOST: 1, CANCELLED: 1, EXPIRED: 1 },
      resolved: 3,
      winRate: 66.67,
      avgWinPct: 15,
      avgLossPct: -20,
      totalPnlPct: 10,
    });
  });

  it('reports zeros for an empty day', () => {
    const stats = computeSetupStats([]);
    expect(stats.resolved).toBe(0);
    expect(stats.winRate).toBe(0);
    expect(stats.totalPnlPct).toBe(0);
  });
});

describe('liveSetupView', () => {
  it('marks an active setup against its activation premium', () => {
    const active = setup({ status: 'ACTIVE', activatedAt: ist('10:00'), activationPremium: 102 });
    expect(liveSetupView(active, premiumSnapshot(112.2, ist('10:30')))).toEqual({
      setup: active,
      currentPremium: 112.2,
      livePnlPct: 10,
      livePnlPoints: 10.2,
    });
  });

  it('marks a pending setup against entry', () => {
    const view = liveSetupView(setup(), premiumSnapshot(95, ist('10:00')));
    expect(view?.livePnlPct).toBe(-5);
    expect(view?.livePnlPoints).toBe(-5);
  });

  it('has no view for a terminal setup or a missing quote', () => {
    expect(liveSetupView(setup({ status: 'WON' }), premiumSnapshot(120, ist('10:00')))).toBeNull();
    expect(liveSetupView(setup(), premiumSnapshot(0, ist('10:00')))).toBeNull();
  });
});
