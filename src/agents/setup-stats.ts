import { ltpFor } from '../types/market.js';
import { profitLoss } from './setup-manager.js';
import type { Snapshot } from '../types/market.js';
import type { LiveSetupView, SetupStats, SetupStatus, TradeSetup } from '../types/trade.js';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/** Win rate and P&L aggregates. Only WON and LOST count as resolved. */
export function computeSetupStats(setups: readonly TradeSetup[]): SetupStats {
  const byStatus: Record<SetupStatus, number> = {
    PENDING: 0,
    ACTIVE: 0,
    WON: 0,
    LOST: 0,
    CANCELLED: 0,
    EXPIRED: 0,
  };
  for (const s of setups) byStatus[s.status]++;

  const pnlOf = (status: SetupStatus) =>
    setups.filter(s => s.status === status).map(s => s.profitLossPct ?? 0);
  const wins = pnlOf('WON');
  const losses = pnlOf('LOST');
  const resolved = wins.length + losses.length;

  return {
    total: setups.length,
    byStatus,
    resolved,
    winRate: resolved > 0 ? round2((wins.length / resolved) * 100) : 0,
    avgWinPct: round2(average(wins)),
    avgLossPct: round2(average(losses)),
    totalPnlPct: round2([...wins, ...losses].reduce((a, b) => a + b, 0)),
  };
}

/**
 * Mark-to-market of an open setup against the snapshot premium: versus the
 * activation premium once ACTIVE, versus entry while PENDING. Returns null
 * for a terminal setup or a strike with no quote.
 */
export function liveSetupView(setup: TradeSetup, snapshot: Snapshot): LiveSetupView | null {
  if (setup.status !== 'ACTIVE' && setup.status !== 'PENDING') return null;
  const premium = ltpFor(snapshot.strikes.get(setup.strike), setup.optionType);
  if (!(premium > 0)) return null;
  const pnl = profitLoss(setup, premium);
  return { setup, currentPremium: premium, livePnlPct: pnl.pct, livePnlPoints: pnl.points };
}
