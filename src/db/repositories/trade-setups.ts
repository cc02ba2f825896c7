import { getPool, withTransaction } from '../client.js';
import { lifecycleStateFrom } from '../../agents/setup-manager.js';
import type { PoolClient } from 'pg';
import type { TradeSetupStore } from '../../pipeline/tick-pipeline.js';
import type {
  LifecycleState,
  Moneyness,
  SetupContext,
  SetupStatus,
  TradeDirection,
  TradeSetup,
} from '../../types/trade.js';
import type { OptionType } from '../../types/market.js';

interface TradeSetupRow {
  id: string;
  analysis_id: string;
  status: SetupStatus;
  direction: TradeDirection;
  strike: string;
  option_type: OptionType;
  moneyness: Moneyness;
  entry_premium: string;
  sl_premium: string;
  target1_premium: string;
  target2_premium: string;
  risk_pct: string;
  iv_at_strike: string;
  quality_score: number;
  reasoning: string;
  context: SetupContext;
  created_at: Date;
  activated_at: Date | null;
  activation_premium: string | null;
  resolved_at: Date | null;
  exit_premium: string | null;
  hit_sl: boolean | null;
  hit_target: boolean | null;
  profit_loss_pct: string | null;
  profit_loss_points: string | null;
  max_premium_reached: string | null;
  min_premium_reached: string | null;
  last_checked_at: Date | null;
  last_premium: string | null;
  resolution_reason: string | null;
}

const COLUMNS = `
  id, analysis_id, status, direction, strike, option_type, moneyness,
  entry_premium, sl_premium, target1_premium, target2_premium, risk_pct, iv_at_strike,
  quality_score, reasoning, context, created_at,
  activated_at, activation_premium, resolved_at, exit_premium, hit_sl, hit_target,
  profit_loss_pct, profit_loss_points, max_premium_reached, min_premium_reached,
  last_checked_at, last_premium, resolution_reason`;

const num = (v: string | null): number | null => (v === null ? null : Number(v));
const iso = (v: Date | null): string | null => (v === null ? null : v.toISOString());

function rowToSetup(r: TradeSetupRow): TradeSetup {
  return {
    id: r.id,
    analysisId: r.analysis_id,
    status: r.status,
    direction: r.direction,
    strike: Number(r.strike),
    optionType: r.option_type,
    moneyness: r.moneyness,
    entryPremium: Number(r.entry_premium),
    slPremium: Number(r.sl_premium),
    target1Premium: Number(r.target1_premium),
    target2Premium: Number(r.target2_premium),
    riskPct: Number(r.risk_pct),
    ivAtStrike: Number(r.iv_at_strike),
    qualityScore: r.quality_score,
    reasoning: r.reasoning,
    context: r.context,
    createdAt: r.created_at.toISOString(),
    activatedAt: iso(r.activated_at),
    activationPremium: num(r.activation_premium),
    resolvedAt: iso(r.resolved_at),
    exitPremium: num(r.exit_premium),
    hitSl: r.hit_sl,
    hitTarget: r.hit_target,
    profitLossPct: num(r.profit_loss_pct),
    profitLossPoints: num(r.profit_loss_points),
    maxPremiumReached: num(r.max_premium_reached),
    minPremiumReached: num(r.min_premium_reached),
    lastCheckedAt: iso(r.last_checked_at),
    lastPremium: num(r.last_premium),
    resolutionReason: r.resolution_reason,
  };
}

export async function insertTradeSetup(client: PoolClient, s: TradeSetup): Promise<void> {
  await client.query(
    `INSERT INTO oi_engine.trade_setups (${COLUMNS}) VALUES (
       $1,$2,$3,$4,$5,$6,$7,
       $8,$9,$10,$11,$12,$13,
       $14,$15,$16,$17,
       $18,$19,$20,$21,$22,$23,
       $24,$25,$26,$27,
       $28,$29,$30
     )`,
    [
      s.id, s.analysisId, s.status, s.direction, s.strike, s.optionType, s.moneyness,
      s.entryPremium, s.slPremium, s.target1Premium, s.target2Premium, s.riskPct, s.ivAtStrike,
      s.qualityScore, s.reasoning, JSON.stringify(s.context), s.createdAt,
      s.activatedAt, s.activationPremium, s.resolvedAt, s.exitPremium, s.hitSl, s.hitTarget,
      s.profitLossPct, s.profitLossPoints, s.maxPremiumReached, s.minPremiumReached,
      s.lastCheckedAt, s.lastPremium, s.resolutionReason,
    ],
  );
}

/** Writes every mutable lifecycle field; proposal and creation fields never change. */
export async function updateTradeSetup(client: PoolClient, s: TradeSetup): Promise<void> {
  const result = await client.query(
    `UPDATE oi_engine.trade_setups SET
       status = $2,
       activated_at = $3,
       activation_premium = $4,
       resolved_at = $5,
       exit_premium = $6,
       hit_sl = $7,
       hit_target = $8,
       profit_loss_pct = $9,
       profit_loss_points = $10,
       max_premium_reached = $11,
       min_premium_reached = $12,
       last_checked_at = $13,
       last_premium = $14,
       resolution_reason = $15
     WHERE id = $1`,
    [
      s.id, s.status, s.activatedAt, s.activationPremium, s.resolvedAt, s.exitPremium,
      s.hitSl, s.hitTarget, s.profitLossPct, s.profitLossPoints,
      s.maxPremiumReached, s.minPremiumReached, s.lastCheckedAt, s.lastPremium, s.resolutionReason,
    ],
  );
  if ((result.rowCount ?? 0) === 0) throw new Error(`Trade setup ${s.id} not found`);
}

export async function getOpenTradeSetup(): Promise<TradeSetup | null> {
  const pool = getPool();
  const { rows } = await pool.query<TradeSetupRow>(
    `SELECT ${COLUMNS} FROM oi_engine.trade_setups
     WHERE status IN ('PENDING','ACTIVE')
     ORDER BY created_at DESC
     LIMIT 1`,
  );
  const row = rows[0];
  return row ? rowToSetup(row) : null;
}

/**
 * The newest setup plus the latest cancelled and latest WON/LOST ones: every
 * row the cross-tick lifecycle state depends on.
 */
export async function getLifecycleState(): Promise<LifecycleState> {
  const pool = getPool();
  const { rows } = await pool.query<TradeSetupRow>(
    `(SELECT ${COLUMNS} FROM oi_engine.trade_setups
      ORDER BY created_at DESC LIMIT 1)
     UNION ALL
     (SELECT ${COLUMNS} FROM oi_engine.trade_setups
      WHERE status = 'CANCELLED' AND resolved_at IS NOT NULL
      ORDER BY resolved_at DESC LIMIT 1)
     UNION ALL
     (SELECT ${COLUMNS} FROM oi_engine.trade_setups
      WHERE status IN ('WON','LOST') AND resolved_at IS NOT NULL
      ORDER BY resolved_at DESC LIMIT 1)`,
  );
  return lifecycleStateFrom(rows.map(rowToSetup));
}

/** Setups created on a given exchange-local date. */
export async function getTradeSetupsForDate(date: string, timeZone: string): Promise<TradeSetup[]> {
  const pool = getPool();
  const { rows } = await pool.query<TradeSetupRow>(
    `SELECT ${COLUMNS} FROM oi_engine.trade_setups
     WHERE (created_at AT TIME ZONE $2)::date = $1::date
     ORDER BY created_at ASC`,
    [date, timeZone],
  );
  return rows.map(rowToSetup);
}

export const pgTradeSetupStore: TradeSetupStore = {
  getOpen: getOpenTradeSetup,
  getLifecycleState,
  update: s => withTransaction(client => updateTradeSetup(client, s)),
};
