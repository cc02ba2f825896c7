import { ltpFor, sortedStrikes } from '../types/market.js';
import type { OptionType, Snapshot, StrikeMetrics } from '../types/market.js';
import type { Analysis } from '../types/analysis.js';
import type { Moneyness, TradeDirection, TradeSetupProposal } from '../types/trade.js';

export const DEFAULT_SL_PCT = 20;

/** Stop-loss % widens with implied volatility. Unknown IV gets the default. */
export function stopLossPct(iv: number): number {
  if (!(iv > 0)) return DEFAULT_SL_PCT;
  if (iv < 12) return 15;
  if (iv < 15) return 18;
  if (iv < 18) return 20;
  if (iv < 22) return 22;
  return 25;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

interface Candidate {
  strike: number;
  moneyness: Moneyness;
}

/**
 * ITM, ATM, OTM in that order. For calls ITM sits one strike below ATM; for
 * puts one strike above.
 */
export function candidateStrikes(atmStrike: number, strikes: number[], type: OptionType): Candidate[] {
  const idx = strikes.indexOf(atmStrike);
  if (idx < 0) return [];
  const below = strikes[idx - 1];
  const above = strikes[idx + 1];
  const itm = type === 'CE' ? below : above;
  const otm = type === 'CE' ? above : below;

  const out: Candidate[] = [];
  if (itm !== undefined) out.push({ strike: itm, moneyness: 'ITM' });
  out.push({ strike: atmStrike, moneyness: 'ATM' });
  if (otm !== undefined) out.push({ strike: otm, moneyness: 'OTM' });
  return out;
}

function ivFor(m: StrikeMetrics, type: OptionType): number {
  return type === 'CE' ? m.ceIv : m.peIv;
}

/**
 * Turn a directional analysis into a concrete option buy: first candidate
 * with a positive last price, stop from the IV bucket, targets at 1R and 2R.
 * Null for a neutral verdict or when no candidate has a usable price.
 */
export function buildTradeSetup(analysis: Analysis, snapshot: Snapshot): TradeSetupProposal | null {
  if (analysis.direction === 'neutral') return null;

  const direction: TradeDirection = analysis.direction === 'bullish' ? 'BUY_CALL' : 'BUY_PUT';
  const optionType: OptionType = direction === 'BUY_CALL' ? 'CE' : 'PE';
  const strikes = sortedStrikes(snapshot.strikes);

  for (const c of candidateStrikes(analysis.atmStrike, strikes, optionType)) {
    const m = snapshot.strikes.get(c.strike);
    const entry = ltpFor(m, optionType);
    if (!m || !(entry > 0)) continue;

    const iv = ivFor(m, optionType);
    const riskPct = stopLossPct(iv);
    // Entry is the quoted price itself: activation compares against it.
    const entryPremium = entry;
    const slPremium = round2(entryPremium * (1 - riskPct / 100));
    const risk = entryPremium - slPremium;

    return {
      direction,
      strike: c.strike,
      optionType,
      moneyness: c.moneyness,
      entryPremium,
      slPremium,
      target1Premium: round2(entryPremium + risk),
      target2Premium: round2(entryPremium + 2 * risk),
      riskPct,
      ivAtStrike: iv,
    };
  }
  return null;
}
