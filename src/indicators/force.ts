import type { StrikeMetrics } from '../types/market.js';
import type { StrikeForce, ZoneBreakdown, ZoneName } from '../types/analysis.js';

const NOISE_OI_CHANGE = 100;

/**
 * Conviction multiplier from volume turnover against OI change.
 * Small OI changes are treated as noise regardless of volume.
 */
export function convictionMultiplier(volume: number, oiChange: number): number {
  const absChange = Math.abs(oiChange);
  if (absChange < NOISE_OI_CHANGE) return 0.5;

  const turnover = volume / Math.max(1, absChange);
  if (turnover > 0.5) return 1.5;
  if (turnover > 0.2) return 1.0;
  return 0.5;
}

/**
 * Ratio that expresses total OI in OI-change units:
 * avg(total OI) / avg(|OI change|) over both sides of the active strikes.
 * Falls back to 1 when either average is zero.
 */
export function oiScale(metrics: StrikeMetrics[]): number {
  if (metrics.length === 0) return 1;
  let oiSum = 0;
  let changeSum = 0;
  for (const m of metrics) {
    oiSum += m.ceOi + m.peOi;
    changeSum += Math.abs(m.ceOiChange) + Math.abs(m.peOiChange);
  }
  const n = metrics.length * 2;
  const avgOi = oiSum / n;
  const avgChange = changeSum / n;
  if (avgOi <= 0 || avgChange <= 0) return 1;
  const scale = avgOi / avgChange;
  return Number.isFinite(scale) && scale > 0 ? scale : 1;
}

/** force = conviction × ((1 − w) × ΔOI + w × OI / scale) */
export function computeForce(
  oi: number,
  oiChange: number,
  volume: number,
  totalOiWeight: number,
  scale: number,
): Omit<StrikeForce, 'strike'> {
  const conviction = convictionMultiplier(volume, oiChange);
  const safeScale = scale > 0 && Number.isFinite(scale) ? scale : 1;
  const force = conviction * ((1 - totalOiWeight) * oiChange + totalOiWeight * (oi / safeScale));
  return { oi, oiChange, volume, conviction, force };
}

export function strikeForce(
  m: StrikeMetrics,
  side: 'CE' | 'PE',
  totalOiWeight: number,
  scale: number,
): StrikeForce {
  const f = side === 'CE'
    ? computeForce(m.ceOi, m.ceOiChange, m.ceVolume, totalOiWeight, scale)
    : computeForce(m.peOi, m.peOiChange, m.peVolume, totalOiWeight, scale);
  return { strike: m.strike, ...f };
}

export function buildZone(
  zone: ZoneName,
  metrics: StrikeMetrics[],
  side: 'CE' | 'PE',
  totalOiWeight: number,
  scale: number,
): ZoneBreakdown {
  const strikes = metrics.map(m => strikeForce(m, side, totalOiWeight, scale));
  return {
    zone,
    strikes,
    totalOi: strikes.reduce((a, s) => a + s.oi, 0),
    totalOiChange: strikes.reduce((a, s) => a + s.oiChange, 0),
    force: strikes.reduce((a, s) => a + s.force, 0),
  };
}
