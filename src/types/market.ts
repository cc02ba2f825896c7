import { z } from 'zod';

export type OptionType = 'CE' | 'PE';

/**
 * One strike of the option chain at a single capture time.
 * IV, volume and last price are 0 when the venue did not report them.
 */
export interface StrikeMetrics {
  strike: number;
  ceOi: number;
  ceOiChange: number;
  ceVolume: number;
  ceIv: number;
  ceLtp: number;
  peOi: number;
  peOiChange: number;
  peVolume: number;
  peIv: number;
  peLtp: number;
}

export interface Snapshot {
  timestamp: string;        // ISO-8601
  spotPrice: number;
  expiry: string;           // e.g. 2026-10-22
  strikes: ReadonlyMap<number, StrikeMetrics>;
}

/** (call, put) OI-change totals recorded by a previous analysis */
export interface OiChangePair {
  callOiChange: number;
  putOiChange: number;
}

/**
 * Rolling context supplied by the history provider each tick, oldest first.
 * The engine never keeps any of it between calls.
 */
export interface MarketContext {
  priceHistory: number[];
  priorOiChanges: OiChangePair[];
  previousStrikes: ReadonlyMap<number, StrikeMetrics> | null;
  volatilityIndex: number | null;
  futuresOiChange: number | null;
}

// ── Boundary validation ─────────────────────────────────────────────────────

const count = z.coerce.number().int().nonnegative().catch(0);
const signedCount = z.coerce.number().int().catch(0);
const price = z.coerce.number().nonnegative().catch(0);

export const strikeMetricsSchema = z.object({
  strike: z.coerce.number().int().positive(),
  ce_oi: count.default(0),
  ce_oi_change: signedCount.default(0),
  ce_volume: count.default(0),
  ce_iv: price.default(0),
  ce_ltp: price.default(0),
  pe_oi: count.default(0),
  pe_oi_change: signedCount.default(0),
  pe_volume: count.default(0),
  pe_iv: price.default(0),
  pe_ltp: price.default(0),
});

export const snapshotSchema = z.object({
  timestamp: z.union([z.string(), z.date()]).transform((v, ctx) => {
    const d = v instanceof Date ? v : new Date(v);
    if (Number.isNaN(d.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid timestamp' });
      return z.NEVER;
    }
    return d.toISOString();
  }),
  spot_price: z.coerce.number().positive(),
  expiry: z.string().min(1),
  strikes: z.array(strikeMetricsSchema),
});

export type SnapshotParseResult =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; error: string };

export function toStrikeMetrics(raw: z.output<typeof strikeMetricsSchema>): StrikeMetrics {
  return {
    strike: raw.strike,
    ceOi: raw.ce_oi,
    ceOiChange: raw.ce_oi_change,
    ceVolume: raw.ce_volume,
    ceIv: raw.ce_iv,
    ceLtp: raw.ce_ltp,
    peOi: raw.pe_oi,
    peOiChange: raw.pe_oi_change,
    peVolume: raw.pe_volume,
    peIv: raw.pe_iv,
    peLtp: raw.pe_ltp,
  };
}

/** Build a strike map from already-validated metrics. Later duplicates win. */
export function strikeMap(list: Iterable<StrikeMetrics>): Map<number, StrikeMetrics> {
  const map = new Map<number, StrikeMetrics>();
  for (const m of list) map.set(m.strike, m);
  return map;
}

/**
 * Validate a raw snapshot once at the boundary. Absent or malformed
 * IV/volume/price fields become 0; a bad timestamp, spot or strike fails.
 */
export function parseSnapshot(raw: unknown): SnapshotParseResult {
  const result = snapshotSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    return { ok: false, error: issues };
  }
  const { timestamp, spot_price, expiry, strikes } = result.data;
  return {
    ok: true,
    snapshot: {
      timestamp,
      spotPrice: spot_price,
      expiry,
      strikes: strikeMap(strikes.map(toStrikeMetrics)),
    },
  };
}

export function sortedStrikes(strikes: ReadonlyMap<number, StrikeMetrics>): number[] {
  return [...strikes.keys()].sort((a, b) => a - b);
}

export function ltpFor(m: StrikeMetrics | undefined, type: OptionType): number {
  if (!m) return 0;
  return type === 'CE' ? m.ceLtp : m.peLtp;
}
