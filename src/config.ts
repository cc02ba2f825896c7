import { z } from 'zod';
import 'dotenv/config';
import { parseClock } from './lib/market-clock.js';
import type { EngineSettings } from './agents/analysis-agent.js';
import type { LifecycleSettings } from './types/trade.js';
import type { ConfidenceRange } from './types/learner.js';

const clockTime = z.string().refine(v => {
  try {
    parseClock(v);
    return true;
  } catch {
    return false;
  }
}, { message: 'expected HH:MM' });

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform(v => v === 'true' || v === '1' || v === 'yes');

/** "70-75,90-95" → [{min:70,max:75},{min:90,max:95}] */
const confidenceRanges = z
  .string()
  .default('70-75,90-95')
  .transform((value, ctx): ConfidenceRange[] => {
    const ranges: ConfidenceRange[] = [];
    for (const part of value.split(',').map(p => p.trim()).filter(Boolean)) {
      const match = /^(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)$/.exec(part);
      if (!match) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad range "${part}" (expected MIN-MAX)` });
        return z.NEVER;
      }
      ranges.push({ min: Number(match[1]), max: Number(match[2]) });
    }
    return ranges;
  });

const commaList = z
  .string()
  .default('')
  .transform(v => v.split(',').map(s => s.trim()).filter(Boolean));

const configSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1),

  // Telegram (optional: notifications are skipped without a token)
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),

  // App
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Tug-of-war engine
  ZONE_WIDTH: z.coerce.number().int().positive().default(3),
  TOTAL_OI_WEIGHT: z.coerce.number().min(0).max(1).default(0.15),
  LEGACY_ZONE_WEIGHT: z.coerce.number().min(0).max(1).default(0.7),
  STRONG_SCORE: z.coerce.number().positive().default(40),
  MODERATE_SCORE: z.coerce.number().positive().default(15),
  PRICE_HISTORY_LENGTH: z.coerce.number().int().positive().default(10),
  OI_HISTORY_LENGTH: z.coerce.number().int().positive().default(5),

  // Setup lifecycle
  ENTRY_TOLERANCE_PCT: z.coerce.number().min(0).default(2),
  MAX_ENTRY_CHASE_PCT: z.coerce.number().min(0).default(10),
  RESOLUTION_COOLDOWN_CYCLES: z.coerce.number().int().min(0).default(12),
  CYCLE_MINUTES: z.coerce.number().positive().default(1),
  CANCELLATION_COOLDOWN_MIN: z.coerce.number().min(0).default(30),
  DIRECTION_FLIP_COOLDOWN_MIN: z.coerce.number().min(0).default(15),
  MOVE_THRESHOLD_PCT: z.coerce.number().positive().default(0.8),
  BOUNCE_THRESHOLD_PCT: z.coerce.number().positive().default(0.3),
  MOVE_LOOKBACK_TICKS: z.coerce.number().int().positive().default(3),
  MIN_CONFIRMATIONS: z.coerce.number().int().min(0).max(4).default(3),
  RANGE_BOUND_MAX_SL_PCT: z.coerce.number().positive().default(15),

  // Session clock (exchange-local)
  MARKET_TIMEZONE: z.string().min(1).default('Asia/Kolkata'),
  SETUP_START: clockTime.default('09:30'),
  SETUP_END: clockTime.default('15:15'),
  FORCE_CLOSE_TIME: clockTime.default('15:20'),
  MARKET_CLOSE: clockTime.default('15:25'),

  // Static learner thresholds
  MIN_CONFIDENCE: z.coerce.number().min(0).max(100).default(50),
  MAX_CONFIDENCE: z.coerce.number().min(0).max(100).default(100),
  EXCLUDE_CONFIDENCE_RANGES: confidenceRanges,
  SKIP_VERDICTS: commaList,
  TRADING_PAUSED: booleanFlag,

  // Scheduler
  FETCH_INTERVAL_MIN: z.coerce.number().int().positive().default(3),
  RETENTION_DAYS: z.coerce.number().int().positive().default(7),
});

type Config = z.infer<typeof configSchema>;

export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${missing}`);
  }
  return result.data;
}

export function engineSettings(c: Config): EngineSettings {
  return {
    zoneWidth: c.ZONE_WIDTH,
    totalOiWeight: c.TOTAL_OI_WEIGHT,
    legacyZoneWeight: c.LEGACY_ZONE_WEIGHT,
    verdictThresholds: { strong: c.STRONG_SCORE, moderate: c.MODERATE_SCORE },
  };
}

export function lifecycleSettings(c: Config): LifecycleSettings {
  return {
    entryTolerancePct: c.ENTRY_TOLERANCE_PCT,
    maxEntryChasePct: c.MAX_ENTRY_CHASE_PCT,
    resolutionCooldownCycles: c.RESOLUTION_COOLDOWN_CYCLES,
    cycleMinutes: c.CYCLE_MINUTES,
    cancellationCooldownMinutes: c.CANCELLATION_COOLDOWN_MIN,
    directionFlipCooldownMinutes: c.DIRECTION_FLIP_COOLDOWN_MIN,
    moveThresholdPct: c.MOVE_THRESHOLD_PCT,
    bounceThresholdPct: c.BOUNCE_THRESHOLD_PCT,
    moveLookbackTicks: c.MOVE_LOOKBACK_TICKS,
    minConfirmations: c.MIN_CONFIRMATIONS,
    rangeBoundMaxSlPct: c.RANGE_BOUND_MAX_SL_PCT,
    timeZone: c.MARKET_TIMEZONE,
    setupStart: c.SETUP_START,
    setupEnd: c.SETUP_END,
    forceCloseTime: c.FORCE_CLOSE_TIME,
    marketClose: c.MARKET_CLOSE,
  };
}

function loadConfig(): Config {
  return parseConfig(process.env);
}

export const config = loadConfig();
export type { Config };
