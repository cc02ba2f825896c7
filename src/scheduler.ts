import cron from 'node-cron';
import { runTick } from './pipeline/tick-pipeline.js';
import { runRetentionCleanup, sendDailySummary } from './pipeline/daily-cleanup.js';
import { runSessionClose } from './pipeline/session-close.js';
import { pgSnapshotStore } from './db/repositories/snapshots.js';
import { pgAnalysisStore } from './db/repositories/analyses.js';
import { pgTradeSetupStore } from './db/repositories/trade-setups.js';
import { pgTickStore } from './db/repositories/ticks.js';
import { StaticLearner } from './agents/config-learner.js';
import { notifyAlert, notifyAnalysis, telegramEventSink } from './telegram/notifier.js';
import { config, engineSettings, lifecycleSettings } from './config.js';
import { isWithinWindow, parseClock } from './lib/market-clock.js';
import type { ScheduledTask } from 'node-cron';
import type { TickDeps } from './pipeline/tick-pipeline.js';

const TICK_INTERVAL_MS = config.FETCH_INTERVAL_MIN * 60 * 1000;

/** Process snapshots from the setup window start until market close. */
const SESSION_START = config.SETUP_START;
const SESSION_END = config.MARKET_CLOSE;

const deps: TickDeps = {
  snapshots: pgSnapshotStore,
  analyses: pgAnalysisStore,
  setups: pgTradeSetupStore,
  ticks: pgTickStore,
  events: telegramEventSink,
  learner: new StaticLearner({
    minConfidence: config.MIN_CONFIDENCE,
    maxConfidence: config.MAX_CONFIDENCE,
    excludeRanges: config.EXCLUDE_CONFIDENCE_RANGES,
    skipVerdicts: config.SKIP_VERDICTS,
    paused: config.TRADING_PAUSED,
  }),
  engine: engineSettings(config),
  lifecycle: lifecycleSettings(config),
  priceHistoryLength: config.PRICE_HISTORY_LENGTH,
  oiHistoryLength: config.OI_HISTORY_LENGTH,
};

function isSessionWindow(now: Date): boolean {
  const day = new Intl.DateTimeFormat('en-US', { timeZone: config.MARKET_TIMEZONE, weekday: 'short' }).format(now);
  if (day === 'Sat' || day === 'Sun') return false;
  return isWithinWindow(now.toISOString(), SESSION_START, SESSION_END, config.MARKET_TIMEZONE);
}

/**
 * Delay to the next multiple of FETCH_INTERVAL_MIN since the epoch, so ticks
 * sit on wall-clock boundaries (:00, :03, :06 for 3 min). A boundary closer
 * than 100 ms is skipped for the one after it.
 */
function msUntilNextBoundary(): number {
  const now = Date.now();
  const delay = TICK_INTERVAL_MS - (now % TICK_INTERVAL_MS);
  return delay < 100 ? delay + TICK_INTERVAL_MS : delay;
}

/** The tick or session-close job currently running, if any. */
let inFlight: Promise<void> | null = null;
let timer: NodeJS.Timeout | null = null;
const cronTasks: ScheduledTask[] = [];

async function runGuarded(label: string, job: () => Promise<void>): Promise<void> {
  const run = (async () => {
    try {
      await job();
    } catch (err) {
      const msg = `${label} failed: ${err instanceof Error ? err.message : String(err)}`;
      console.error('[Scheduler]', msg);
      await notifyAlert(msg);
    }
  })();
  inFlight = run;
  try {
    await run;
  } finally {
    inFlight = null;
  }
}

async function processLatestSnapshot(): Promise<void> {
  if (inFlight) {
    console.log('[Scheduler] Skipping, previous tick still active');
    return;
  }

  await runGuarded('Tick', async () => {
    const stored = await deps.snapshots.latestUnprocessed();
    if (!stored) {
      console.log('[Scheduler] No new snapshot');
      return;
    }
    const result = await runTick(stored, deps);
    if (result.error) {
      await notifyAlert(`Tick failed for snapshot ${stored.id}: ${result.error}`);
    } else if (result.created && result.analysis) {
      await notifyAnalysis(result.analysis);
    }
  });
}

/** Waits for a running tick, then closes out the open setup. */
async function closeSession(): Promise<void> {
  if (inFlight) await inFlight;
  await runGuarded('Session close', async () => {
    await runSessionClose(deps);
  });
}

/**
 * Self-correcting tick scheduler. Arms the next tick before running the
 * current one so a slow tick never delays the cadence; overlapping ticks are
 * skipped while another job is in flight.
 */
function scheduleTick(): void {
  timer = setTimeout(() => {
    scheduleTick();
    if (isSessionWindow(new Date())) {
      void processLatestSnapshot();
    }
  }, msUntilNextBoundary());
}

function cronAt(hhmm: string, offsetMinutes = 0): string {
  const minutes = parseClock(hhmm) + offsetMinutes;
  return `${minutes % 60} ${Math.floor(minutes / 60) % 24} * * 1-5`;
}

export function startScheduler(): void {
  scheduleTick();
  console.log(
    `[Scheduler] Tick interval: every ${config.FETCH_INTERVAL_MIN} min, ` +
    `Mon-Fri ${SESSION_START}-${SESSION_END} ${config.MARKET_TIMEZONE}`,
  );

  const closeCron = cronAt(config.MARKET_CLOSE);
  cronTasks.push(cron.schedule(closeCron, async () => {
    console.log('[Scheduler] Session close triggered');
    await closeSession();
  }, { timezone: config.MARKET_TIMEZONE }));
  console.log(`[Scheduler] Session close cron: "${closeCron}" (${config.MARKET_TIMEZONE})`);

  const summaryCron = cronAt(config.MARKET_CLOSE, 5);
  cronTasks.push(cron.schedule(summaryCron, async () => {
    console.log('[Scheduler] Daily summary triggered');
    try {
      await sendDailySummary(config.MARKET_TIMEZONE);
    } catch (err) {
      console.error('[Scheduler] Daily summary failed:', err);
    }
  }, { timezone: config.MARKET_TIMEZONE }));
  console.log(`[Scheduler] Summary cron: "${summaryCron}" (${config.MARKET_TIMEZONE})`);

  const cleanupCron = '0 7 * * 1-5';
  cronTasks.push(cron.schedule(cleanupCron, async () => {
    console.log('[Scheduler] Retention cleanup triggered');
    await runRetentionCleanup(config.RETENTION_DAYS);
  }, { timezone: config.MARKET_TIMEZONE }));
  console.log(`[Scheduler] Cleanup cron: "${cleanupCron}" (${config.MARKET_TIMEZONE})`);
}

/** Cancel the tick chain and cron jobs. A tick already in flight runs to completion. */
export function stopScheduler(): void {
  if (timer) clearTimeout(timer);
  timer = null;
  for (const task of cronTasks.splice(0)) task.stop();
  console.log('[Scheduler] Stopped');
}

/** Process the newest unprocessed snapshot once, outside the schedule. */
export async function triggerManual(): Promise<void> {
  await processLatestSnapshot();
}
