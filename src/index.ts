import 'dotenv/config';
import { config } from './config.js';
import { runMigrations } from './db/migrate.js';
import { closePool } from './db/client.js';
import { startScheduler, stopScheduler, triggerManual } from './scheduler.js';
import { getOpenTradeSetup } from './db/repositories/trade-setups.js';
import { notifyStartup } from './telegram/notifier.js';

async function main(): Promise<void> {
  console.log(`[Boot] oi-tug-of-war starting (${config.NODE_ENV})`);

  // ── Database ────────────────────────────────────────────────────────────
  console.log('[Boot] Running database migrations...');
  const applied = await runMigrations();
  console.log(`[Boot] Database ready (${applied.length} migration(s) applied)`);

  // ── Open setup carried over from a previous run ─────────────────────────
  const open = await getOpenTradeSetup();
  console.log(open
    ? `[Boot] Resuming ${open.status} setup ${open.id}: ${open.direction} ${open.strike} ${open.optionType}`
    : '[Boot] No open setup');

  // ── One-shot mode ───────────────────────────────────────────────────────
  if (process.argv.includes('--once')) {
    await triggerManual();
    await closePool();
    return;
  }

  // ── Scheduler ───────────────────────────────────────────────────────────
  startScheduler();

  await notifyStartup();
  console.log('[Boot] All systems up');

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Boot] ${signal} received, shutting down`);
    stopScheduler();
    await closePool();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
