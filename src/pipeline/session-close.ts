import { SetupManager } from '../agents/setup-manager.js';
import type { SetupEventSink, TradeSetupStore } from './tick-pipeline.js';
import type { LifecycleSettings, SetupEvent } from '../types/trade.js';

export interface SessionCloseDeps {
  setups: TradeSetupStore;
  events: SetupEventSink;
  lifecycle: LifecycleSettings;
}

/** Market-close pass over the open setup; runs even when no tick lands after the cutoff. */
export async function runSessionClose(
  deps: SessionCloseDeps,
  timestamp: string = new Date().toISOString(),
): Promise<SetupEvent | null> {
  const open = await deps.setups.getOpen();
  if (!open) {
    console.log('[SessionClose] No open setup');
    return null;
  }

  const step = new SetupManager(deps.lifecycle).closeSession(open, timestamp);
  if (!step.applied) return null;
  await deps.setups.update(step.setup);

  const event: SetupEvent = { kind: 'SETUP_RESOLVED', setup: step.setup, previousStatus: open.status };
  console.log(`[SessionClose] Setup ${open.id} ${open.status} → ${step.setup.status}`);
  try {
    await deps.events.publish(event);
  } catch (err) {
    console.error(`[SessionClose] Event ${event.kind} not delivered:`, err);
  }
  return event;
}
