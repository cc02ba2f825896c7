import { withTransaction } from '../client.js';
import { insertAnalysis } from './analyses.js';
import { insertTradeSetup, updateTradeSetup } from './trade-setups.js';
import type { TickStore, TickWrite } from '../../pipeline/tick-pipeline.js';

/**
 * A tick's analysis row and setup changes in one transaction. The analysis
 * row marks its snapshot processed, so it must not land without them.
 */
export async function persistTick(write: TickWrite): Promise<void> {
  await withTransaction(async client => {
    await insertAnalysis(client, write.analysis, write.snapshotId);
    // update before insert: one open setup at a time
    if (write.updated) await updateTradeSetup(client, write.updated);
    if (write.created) await insertTradeSetup(client, write.created);
  });
}

export const pgTickStore: TickStore = { persistTick };
