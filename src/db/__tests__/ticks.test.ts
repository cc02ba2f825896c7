import { beforeEach, describe, expect, it, vi } from 'vitest';
import { persistTick } from '../repositories/ticks.js';
import { analysis, setup } from '../../__tests__/fixtures.js';

const db = vi.hoisted(() => {
  const state: { statements: string[]; failOn: string | null; released: number } = {
    statements: [],
    failOn: null,
    released: 0,
  };
  return state;
});

// In-process stand-in for one pooled connection: records the leading words of each statement.
vi.mock('pg', () => ({
  Pool: class {
    on(): void {}

    async connect() {
      return {
        query: async (text: string) => {
          db.statements.push(text.trim().split(/\s+/).slice(0, 3).join(' '));
          if (db.failOn !== null && text.includes(db.failOn)) throw new Error('connection reset');
          return { rows: [], rowCount: 1 };
        },
        release: () => {
          db.released++;
        },
      };
    }
  },
}));

describe('persistTick', () => {
  beforeEach(() => {
    db.statements = [];
    db.failOn = null;
    db.released = 0;
  });

  it('writes the analysis and both setup changes in one transaction', async () => {
    await persistTick({
      snapshotId: 'snap-1',
      analysis: analysis(),
      updated: setup({ status: 'EXPIRED' }),
      created: setup({ id: 'setup-2' }),
    });

    expect(db.statements).toEqual([
      'BEGIN',
      'INSERT INTO oi_engine.analyses',
      'UPDATE oi_engine.trade_setups SET',
      'INSERT INTO oi_engine.trade_setups',
      'COMMIT',
    ]);
    expect(db.released).toBe(1);
  });

  it('rolls the analysis back when the setup update fails', async () => {
    db.failOn = 'UPDATE oi_engine.trade_setups';

    await expect(
      persistTick({ snapshotId: 'snap-1', analysis: analysis(), updated: setup({ status: 'LOST' }), created: null }),
    ).rejects.toThrow('connection reset');

    expect(db.statements).toEqual([
      'BEGIN',
      'INSERT INTO oi_engine.analyses',
      'UPDATE oi_engine.trade_setups SET',
      'ROLLBACK',
    ]);
    expect(db.released).toBe(1);
  });
});
