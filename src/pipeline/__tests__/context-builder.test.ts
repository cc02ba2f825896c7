import { describe, expect, it } from 'vitest';
import { buildMarketContext } from '../context-builder.js';
import { strikeMap } from '../../types/market.js';
import { strike } from '../../__tests__/fixtures.js';
import type { OiChangeHistory, SnapshotHistory } from '../context-builder.js';

describe('buildMarketContext', () => {
  it('collects history before the tick and drops unusable prices', async () => {
    const previous = strikeMap([strike(24000, { ceLtp: 100 })]);
    const calls: string[] = [];
    const snapshots: SnapshotHistory = {
      async recentSpotPrices(before, limit) {
        calls.push(`prices ${before} ${limit}`);
        return [23900, 0, Number.NaN, 23950];
      },
      async previousStrikes(before) {
        calls.push(`strikes ${before}`);
        return previous;
      },
    };
    const analyses: OiChangeHistory = {
      async recentOiChanges(before, limit) {
        calls.push(`oi ${before} ${limit}`);
        return [{ callOiChange: 10, putOiChange: 20 }];
      },
    };

    const context = await buildMarketContext(snapshots, analyses, {
      before: '2026-10-19T04:30:00.000Z',
      priceHistoryLength: 10,
      oiHistoryLength: 5,
      volatilityIndex: 14.5,
      futuresOiChange: -1200,
    });

    expect(context).toEqual({
      priceHistory: [23900, 23950],
      priorOiChanges: [{ callOiChange: 10, putOiChange: 20 }],
      previousStrikes: previous,
      volatilityIndex: 14.5,
      futuresOiChange: -1200,
    });
    expect(calls.sort()).toEqual([
      'oi 2026-10-19T04:30:00.000Z 5',
      'prices 2026-10-19T04:30:00.000Z 10',
      'strikes 2026-10-19T04:30:00.000Z',
    ]);
  });
});
