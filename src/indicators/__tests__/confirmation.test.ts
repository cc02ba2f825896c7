import { describe, expect, it } from 'vitest';
import { confirmationStatus, detectTrap } from '../confirmation.js';
import type { OiClusters } from '../../types/analysis.js';

describe('confirmationStatus', () => {
  it('classifies OI against price', () => {
    expect(confirmationStatus(30, 'bullish')).toBe('CONFIRMED');
    expect(confirmationStatus(30, 'bearish')).toBe('CONFLICT');
    expect(confirmationStatus(45, 'bearish')).toBe('REVERSAL_ALERT');
    expect(confirmationStatus(-40, 'bullish')).toBe('REVERSAL_ALERT');
    expect(confirmationStatus(0, 'bullish')).toBe('NEUTRAL');
    expect(confirmationStatus(30, 'neutral')).toBe('NEUTRAL');
  });
});

describe('detectTrap', () => {
  const clusters = (resistance: number[], support: number[]): OiClusters => ({
    resistance: resistance.map(strike => ({ strike, oi: 1 })),
    support: support.map(strike => ({ strike, oi: 1 })),
    strongestResistance: resistance[0] ?? null,
    strongestSupport: support[0] ?? null,
  });

  it('warns of a bull trap near a call wall', () => {
    const trap = detectTrap(-45, 'bullish', clusters([24100, 24150], []), 24000);
    expect(trap?.type).toBe('BULL_TRAP');
    expect(trap?.level).toBe(24100);
    expect(trap?.message).toBe('Price rising into call wall at 24100 (0.42% away) while OI is strongly bearish');
  });

  it('warns of a bear trap near a put wall', () => {
    const trap = detectTrap(45, 'bearish', clusters([], [23850, 23900]), 24000);
    expect(trap?.type).toBe('BEAR_TRAP');
    expect(trap?.level).toBe(23900);
  });

  it('ignores walls more than 1% away and weak scores', () => {
    expect(detectTrap(-45, 'bullish', clusters([24300], []), 24000)).toBeNull();
    expect(detectTrap(-30, 'bullish', clusters([24100], []), 24000)).toBeNull();
  });
});
