import { describe, expect, it } from 'vitest';
import { computeOiAcceleration } from '../oi-acceleration.js';

describe('computeOiAcceleration', () => {
  it('is neutral without prior data', () => {
    expect(computeOiAcceleration({ callOiChange: 5000, putOiChange: 100 }, [], 50)).toEqual({
      phase: 'neutral',
      callAcceleration: 0,
      putAcceleration: 0,
      netAcceleration: 0,
      adjustment: 0,
    });
  });

  it('splits unwinding by momentum', () => {
    const current = { callOiChange: 100, putOiChange: 100 };
    const prior = [{ callOiChange: 1000, putOiChange: 1000 }];

    expect(computeOiAcceleration(current, prior, 20)).toMatchObject({ phase: 'short_covering', adjustment: 15 });
    expect(computeOiAcceleration(current, prior, -20)).toMatchObject({ phase: 'profit_booking', adjustment: -15 });
    expect(computeOiAcceleration(current, prior, 0)).toMatchObject({ phase: 'unwinding', adjustment: 0 });
  });

  it('detects put-side accumulation against the prior average', () => {
    const result = computeOiAcceleration(
      { callOiChange: 1000, putOiChange: 5000 },
      [{ callOiChange: 1000, putOiChange: 1000 }, { callOiChange: 1000, putOiChange: 3000 }],
      0,
    );
    expect(result).toEqual({
      phase: 'accumulation',
      callAcceleration: 0,
      putAcceleration: 3000,
      netAcceleration: 3000,
      adjustment: 10,
    });
  });

  it('detects call-side distribution', () => {
    const result = computeOiAcceleration(
      { callOiChange: 5000, putOiChange: 1000 },
      [{ callOiChange: 1000, putOiChange: 1000 }],
      0,
    );
    expect(result).toMatchObject({ phase: 'distribution', netAcceleration: -4000, adjustment: -10 });
  });

  it('ignores small balanced changes', () => {
    const result = computeOiAcceleration(
      { callOiChange: 1100, putOiChange: 1100 },
      [{ callOiChange: 1000, putOiChange: 1000 }],
      0,
    );
    expect(result).toMatchObject({ phase: 'neutral', netAcceleration: 0, adjustment: 0 });
  });
});
