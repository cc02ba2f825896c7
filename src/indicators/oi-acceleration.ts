import type { OiChangePair } from '../types/market.js';
import type { OiAcceleration } from '../types/analysis.js';

const MOMENTUM_TRIGGER = 15;
const UNWIND_ADJUSTMENT = 15;
const BUILDUP_ADJUSTMENT = 10;
/** Net acceleration must exceed this fraction of prior activity to count as strong */
const STRONG_ACCEL_FRACTION = 0.2;

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Compare current call/put OI-change totals with the average of the prior
 * window and classify the phase. Needs at least one prior pair.
 */
export function computeOiAcceleration(
  current: OiChangePair,
  prior: OiChangePair[],
  momentum: number,
): OiAcceleration {
  if (prior.length === 0) {
    return { phase: 'neutral', callAcceleration: 0, putAcceleration: 0, netAcceleration: 0, adjustment: 0 };
  }

  const priorCall = average(prior.map(p => p.callOiChange));
  const priorPut = average(prior.map(p => p.putOiChange));
  const callAcceleration = current.callOiChange - priorCall;
  const putAcceleration = current.putOiChange - priorPut;
  const netAcceleration = putAcceleration - callAcceleration;
  const base = { callAcceleration, putAcceleration, netAcceleration };

  const callShrinking = Math.abs(current.callOiChange) < Math.abs(priorCall);
  const putShrinking = Math.abs(current.putOiChange) < Math.abs(priorPut);
  if (callShrinking && putShrinking) {
    if (momentum > MOMENTUM_TRIGGER) return { ...base, phase: 'short_covering', adjustment: UNWIND_ADJUSTMENT };
    if (momentum < -MOMENTUM_TRIGGER) return { ...base, phase: 'profit_booking', adjustment: -UNWIND_ADJUSTMENT };
    return { ...base, phase: 'unwinding', adjustment: 0 };
  }

  const threshold = Math.max(1, STRONG_ACCEL_FRACTION * (Math.abs(priorCall) + Math.abs(priorPut)));
  if (netAcceleration > threshold && (putAcceleration > 0 || callAcceleration < 0)) {
    return { ...base, phase: 'accumulation', adjustment: BUILDUP_ADJUSTMENT };
  }
  if (netAcceleration < -threshold && (callAcceleration > 0 || putAcceleration < 0)) {
    return { ...base, phase: 'distribution', adjustment: -BUILDUP_ADJUSTMENT };
  }
  return { ...base, phase: 'neutral', adjustment: 0 };
}
