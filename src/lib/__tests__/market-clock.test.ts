import { describe, expect, it } from 'vitest';
import {
  isAtOrAfter,
  isWithinWindow,
  localDate,
  minutesBetween,
  minutesOfDay,
  parseClock,
} from '../market-clock.js';
import { ist } from '../../__tests__/fixtures.js';

const TZ = 'Asia/Kolkata';

describe('market clock', () => {
  it('reads exchange-local minutes from a UTC timestamp', () => {
    expect(minutesOfDay('2026-10-19T04:00:00Z', TZ)).toBe(570);
  });

  it('parses HH:MM and rejects anything else', () => {
    expect(parseClock('9:05')).toBe(545);
    expect(parseClock('15:25')).toBe(925);
    expect(() => parseClock('24:00')).toThrow('Invalid clock time "24:00"');
    expect(() => parseClock('noon')).toThrow('expected HH:MM');
  });

  it('treats both window edges as inside', () => {
    expect(isWithinWindow(ist('09:30'), '09:30', '15:15', TZ)).toBe(true);
    expect(isWithinWindow(ist('15:15'), '09:30', '15:15', TZ)).toBe(true);
    expect(isWithinWindow(ist('15:16'), '09:30', '15:15', TZ)).toBe(false);
    expect(isAtOrAfter(ist('15:20'), '15:20', TZ)).toBe(true);
    expect(isAtOrAfter(ist('15:19'), '15:20', TZ)).toBe(false);
  });

  it('rolls the local date past midnight', () => {
    expect(localDate('2026-10-19T20:00:00Z', TZ)).toBe('2026-10-20');
  });

  it('measures minutes between timestamps', () => {
    expect(minutesBetween(ist('10:00'), ist('10:31'))).toBe(31);
  });
});
