import { describe, expect, it } from 'vitest';
import { activeStrikes, findAtmStrike, partitionZones } from '../zones.js';
import { strikeMap } from '../../types/market.js';
import { strike } from '../../__tests__/fixtures.js';

const chain = strikeMap([23800, 23850, 23900, 23950, 24000, 24050, 24100, 24150, 24200].map(s => strike(s)));

describe('findAtmStrike', () => {
  it('picks the strike closest to spot', () => {
    expect(findAtmStrike(24025.5, [23950, 24000, 24050])).toBe(24000);
  });

  it('breaks a tie toward the lower strike', () => {
    expect(findAtmStrike(24025, [24050, 24000])).toBe(24000);
  });

  it('returns 0 for an empty chain', () => {
    expect(findAtmStrike(24000, [])).toBe(0);
  });
});

describe('partitionZones', () => {
  it('takes three strikes either side of ATM', () => {
    expect(partitionZones(24010, chain)).toEqual({
      atmStrike: 24000,
      below: [23850, 23900, 23950],
      above: [24050, 24100, 24150],
    });
  });

  it('truncates at the edge of the chain', () => {
    expect(partitionZones(23810, chain)).toEqual({
      atmStrike: 23800,
      below: [],
      above: [23850, 23900, 23950],
    });
  });

  it('honours a custom width', () => {
    expect(partitionZones(24000, chain, 1)).toEqual({ atmStrike: 24000, below: [23950], above: [24050] });
  });

  it('returns null for an empty chain', () => {
    expect(partitionZones(24000, new Map())).toBeNull();
  });

  it('lists active strikes in ascending order', () => {
    const zones = partitionZones(24000, chain, 2);
    expect(zones && activeStrikes(zones)).toEqual([23900, 23950, 24000, 24050, 24100]);
  });
});
