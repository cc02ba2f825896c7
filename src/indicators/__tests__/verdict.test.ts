import { describe, expect, it } from 'vitest';
import { classifyScore, verdictDirection } from '../verdict.js';

describe('classifyScore', () => {
  it.each([
    [41, 'Bulls Strongly Winning', 'strong'],
    [40, 'Bulls Winning', 'moderate'],
    [16, 'Bulls Winning', 'moderate'],
    [15, 'Slightly Bullish', 'weak'],
    [0, 'Neutral', 'none'],
    [-0.1, 'Slightly Bearish', 'weak'],
    [-16, 'Bears Winning', 'moderate'],
    [-41, 'Bears Strongly Winning', 'strong'],
  ])('maps %d to %s', (score, verdict, strength) => {
    expect(classifyScore(score)).toEqual({ verdict, strength });
  });

  it('gives the same verdict for the same score', () => {
    for (const score of [-73.2, -15, 0.01, 40.5]) {
      expect(classifyScore(score)).toEqual(classifyScore(score));
    }
  });

  it('accepts custom thresholds', () => {
    expect(classifyScore(25, { strong: 20, moderate: 10 }).verdict).toBe('Bulls Strongly Winning');
  });
});

describe('verdictDirection', () => {
  it('reads the side from the verdict', () => {
    expect(verdictDirection('Slightly Bullish')).toBe('bullish');
    expect(verdictDirection('Bears Strongly Winning')).toBe('bearish');
    expect(verdictDirection('Neutral')).toBe('neutral');
  });
});
