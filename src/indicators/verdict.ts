import type { SignalDirection, Strength, Verdict } from '../types/analysis.js';

export interface VerdictThresholds {
  strong: number;
  moderate: number;
}

export const DEFAULT_VERDICT_THRESHOLDS: VerdictThresholds = { strong: 40, moderate: 15 };

/** Pure mapping from the final combined score to a verdict and its strength. */
export function classifyScore(
  score: number,
  thresholds: VerdictThresholds = DEFAULT_VERDICT_THRESHOLDS,
): { verdict: Verdict; strength: Strength } {
  if (score > thresholds.strong) return { verdict: 'Bulls Strongly Winning', strength: 'strong' };
  if (score > thresholds.moderate) return { verdict: 'Bulls Winning', strength: 'moderate' };
  if (score > 0) return { verdict: 'Slightly Bullish', strength: 'weak' };
  if (score < -thresholds.strong) return { verdict: 'Bears Strongly Winning', strength: 'strong' };
  if (score < -thresholds.moderate) return { verdict: 'Bears Winning', strength: 'moderate' };
  if (score < 0) return { verdict: 'Slightly Bearish', strength: 'weak' };
  return { verdict: 'Neutral', strength: 'none' };
}

export function verdictDirection(verdict: Verdict): SignalDirection {
  if (verdict.startsWith('Bulls') || verdict === 'Slightly Bullish') return 'bullish';
  if (verdict.startsWith('Bears') || verdict === 'Slightly Bearish') return 'bearish';
  return 'neutral';
}

export function scoreDirection(score: number): SignalDirection {
  if (score > 0) return 'bullish';
  if (score < 0) return 'bearish';
  return 'neutral';
}
