import type { Verdict } from './analysis.js';

export interface LearnerDecision {
  allowed: boolean;
  reason: string;
}

export interface VerdictSkipDecision {
  skip: boolean;
  reason: string;
}

export interface ConfidenceRange {
  min: number;
  max: number;
}

export interface ConfidenceThresholds {
  min: number;
  max: number;
  excludeRanges: ConfidenceRange[];
}

/**
 * Adaptive learner that tunes trading thresholds from past outcomes.
 * Lives outside this service; the pipeline talks to it only through this shape.
 */
export interface Learner {
  shouldTrade(confidence: number, verdict: Verdict): LearnerDecision;
  getConfidenceThresholds(): ConfidenceThresholds;
  shouldSkipVerdict(verdict: Verdict): VerdictSkipDecision;
}
