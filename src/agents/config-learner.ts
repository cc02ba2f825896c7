import type { Verdict } from '../types/analysis.js';
import type {
  ConfidenceRange,
  ConfidenceThresholds,
  Learner,
  LearnerDecision,
  VerdictSkipDecision,
} from '../types/learner.js';

export interface StaticLearnerOptions {
  minConfidence: number;
  maxConfidence: number;
  excludeRanges: ConfidenceRange[];
  skipVerdicts: readonly string[];
  paused: boolean;
}

/**
 * Learner with fixed thresholds from configuration. Stands in wherever no
 * adaptive learner is wired up.
 */
export class StaticLearner implements Learner {
  constructor(private readonly options: StaticLearnerOptions) {}

  shouldTrade(confidence: number, verdict: Verdict): LearnerDecision {
    if (this.options.paused) {
      return { allowed: false, reason: 'trading paused by configuration' };
    }
    return { allowed: true, reason: `ok (${verdict}, ${confidence.toFixed(0)}%)` };
  }

  getConfidenceThresholds(): ConfidenceThresholds {
    return {
      min: this.options.minConfidence,
      max: this.options.maxConfidence,
      excludeRanges: this.options.excludeRanges.map(r => ({ ...r })),
    };
  }

  shouldSkipVerdict(verdict: Verdict): VerdictSkipDecision {
    return this.options.skipVerdicts.includes(verdict)
      ? { skip: true, reason: `verdict "${verdict}" is configured to skip` }
      : { skip: false, reason: 'ok' };
  }
}
