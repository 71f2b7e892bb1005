/**
 * Fixed-weight fusion of the three similarity signals.
 */
import { resolveEngineConfig } from '../config/index.js';
import type {
  EnsembleConfig,
  EnsembleResult,
  ReportInput,
  SignalScores,
  SimilarityReport,
} from './types.js';

/**
 * Combines signal scores into a final score and rating.
 *
 * The configuration is validated once and frozen; the scorer holds no other
 * state, so one instance can serve any number of comparisons.
 */
export class EnsembleScorer {
  readonly config: Readonly<EnsembleConfig>;

  constructor(config: Partial<EnsembleConfig> = {}) {
    const resolved = resolveEngineConfig({ weights: config.weights, ratings: config.ratings });
    this.config = Object.freeze({ weights: resolved.weights, ratings: resolved.ratings });
  }

  /**
   * Weighted sum of the signals, clamped to [0, 1].
   */
  combine(signals: SignalScores): number {
    const { moss, structure, line } = this.config.weights;
    const final = moss * signals.moss + structure * signals.structure + line * signals.line;
    return Math.min(1, Math.max(0, final));
  }

  /**
   * Label of the first bucket whose lower bound the score reaches.
   */
  rate(final: number): string {
    const bucket = this.config.ratings.find((r) => final >= r.min);
    // Validation guarantees a bucket at 0; scores are never negative.
    return bucket?.label ?? this.config.ratings[this.config.ratings.length - 1].label;
  }

  score(signals: SignalScores): EnsembleResult {
    const final = this.combine(signals);
    return { final, rating: this.rate(final) };
  }

  /**
   * Build the report for one comparison.
   */
  assemble(input: ReportInput): SimilarityReport {
    const { final, rating } = this.score(input.signals);
    return {
      documents: input.documents,
      scores: { ...input.signals, final },
      rating,
      weights: { ...this.config.weights },
      evidence: {
        regions: [...input.evidence.regions],
        anchors: [...input.evidence.anchors],
        blocks: [...input.evidence.blocks],
        structuralDiff: input.evidence.structuralDiff,
        segments: [...input.evidence.segments],
      },
    };
  }
}
