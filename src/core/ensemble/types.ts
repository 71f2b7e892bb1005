/**
 * Types for score fusion and the similarity report.
 */
import type { RatingBucket, Weights } from '../config/index.js';
import type { MatchAnchor, MatchRegion } from '../fingerprint/index.js';
import type { StructuralDiff } from '../structure/index.js';
import type { MatchBlock } from '../blocks/index.js';

/** The three independent similarity signals, each in [0, 1]. */
export interface SignalScores {
  moss: number;
  structure: number;
  line: number;
}

export interface EnsembleConfig {
  weights: Readonly<Weights>;
  ratings: ReadonlyArray<Readonly<RatingBucket>>;
}

export interface EnsembleResult {
  final: number;
  rating: string;
}

/** Per-document counts shown alongside the scores. */
export interface DocumentSummary {
  id: string;
  /** Token count after normalization */
  tokens: number;
  /** Normalized (non-blank) line count */
  lines: number;
  /** Size of the selected fingerprint set */
  fingerprints: number;
  /** Functions and classes found by the profiler */
  units: number;
}

/** Line range in an original document with its text. */
export interface SegmentSide {
  startLine: number;
  endLine: number;
  excerpt: string;
}

/**
 * A long run of identical normalized lines, shown as original code.
 */
export interface SuspiciousSegment {
  a: SegmentSide;
  b: SegmentSide;
  /** Normalized lines in the block */
  lines: number;
  /** Character-level similarity of the two excerpts */
  similarity: number;
}

export interface ReportEvidence {
  regions: MatchRegion[];
  anchors: MatchAnchor[];
  blocks: MatchBlock[];
  structuralDiff: StructuralDiff;
  segments: SuspiciousSegment[];
}

export interface SimilarityReport {
  documents: {
    a: DocumentSummary;
    b: DocumentSummary;
  };
  scores: SignalScores & { final: number };
  rating: string;
  /** Weights the final score was computed with */
  weights: Weights;
  evidence: ReportEvidence;
}

export interface ReportInput {
  documents: SimilarityReport['documents'];
  signals: SignalScores;
  evidence: {
    regions: readonly MatchRegion[];
    anchors: readonly MatchAnchor[];
    blocks: readonly MatchBlock[];
    structuralDiff: StructuralDiff;
    segments: readonly SuspiciousSegment[];
  };
}
