export { EnsembleScorer } from './scorer.js';
export type {
  SignalScores,
  EnsembleConfig,
  EnsembleResult,
  DocumentSummary,
  SegmentSide,
  SuspiciousSegment,
  ReportEvidence,
  ReportInput,
  SimilarityReport,
} from './types.js';
