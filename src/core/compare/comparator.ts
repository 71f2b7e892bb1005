/**
 * Pairwise comparison: runs both documents through the pipeline, scores the
 * three signals and assembles the report.
 */
import { resolveEngineConfig, type ConfigInput } from '../config/index.js';
import { compareFingerprints, recoverRegions } from '../fingerprint/index.js';
import { compareProfiles } from '../structure/index.js';
import { alignLines } from '../blocks/index.js';
import { EnsembleScorer, type DocumentSummary, type SimilarityReport } from '../ensemble/index.js';
import { logger } from '../../utils/logger.js';
import { analyzeText, decodeSource } from './ingest.js';
import { extractSegments } from './segments.js';
import type { Comparator, DocumentAnalysis, SourceInput } from './types.js';

/**
 * Create a reusable comparator. The configuration is validated here, so a
 * bad setting fails before any document is read.
 */
export function createComparator(config: ConfigInput = {}): Comparator {
  const engineConfig = resolveEngineConfig(config);
  const keywords: ReadonlySet<string> = new Set(engineConfig.language.keywords);
  const scorer = new EnsembleScorer({ weights: engineConfig.weights, ratings: engineConfig.ratings });
  const { k } = engineConfig.fingerprint;
  const regionGap = engineConfig.fingerprint.region_gap ?? k - 1;

  const analyze = (input: SourceInput): DocumentAnalysis =>
    analyzeText(input.id, decodeSource(input), engineConfig, keywords);

  const compare = (a: SourceInput, b: SourceInput): SimilarityReport => {
    // Both inputs are checked before either is normalized.
    const textA = decodeSource(a);
    const textB = decodeSource(b);
    const left = analyzeText(a.id, textA, engineConfig, keywords);
    const right = analyzeText(b.id, textB, engineConfig, keywords);

    const fingerprints = compareFingerprints(left.fingerprints, right.fingerprints);
    const structure = compareProfiles(left.profile, right.profile);
    const alignment = alignLines(left.document.lines, right.document.lines);

    const report = scorer.assemble({
      documents: { a: summarize(left), b: summarize(right) },
      signals: {
        moss: fingerprints.score,
        structure: structure.score,
        line: alignment.ratio,
      },
      evidence: {
        regions: recoverRegions(fingerprints.anchors, left.tokens, right.tokens, { k, gap: regionGap }),
        anchors: fingerprints.anchors,
        blocks: alignment.blocks,
        structuralDiff: structure.diff,
        segments: extractSegments(left.document, right.document, alignment.blocks, engineConfig.segments),
      },
    });

    logger.debug(`Compared ${a.id} with ${b.id}`, { scores: report.scores, rating: report.rating });
    return report;
  };

  return { config: engineConfig, analyze, compare };
}

/**
 * Compare two documents once.
 */
export function compareSources(a: SourceInput, b: SourceInput, config: ConfigInput = {}): SimilarityReport {
  return createComparator(config).compare(a, b);
}

function summarize(analysis: DocumentAnalysis): DocumentSummary {
  return {
    id: analysis.document.id,
    tokens: analysis.tokens.length,
    lines: analysis.document.lines.length,
    fingerprints: analysis.fingerprints.selected.length,
    units: analysis.profile.units.length,
  };
}
