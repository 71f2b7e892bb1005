/**
 * Comparison entry points.
 */
export { createComparator, compareSources } from './comparator.js';
export { decodeSource, analyzeSource, analyzeText } from './ingest.js';
export { extractSegments, excerptSimilarity } from './segments.js';
export type { SourceInput, DocumentAnalysis, Comparator } from './types.js';
