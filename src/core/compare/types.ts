/**
 * Types for document ingestion and pairwise comparison.
 */
import type { EngineConfig } from '../config/index.js';
import type { NormalizedDocument } from '../normalize/index.js';
import type { Token } from '../tokenize/index.js';
import type { FingerprintSet } from '../fingerprint/index.js';
import type { StructuralProfile } from '../structure/index.js';
import type { SimilarityReport } from '../ensemble/index.js';

/** A document as handed to the engine. Bytes must be UTF-8. */
export interface SourceInput {
  id: string;
  content: string | Uint8Array;
}

/** Everything derived from one document, independent of the other. */
export interface DocumentAnalysis {
  document: NormalizedDocument;
  tokens: Token[];
  fingerprints: FingerprintSet;
  profile: StructuralProfile;
}

export interface Comparator {
  readonly config: EngineConfig;
  analyze(input: SourceInput): DocumentAnalysis;
  compare(a: SourceInput, b: SourceInput): SimilarityReport;
}
