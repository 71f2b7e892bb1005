/**
 * Types for k-gram fingerprinting and winnowing.
 */

/** Hash of one k-gram and the index of its first token. */
export interface Fingerprint {
  readonly hash: number;
  readonly position: number;
}

export interface FingerprintOptions {
  /** Tokens per k-gram */
  k: number;
  /** Winnowing window, in consecutive k-gram hashes */
  window: number;
}

/**
 * Winnowed fingerprints of one document.
 */
export interface FingerprintSet {
  /** Number of k-grams hashed (0 when the document has fewer than k tokens) */
  readonly kgramCount: number;
  /** Selected fingerprints, one per distinct hash, ordered by position */
  readonly selected: readonly Fingerprint[];
  /** hash -> position of the selected fingerprint */
  readonly positions: ReadonlyMap<number, number>;
  /**
   * Canonical token text when no k-gram could be formed, so that two short
   * documents can still be told equal or not. Null otherwise.
   */
  readonly residue: string | null;
}

/** A hash selected in both documents, with its token positions. */
export interface MatchAnchor {
  readonly hash: number;
  readonly a: number;
  readonly b: number;
}

export interface FingerprintComparison {
  /** Dice coefficient over the two selected sets */
  readonly score: number;
  /** Shared hashes, sorted by position in A */
  readonly anchors: readonly MatchAnchor[];
}

/** Token range [startToken, endToken) and the original lines it covers. */
export interface TokenSpan {
  readonly startToken: number;
  readonly endToken: number;
  readonly startLine: number;
  readonly endLine: number;
}

/** Anchors merged into one contiguous run in both documents. */
export interface MatchRegion {
  readonly a: TokenSpan;
  readonly b: TokenSpan;
  readonly anchors: number;
}
