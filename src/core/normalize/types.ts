/**
 * Types for source normalization.
 */

export interface NormalizeOptions {
  /** Words kept verbatim (never renamed) */
  keywords: ReadonlySet<string>;
  /** Replace identifiers with VAR_# placeholders (default: true) */
  identifiers?: boolean;
  /** Replace numeric literals with NUM and string/char literals with STR (default: true) */
  literals?: boolean;
}

/**
 * A source document after normalization. Frozen once created.
 */
export interface NormalizedDocument {
  readonly id: string;
  /** Decoded source text as supplied */
  readonly raw: string;
  /** Normalized lines joined with '\n' */
  readonly text: string;
  /** Normalized lines; blank and comment-only lines are dropped */
  readonly lines: readonly string[];
  /** 1-based original line number for each normalized line */
  readonly lineMap: readonly number[];
  /** Original identifier -> placeholder */
  readonly identifiers: ReadonlyMap<string, string>;
}
