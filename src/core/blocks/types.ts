/**
 * An exact contiguous match: a[a .. a+size) equals b[b .. b+size).
 */
export interface MatchBlock {
  readonly a: number;
  readonly b: number;
  readonly size: number;
}

export interface BlockAlignment {
  /** Non-overlapping blocks ordered by position in A */
  readonly blocks: readonly MatchBlock[];
  /** Total matched elements */
  readonly matched: number;
  /** 2 * matched / (|A| + |B|), 1 when both are empty */
  readonly ratio: number;
}

export interface MatchOptions {
  /** Leave elements filling more than 1% of a B of 200+ elements out of the index */
  autojunk?: boolean;
}
