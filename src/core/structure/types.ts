/**
 * Types for structural profiling.
 */

export type UnitKind = 'function' | 'class';

/** Control-construct keyword -> occurrence count. */
export type ConstructCounts = Record<string, number>;

/**
 * One function or class definition.
 */
export interface StructuralUnit {
  readonly kind: UnitKind;
  /** Canonical name (placeholders when identifiers were renamed) */
  readonly name: string;
  /** Name as written in the original source */
  readonly displayName: string;
  /** Control constructs inside the body, nested blocks included */
  readonly constructs: Readonly<ConstructCounts>;
  /** Number of enclosing units */
  readonly depth: number;
  readonly startLine: number;
  readonly endLine: number;
}

export interface StructuralProfile {
  /** Units in order of their opening brace */
  readonly units: readonly StructuralUnit[];
  /** Control constructs across the whole document */
  readonly totals: Readonly<ConstructCounts>;
}

export interface ProfileOptions {
  /** Keywords counted as control constructs */
  controlConstructs: readonly string[];
  /** Resolves a canonical identifier back to its original spelling */
  resolveName?: (canonical: string) => string;
}

/** Units with no same-shaped counterpart in the other document. */
export interface StructuralDiff {
  readonly onlyInA: readonly StructuralUnit[];
  readonly onlyInB: readonly StructuralUnit[];
}

export interface ProfileComparison {
  readonly score: number;
  readonly diff: StructuralDiff;
}
