/**
 * Token types produced by the tokenizer.
 */

export type TokenKind = 'identifier' | 'literal' | 'keyword' | 'operator' | 'punctuation';

export interface Token {
  readonly kind: TokenKind;
  /** Canonical text (placeholders for renamed identifiers and literals) */
  readonly text: string;
  /** Offset in the tokenized text; strictly increasing along a token sequence */
  readonly offset: number;
  /** 1-based line in the original source */
  readonly line: number;
}

export interface TokenizeOptions {
  /** Words recognized as keywords rather than identifiers */
  keywords: ReadonlySet<string>;
  /**
   * Maps 1-based lines of the tokenized text to original source lines.
   * Usually NormalizedDocument.lineMap; lines map to themselves without it.
   */
  lineMap?: readonly number[];
}
