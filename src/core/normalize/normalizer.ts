/**
 * Source normalization: comment stripping, whitespace collapsing and
 * canonicalization of identifiers and literals.
 */
import { scanLexemes, type Lexeme } from '../lexicon/index.js';
import type { NormalizedDocument, NormalizeOptions } from './types.js';

export const IDENTIFIER_PREFIX = 'VAR_';
export const NUMBER_PLACEHOLDER = 'NUM';
export const STRING_PLACEHOLDER = 'STR';

/**
 * Normalize raw source text.
 *
 * Lexemes are joined with a single space into one normalized line until a
 * newline outside any comment separates two of them, so a block comment
 * spanning lines never splits a statement. Lines left empty (blank, or
 * comment-only) are dropped, and `lineMap` records the original line of each
 * normalized line's first lexeme. Identifiers are numbered per document in
 * first-occurrence order.
 */
export function normalizeSource(
  id: string,
  raw: string,
  options: NormalizeOptions
): NormalizedDocument {
  const renameIdentifiers = options.identifiers ?? true;
  const replaceLiterals = options.literals ?? true;
  const identifiers = new Map<string, string>();

  const lines: string[] = [];
  const lineMap: number[] = [];
  let current: string[] = [];
  let currentLine = 0;
  let previousEnd = 0;
  let lineBreak = false;

  const flush = () => {
    if (current.length > 0) {
      lines.push(current.join(' '));
      lineMap.push(currentLine);
      current = [];
    }
  };

  for (const lexeme of scanLexemes(raw)) {
    // Only whitespace lies between two lexemes; newlines inside comments are skipped with the comment.
    if (raw.slice(previousEnd, lexeme.offset).includes('\n')) {
      lineBreak = true;
    }
    previousEnd = lexeme.offset + lexeme.text.length;
    if (lexeme.kind === 'comment') continue;

    if (lineBreak || current.length === 0) {
      flush();
      currentLine = lexeme.line;
      lineBreak = false;
    }
    current.push(canonicalize(lexeme));
  }
  flush();

  return Object.freeze({
    id,
    raw,
    text: lines.join('\n'),
    lines: Object.freeze(lines),
    lineMap: Object.freeze(lineMap),
    identifiers,
  });

  function canonicalize(lexeme: Lexeme): string {
    switch (lexeme.kind) {
      case 'word': {
        if (options.keywords.has(lexeme.text) || !renameIdentifiers) {
          return lexeme.text;
        }
        let placeholder = identifiers.get(lexeme.text);
        if (placeholder === undefined) {
          placeholder = `${IDENTIFIER_PREFIX}${identifiers.size}`;
          identifiers.set(lexeme.text, placeholder);
        }
        return placeholder;
      }
      case 'number':
        return replaceLiterals ? NUMBER_PLACEHOLDER : lexeme.text;
      case 'string':
      case 'char':
        // Kept literals must not break the one-line-per-source-line layout.
        return replaceLiterals ? STRING_PLACEHOLDER : lexeme.text.replace(/\r?\n/g, '\\n');
      default:
        return lexeme.text;
    }
  }
}

/**
 * Reverse lookup from placeholder to the original identifier.
 */
export function placeholderNames(document: NormalizedDocument): Map<string, string> {
  const reverse = new Map<string, string>();
  for (const [name, placeholder] of document.identifiers) {
    reverse.set(placeholder, name);
  }
  return reverse;
}
