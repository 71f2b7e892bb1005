import { scanLexemes } from '../lexicon/index.js';
import { NUMBER_PLACEHOLDER, STRING_PLACEHOLDER, type NormalizedDocument } from '../normalize/index.js';
import type { Token, TokenKind, TokenizeOptions } from './types.js';

const PUNCTUATION = new Set(['(', ')', '[', ']', '{', '}', ';', ',', ':', '#', '##', '...']);

/**
 * Split text into typed tokens.
 *
 * Meant for normalized text, but any text is accepted: comments are skipped
 * and raw literals come out as literal tokens.
 */
export function tokenize(text: string, options: TokenizeOptions): Token[] {
  const tokens: Token[] = [];

  for (const lexeme of scanLexemes(text)) {
    let kind: TokenKind;
    switch (lexeme.kind) {
      case 'comment':
        continue;
      case 'word':
        if (options.keywords.has(lexeme.text)) {
          kind = 'keyword';
        } else if (lexeme.text === NUMBER_PLACEHOLDER || lexeme.text === STRING_PLACEHOLDER) {
          kind = 'literal';
        } else {
          kind = 'identifier';
        }
        break;
      case 'number':
      case 'string':
      case 'char':
        kind = 'literal';
        break;
      default:
        kind = PUNCTUATION.has(lexeme.text) ? 'punctuation' : 'operator';
        break;
    }

    tokens.push({
      kind,
      text: lexeme.text,
      offset: lexeme.offset,
      line: options.lineMap?.[lexeme.line - 1] ?? lexeme.line,
    });
  }

  return tokens;
}

/**
 * Tokenize a normalized document, resolving token lines to original lines.
 */
export function tokenizeDocument(document: NormalizedDocument, keywords: ReadonlySet<string>): Token[] {
  return tokenize(document.text, { keywords, lineMap: document.lineMap });
}
