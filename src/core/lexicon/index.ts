/**
 * Language tables and the shared scanner.
 */
export { DEFAULT_KEYWORDS, DEFAULT_CONTROL_CONSTRUCTS, loadKeywordTable } from './keywords.js';
export type { KeywordTable } from './keywords.js';
export { scanLexemes } from './lexer.js';
export type { Lexeme, LexemeKind } from './lexer.js';
