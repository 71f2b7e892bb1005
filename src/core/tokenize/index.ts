export { tokenize, tokenizeDocument } from './tokenizer.js';
export type { Token, TokenKind, TokenizeOptions } from './types.js';
