/**
 * Lexical scanner for C-family source text.
 *
 * Splits text into words, numbers, string/char literals, comments and symbols.
 * Never throws: unterminated literals and block comments run to end of input.
 */

export type LexemeKind = 'word' | 'number' | 'string' | 'char' | 'comment' | 'symbol';

export interface Lexeme {
  kind: LexemeKind;
  text: string;
  /** Offset of the first character in the scanned text */
  offset: number;
  /** 1-based line on which the lexeme starts */
  line: number;
}

/** Multi-character operators and punctuators, longest first. */
const MULTI_CHAR_SYMBOLS: readonly string[] = [
  '>>=', '<<=', '<=>', '->*', '...',
  '::', '->', '.*', '++', '--', '<<', '>>', '<=', '>=', '==', '!=', '&&', '||',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '##',
];

/** Encoding prefixes that may precede a string or char literal. */
const LITERAL_PREFIXES = new Set(['L', 'u', 'U', 'u8', 'R', 'LR', 'uR', 'UR', 'u8R']);

const MAX_RAW_DELIMITER = 16;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isWordStart(ch: string): boolean {
  return (
    (ch >= 'a' && ch <= 'z') ||
    (ch >= 'A' && ch <= 'Z') ||
    ch === '_' ||
    ch === '$' ||
    ch.charCodeAt(0) > 127
  );
}

function isWordPart(ch: string | undefined): boolean {
  return ch !== undefined && (isWordStart(ch) || isDigit(ch));
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\v' || ch === '\f';
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

/** End (exclusive) of a quoted literal whose opening quote is at `start`. */
function scanQuoted(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length && text[i] !== quote) {
    i += text[i] === '\\' && i + 1 < text.length ? 2 : 1;
  }
  return i < text.length ? i + 1 : text.length;
}

/** End (exclusive) of a raw string `R"delim( ... )delim"` whose quote is at `quoteAt`. */
function scanRawString(text: string, quoteAt: number): number {
  const open = text.indexOf('(', quoteAt + 1);
  if (open < 0 || open - quoteAt - 1 > MAX_RAW_DELIMITER) {
    return scanQuoted(text, quoteAt);
  }
  const delimiter = text.slice(quoteAt + 1, open);
  if (/[\s\\)]/.test(delimiter)) {
    return scanQuoted(text, quoteAt);
  }
  const close = text.indexOf(`)${delimiter}"`, open + 1);
  return close < 0 ? text.length : close + delimiter.length + 2;
}

function scanNumber(text: string, start: number): number {
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (isWordPart(ch) || ch === '.') {
      i++;
    } else if ((ch === '+' || ch === '-') && /[eEpP]/.test(text[i - 1]) && !/^0[xX][0-9a-fA-F]*[eE]$/.test(text.slice(start, i))) {
      i++;
    } else if (ch === "'" && isWordPart(text[i + 1]) && isWordPart(text[i - 1])) {
      // digit separator: 1'000'000
      i++;
    } else {
      break;
    }
  }
  return i;
}

function scanSymbol(text: string, start: number): number {
  for (const symbol of MULTI_CHAR_SYMBOLS) {
    if (text.startsWith(symbol, start)) {
      return start + symbol.length;
    }
  }
  return start + 1;
}

/**
 * Scan `text` into lexemes. Whitespace is skipped; comments are emitted so
 * callers can decide what to do with them.
 */
export function* scanLexemes(text: string): Generator<Lexeme> {
  const n = text.length;
  let i = 0;
  let line = 1;

  while (i < n) {
    const ch = text[i];

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }
    if (isSpace(ch)) {
      i++;
      continue;
    }

    const start = i;
    let kind: LexemeKind;

    if (ch === '/' && text[i + 1] === '/') {
      const newline = text.indexOf('\n', i);
      i = newline < 0 ? n : newline;
      kind = 'comment';
    } else if (ch === '/' && text[i + 1] === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close < 0 ? n : close + 2;
      kind = 'comment';
    } else if (isWordStart(ch)) {
      while (i < n && isWordPart(text[i])) i++;
      const word = text.slice(start, i);
      const next = text[i];
      if ((next === '"' || next === "'") && LITERAL_PREFIXES.has(word)) {
        const raw = word.endsWith('R') && next === '"';
        i = raw ? scanRawString(text, i) : scanQuoted(text, i);
        kind = next === '"' ? 'string' : 'char';
      } else {
        kind = 'word';
      }
    } else if (isDigit(ch) || (ch === '.' && isDigit(text[i + 1]))) {
      i = scanNumber(text, i);
      kind = 'number';
    } else if (ch === '"' || ch === "'") {
      i = scanQuoted(text, i);
      kind = ch === '"' ? 'string' : 'char';
    } else {
      i = scanSymbol(text, i);
      kind = 'symbol';
    }

    yield { kind, text: text.slice(start, i), offset: start, line };
    line += countNewlines(text, start, i);
  }
}
