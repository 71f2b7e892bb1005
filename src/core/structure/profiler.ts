/**
 * Structural profiling: function/class boundaries and control-construct
 * histograms, read off the token stream with a brace stack.
 */
import type { Token } from '../tokenize/index.js';
import type {
  ConstructCounts,
  ProfileOptions,
  StructuralProfile,
  StructuralUnit,
  UnitKind,
} from './types.js';

const CLASS_KEYWORDS = new Set(['class', 'struct', 'union']);
const ANONYMOUS = '(anonymous)';

interface HeaderMatch {
  kind: UnitKind;
  nameParts: string[];
  nameIndex: number;
}

interface OpenUnit {
  kind: UnitKind;
  name: string;
  displayName: string;
  constructs: ConstructCounts;
  depth: number;
  startLine: number;
  endLine: number;
}

/**
 * Extract the structural profile of a token sequence.
 *
 * At every `{` the tokens since the previous `;`, `{` or `}` (preprocessor
 * lines excluded) form the header. A header whose first top-level `(` follows
 * a name opens a function; otherwise a class/struct/union keyword followed by
 * a name opens a class. Anything else is a plain block.
 */
export function profileStructure(tokens: readonly Token[], options: ProfileOptions): StructuralProfile {
  const controls = new Set(options.controlConstructs);
  const resolve = options.resolveName ?? ((name: string) => name);

  const units: OpenUnit[] = [];
  const open: OpenUnit[] = [];
  const frames: Array<OpenUnit | null> = [];
  const totals: ConstructCounts = {};

  let headerStart = 0;
  let directiveLine = -1;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.text === '#' && (i === 0 || tokens[i - 1].line !== token.line)) {
      directiveLine = token.line;
    }
    if (token.line === directiveLine) {
      headerStart = i + 1;
      continue;
    }

    if (token.kind === 'keyword' && controls.has(token.text)) {
      totals[token.text] = (totals[token.text] ?? 0) + 1;
      for (const unit of open) {
        unit.constructs[token.text] = (unit.constructs[token.text] ?? 0) + 1;
      }
    }

    switch (token.text) {
      case '{': {
        const header = classifyHeader(tokens, headerStart, i);
        if (header) {
          const unit: OpenUnit = {
            kind: header.kind,
            name: header.nameParts.join('::'),
            displayName: header.nameParts.map((part) => displayPart(part, resolve)).join('::'),
            constructs: {},
            depth: open.length,
            startLine: tokens[header.nameIndex]?.line ?? token.line,
            endLine: token.line,
          };
          units.push(unit);
          open.push(unit);
        }
        frames.push(header ? open[open.length - 1] : null);
        headerStart = i + 1;
        break;
      }
      case '}': {
        const frame = frames.pop();
        if (frame) {
          frame.endLine = token.line;
          open.pop();
        }
        headerStart = i + 1;
        break;
      }
      case ';':
        headerStart = i + 1;
        break;
    }
  }

  // Unbalanced input: whatever is still open ends with the document.
  const lastLine = tokens.length > 0 ? tokens[tokens.length - 1].line : 0;
  for (const unit of open) {
    unit.endLine = lastLine;
  }

  return {
    units: units.map((unit): StructuralUnit => ({ ...unit, constructs: { ...unit.constructs } })),
    totals,
  };
}

function displayPart(part: string, resolve: (name: string) => string): string {
  if (part.startsWith('~')) return `~${resolve(part.slice(1))}`;
  if (part.startsWith('operator')) return part;
  return resolve(part);
}

/**
 * Classify the header tokens [start, end) preceding a `{`.
 */
function classifyHeader(tokens: readonly Token[], start: number, end: number): HeaderMatch | null {
  let depth = 0;
  let firstParen = -1;
  let firstAssign = -1;
  let lastClassKeyword = -1;
  let sawEnum = false;

  for (let i = start; i < end; i++) {
    const token = tokens[i];

    if (token.text === 'template' && tokens[i + 1]?.text === '<') {
      i = skipTemplateParameters(tokens, i + 1, end) - 1;
      continue;
    }

    if (depth === 0) {
      if (token.text === '(' && firstParen < 0) firstParen = i;
      if (token.text === '=' && firstAssign < 0) firstAssign = i;
      if (token.kind === 'keyword' && CLASS_KEYWORDS.has(token.text)) lastClassKeyword = i;
      if (token.text === 'enum') sawEnum = true;
    }

    if (token.text === '(' || token.text === '[') depth++;
    else if ((token.text === ')' || token.text === ']') && depth > 0) depth--;
  }

  if (firstParen >= 0 && (firstAssign < 0 || firstAssign > firstParen)) {
    const fn = functionName(tokens, start, firstParen);
    if (fn) return fn;
  }

  if (lastClassKeyword >= 0 && !sawEnum && (firstAssign < 0 || firstAssign < lastClassKeyword)) {
    const next = lastClassKeyword + 1;
    if (next < end && tokens[next].kind === 'identifier') {
      const parts = [tokens[next].text];
      let j = next + 1;
      while (j + 1 < end && tokens[j].text === '::' && tokens[j + 1].kind === 'identifier') {
        parts.push(tokens[j + 1].text);
        j += 2;
      }
      return { kind: 'class', nameParts: parts, nameIndex: next };
    }
    return { kind: 'class', nameParts: [ANONYMOUS], nameIndex: lastClassKeyword };
  }

  return null;
}

/** Index just past the `>` closing a template parameter list opened at `open`. */
function skipTemplateParameters(tokens: readonly Token[], open: number, end: number): number {
  let depth = 0;
  for (let i = open; i < end; i++) {
    const text = tokens[i].text;
    if (text === '<') depth++;
    else if (text === '>') depth--;
    else if (text === '>>') depth -= 2;
    if (depth <= 0) return i + 1;
  }
  return end;
}

/**
 * Name of the function whose parameter list opens at `paren`, or null when
 * the token before it is not a name (control keyword, lambda, call on an
 * expression).
 */
function functionName(tokens: readonly Token[], start: number, paren: number): HeaderMatch | null {
  const prev = paren - 1;
  if (prev < start) return null;

  // operator overloads: operator==, operator[], operator()
  for (let j = prev; j >= Math.max(start, prev - 2); j--) {
    if (tokens[j].kind === 'keyword' && tokens[j].text === 'operator') {
      const symbol = j === prev ? '()' : tokens.slice(j + 1, paren).map((t) => t.text).join(' ');
      const name = /^\w/.test(symbol) ? `operator ${symbol}` : `operator${symbol.replace(/ /g, '')}`;
      return { kind: 'function', nameParts: qualify(tokens, start, j, name), nameIndex: j };
    }
  }

  if (tokens[prev].kind !== 'identifier') return null;

  let first = prev;
  let name = tokens[prev].text;
  if (first - 1 >= start && tokens[first - 1].text === '~') {
    name = `~${name}`;
    first--;
  }
  return { kind: 'function', nameParts: qualify(tokens, start, first, name), nameIndex: prev };
}

/** Prepend `Scope::` qualifiers found before `first`. */
function qualify(tokens: readonly Token[], start: number, first: number, name: string): string[] {
  const parts = [name];
  let j = first - 1;
  while (j - 1 >= start && tokens[j].text === '::' && tokens[j - 1].kind === 'identifier') {
    parts.unshift(tokens[j - 1].text);
    j -= 2;
  }
  return parts;
}
