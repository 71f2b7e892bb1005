/**
 * Tests for source normalization.
 */
import { describe, it, expect } from 'vitest';
import { normalizeSource, placeholderNames } from '../../../../src/core/normalize/normalizer.js';
import { DEFAULT_KEYWORDS } from '../../../../src/core/lexicon/keywords.js';

const keywords = new Set(DEFAULT_KEYWORDS);

describe('normalizeSource', () => {
  it('should canonicalize identifiers and literals line by line', () => {
    const doc = normalizeSource(
      'loop.cpp',
      [
        'int total = 0; // sum',
        'for (int i = 0; i < 10; i++) {',
        '    total += i;',
        '}',
      ].join('\n'),
      { keywords }
    );

    expect(doc.lines).toEqual([
      'int VAR_0 = NUM ;',
      'for ( int VAR_1 = NUM ; VAR_1 < NUM ; VAR_1 ++ ) {',
      'VAR_0 += VAR_1 ;',
      '}',
    ]);
    expect(doc.lineMap).toEqual([1, 2, 3, 4]);
    expect(doc.text).toBe(doc.lines.join('\n'));
    expect(doc.id).toBe('loop.cpp');
  });

  it('should drop blank and comment-only lines and keep original line numbers', () => {
    const doc = normalizeSource('a.cpp', '/* header */\n\nint a;\n// only comment\na = "s";\n', { keywords });

    expect(doc.lines).toEqual(['int VAR_0 ;', 'VAR_0 = STR ;']);
    expect(doc.lineMap).toEqual([3, 5]);
  });

  it('should number identifiers in first-occurrence order', () => {
    const doc = normalizeSource('a.cpp', 'b = a + b * c;', { keywords });

    expect(doc.text).toBe('VAR_0 = VAR_1 + VAR_0 * VAR_2 ;');
    expect([...doc.identifiers]).toEqual([
      ['b', 'VAR_0'],
      ['a', 'VAR_1'],
      ['c', 'VAR_2'],
    ]);
  });

  it('should never rename keywords', () => {
    const doc = normalizeSource('a.cpp', 'while (true) { return; }', { keywords });

    expect(doc.text).toBe('while ( true ) { return ; }');
    expect(doc.identifiers.size).toBe(0);
  });

  it('should produce the same text for renamed programs', () => {
    const a = normalizeSource('a', 'int sum(int x) { return x + 1; }', { keywords });
    const b = normalizeSource('b', 'int add(int value) { return value + 2; }', { keywords });

    expect(a.text).toBe(b.text);
  });

  it('should ignore indentation and spacing', () => {
    const a = normalizeSource('a', 'x=y+1;', { keywords });
    const b = normalizeSource('b', '   x  =  y +\t1 ;   ', { keywords });

    expect(a.text).toBe(b.text);
  });

  it('should leave comment-like text in strings alone', () => {
    const doc = normalizeSource('a', 'p = "/* not a comment */"; q = 1;', { keywords, literals: false });

    expect(doc.text).toBe('VAR_0 = "/* not a comment */" ; VAR_1 = 1 ;');
  });

  it('should keep identifiers when renaming is off', () => {
    const doc = normalizeSource('a', 'int count = 1;', { keywords, identifiers: false });

    expect(doc.text).toBe('int count = NUM ;');
    expect(doc.identifiers.size).toBe(0);
  });

  it('should replace character literals with STR', () => {
    const doc = normalizeSource('a', "char c = 'x';", { keywords });

    expect(doc.text).toBe('char VAR_0 = STR ;');
  });

  it('should normalize an empty document to no lines', () => {
    const doc = normalizeSource('empty', '', { keywords });

    expect(doc.lines).toEqual([]);
    expect(doc.text).toBe('');
    expect(doc.lineMap).toEqual([]);
  });

  it('should not split a statement at a line break inside a comment', () => {
    const doc = normalizeSource('a', 'x = /* spans\nlines */ y;', { keywords });

    expect(doc.lines).toEqual(['VAR_0 = VAR_1 ;']);
    expect(doc.lineMap).toEqual([1]);
  });

  it('should give the same lines with and without a multi-line comment mid-statement', () => {
    const plain = normalizeSource('a', 'int f(int a) {\n  int x = a + 1;\n  return x;\n}', { keywords });
    const commented = normalizeSource(
      'b',
      'int f(int a) {\n  int x = /* a\n   b */ a + 1;\n  return x;\n}',
      { keywords }
    );

    expect(commented.lines).toEqual(plain.lines);
    expect(commented.lineMap).toEqual([1, 2, 4, 5]);
  });

  it('should still break lines around comments that stand on their own lines', () => {
    const doc = normalizeSource('a', 'a = 1;\n/* one\ntwo */\nb = 2;', { keywords });

    expect(doc.lines).toEqual(['VAR_0 = NUM ;', 'VAR_1 = NUM ;']);
    expect(doc.lineMap).toEqual([1, 4]);
  });

  it('should break after a line comment', () => {
    const doc = normalizeSource('a', 'a = 1; // note\nb = 2;', { keywords });

    expect(doc.lines).toEqual(['VAR_0 = NUM ;', 'VAR_1 = NUM ;']);
  });

  it('should keep tokens after a multi-line literal on its line', () => {
    const doc = normalizeSource('a', 's = R"(one\ntwo)";\nt = s;', { keywords });

    expect(doc.lines).toEqual(['VAR_0 = STR ;', 'VAR_1 = VAR_0 ;']);
    expect(doc.lineMap).toEqual([1, 3]);
  });

  it('should freeze the document', () => {
    const doc = normalizeSource('a', 'int a;', { keywords });

    expect(Object.isFrozen(doc)).toBe(true);
    expect(Object.isFrozen(doc.lines)).toBe(true);
  });
});

describe('placeholderNames', () => {
  it('should map placeholders back to original names', () => {
    const doc = normalizeSource('a', 'total = i;', { keywords });

    expect(placeholderNames(doc)).toEqual(
      new Map([
        ['VAR_0', 'total'],
        ['VAR_1', 'i'],
      ])
    );
  });
});
