/**
 * Tests for structural profiling.
 */
import { describe, it, expect } from 'vitest';
import { profileStructure } from '../../../../src/core/structure/profiler.js';
import { normalizeSource, placeholderNames } from '../../../../src/core/normalize/normalizer.js';
import { tokenizeDocument } from '../../../../src/core/tokenize/tokenizer.js';
import { DEFAULT_CONTROL_CONSTRUCTS, DEFAULT_KEYWORDS } from '../../../../src/core/lexicon/keywords.js';

const keywords = new Set(DEFAULT_KEYWORDS);

function profile(source: string) {
  const doc = normalizeSource('test.cpp', source, { keywords });
  const names = placeholderNames(doc);
  return profileStructure(tokenizeDocument(doc, keywords), {
    controlConstructs: DEFAULT_CONTROL_CONSTRUCTS,
    resolveName: (name) => names.get(name) ?? name,
  });
}

function summary(source: string): string[] {
  return profile(source).units.map((u) => `${u.kind} ${u.displayName} d${u.depth} ${u.startLine}-${u.endLine}`);
}

describe('profileStructure', () => {
  it('should find classes and methods with their control constructs', () => {
    const result = profile(
      [
        'class Counter {',
        'public:',
        '  int get() const {',
        '    if (n > 0) { return n; }',
        '    return 0;',
        '  }',
        'private:',
        '  int n;',
        '};',
      ].join('\n')
    );

    expect(result.units).toEqual([
      {
        kind: 'class',
        name: 'VAR_0',
        displayName: 'Counter',
        constructs: { if: 1 },
        depth: 0,
        startLine: 1,
        endLine: 9,
      },
      {
        kind: 'function',
        name: 'VAR_1',
        displayName: 'get',
        constructs: { if: 1 },
        depth: 1,
        startLine: 3,
        endLine: 6,
      },
    ]);
    expect(result.totals).toEqual({ if: 1 });
  });

  it('should read qualified names, destructors and operators', () => {
    const result = profile(
      [
        'Foo::~Foo() {}',
        'bool Foo::operator==(const Foo& o) const { return true; }',
        'Foo::Foo(int x) : v(x) {}',
      ].join('\n')
    );

    expect(result.units.map((u) => [u.name, u.displayName])).toEqual([
      ['VAR_0::~VAR_0', 'Foo::~Foo'],
      ['VAR_0::operator==', 'Foo::operator=='],
      ['VAR_0::VAR_0', 'Foo::Foo'],
    ]);
  });

  it('should name call and conversion operators', () => {
    expect(summary('struct F {\n  int operator()(int a) { return a; }\n  operator bool() const { return true; }\n};')).toEqual([
      'class F d0 1-4',
      'function operator() d1 2-2',
      'function operator bool d1 3-3',
    ]);
  });

  it('should not treat control blocks, lambdas or namespaces as units', () => {
    expect(
      summary(
        [
          'namespace util {',
          'int twice(int a) {',
          '  auto f = [](int b) { return b * 2; };',
          '  while (a > 0) { a--; }',
          '  return f(a);',
          '}',
          '}',
        ].join('\n')
      )
    ).toEqual(['function twice d0 2-6']);
  });

  it('should skip enums and name anonymous structs', () => {
    expect(summary('enum class Color { Red, Green };\nstruct { int a; } anon;\nstruct Point { int x; };')).toEqual([
      'class (anonymous) d0 2-2',
      'class Point d0 3-3',
    ]);
  });

  it('should look past template parameter lists', () => {
    expect(summary('template <class T>\nT largest(T a, T b) {\n  return a > b ? a : b;\n}')).toEqual([
      'function largest d0 2-4',
    ]);
  });

  it('should ignore preprocessor lines', () => {
    expect(summary('#define BEGIN {\n#include <vector>\nint main() {\n  return 0;\n}')).toEqual([
      'function main d0 3-5',
    ]);
  });

  it('should count constructs in nested blocks and in every enclosing unit', () => {
    const result = profile(
      [
        'void run() {',
        '  for (int i = 0; i < 3; i++) {',
        '    switch (i) { case 0: break; case 1: break; }',
        '  }',
        '  try { go(); } catch (...) { }',
        '}',
      ].join('\n')
    );

    expect(result.units[0].constructs).toEqual({ for: 1, switch: 1, case: 2, try: 1, catch: 1 });
    expect(result.totals).toEqual({ for: 1, switch: 1, case: 2, try: 1, catch: 1 });
  });

  it('should count constructs outside any unit in the totals only', () => {
    const result = profile('if (a) b();\nelse c();');

    expect(result.units).toEqual([]);
    expect(result.totals).toEqual({ if: 1, else: 1 });
  });

  it('should end unclosed units at the last token', () => {
    expect(summary('void f() {\n  if (x) {\n    y();')).toEqual(['function f d0 1-3']);
  });

  it('should return an empty profile for no tokens', () => {
    expect(profileStructure([], { controlConstructs: DEFAULT_CONTROL_CONSTRUCTS })).toEqual({
      units: [],
      totals: {},
    });
  });

  it('should use canonical names when no resolver is given', () => {
    const doc = normalizeSource('a', 'void go() {}', { keywords });
    const result = profileStructure(tokenizeDocument(doc, keywords), { controlConstructs: ['if'] });

    expect(result.units[0].displayName).toBe('VAR_0');
  });
});
