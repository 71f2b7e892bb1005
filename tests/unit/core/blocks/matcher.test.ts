/**
 * Tests for block matching.
 */
import { describe, it, expect } from 'vitest';
import { alignLines, alignSequences, blockRatio, matchBlocks } from '../../../../src/core/blocks/matcher.js';

describe('matchBlocks', () => {
  it('should find the longest block first, then recurse on both sides', () => {
    expect(matchBlocks(['a', 'b', 'c', 'd'], ['x', 'b', 'c', 'y', 'd'])).toEqual([
      { a: 1, b: 1, size: 2 },
      { a: 3, b: 4, size: 1 },
    ]);
  });

  it('should work on any element type', () => {
    expect(matchBlocks([1, 2, 3, 4, 5], [0, 1, 2, 3, 9, 4, 5])).toEqual([
      { a: 0, b: 1, size: 3 },
      { a: 3, b: 5, size: 2 },
    ]);
  });

  it('should prefer the earliest start in A on ties', () => {
    expect(matchBlocks(['x', 'y'], ['y', 'x'])).toEqual([{ a: 0, b: 1, size: 1 }]);
  });

  it('should prefer the earliest start in B on ties', () => {
    expect(matchBlocks(['x'], ['x', 'x'])).toEqual([{ a: 0, b: 0, size: 1 }]);
  });

  it('should return one block for identical sequences', () => {
    const lines = ['int VAR_0 ;', 'VAR_0 = NUM ;', 'return VAR_0 ;'];

    expect(matchBlocks(lines, [...lines])).toEqual([{ a: 0, b: 0, size: 3 }]);
  });

  it('should return nothing when a side is empty', () => {
    expect(matchBlocks([], ['a'])).toEqual([]);
    expect(matchBlocks(['a'], [])).toEqual([]);
  });

  it('should handle long inputs without recursion', () => {
    // Alternating mismatches force one work range per matched element.
    const a = Array.from({ length: 4000 }, (_, i) => (i % 2 === 0 ? `m${i}` : `a${i}`));
    const b = Array.from({ length: 4000 }, (_, i) => (i % 2 === 0 ? `m${i}` : `b${i}`));

    const blocks = matchBlocks(a, b);

    expect(blocks).toHaveLength(2000);
    expect(blocks[1999]).toEqual({ a: 3998, b: 3998, size: 1 });
  });
});

describe('matchBlocks with autojunk', () => {
  it('should never seed a block from an element filling more than 1% of b', () => {
    const xs = Array.from({ length: 250 }, () => 'x');

    expect(matchBlocks(xs, [...xs], { autojunk: true })).toEqual([]);
    expect(matchBlocks(xs, [...xs])).toEqual([{ a: 0, b: 0, size: 250 }]);
  });

  it('should grow a block over popular elements around it', () => {
    const b = [...Array.from({ length: 100 }, () => 'x'), 'm', ...Array.from({ length: 150 }, () => 'x')];

    expect(matchBlocks([...b], b, { autojunk: true })).toEqual([{ a: 0, b: 0, size: 251 }]);
  });

  it('should leave short sequences alone', () => {
    expect(matchBlocks(['x', 'x', 'y'], ['x', 'x', 'y'], { autojunk: true })).toEqual([{ a: 0, b: 0, size: 3 }]);
  });
});

describe('blockRatio', () => {
  it('should compute 2 * matched / total', () => {
    expect(blockRatio(3, 4, 5)).toBeCloseTo(2 / 3, 12);
  });

  it('should score two empty sequences as identical', () => {
    expect(blockRatio(0, 0, 0)).toBe(1);
  });
});

describe('alignSequences', () => {
  it('should sum matched elements and score them', () => {
    const result = alignSequences([1, 2, 3, 4, 5], [0, 1, 2, 3, 9, 4, 5]);

    expect(result.matched).toBe(5);
    expect(result.ratio).toBeCloseTo(10 / 12, 12);
  });

  it('should score 0 against an empty sequence', () => {
    expect(alignSequences(['a'], []).ratio).toBe(0);
  });
});

describe('alignLines', () => {
  it('should give mirrored blocks and equal ratios in both orders', () => {
    const a = ['x', 'y', 'z', 'y'];
    const b = ['y', 'x', 'y', 'z'];

    const forward = alignLines(a, b);
    const backward = alignLines(b, a);

    expect(backward.ratio).toBe(forward.ratio);
    expect(backward.blocks).toEqual(
      forward.blocks.map((block) => ({ a: block.b, b: block.a, size: block.size })).sort((p, q) => p.a - q.a)
    );
  });

  it('should keep blocks ordered by position in A after mirroring', () => {
    const result = alignLines(['y', 'x'], ['x', 'y']);

    expect(result.blocks).toEqual([{ a: 1, b: 0, size: 1 }]);
  });

  it('should break ties by the input that sorts first, not by A', () => {
    expect(alignSequences(['b', 'a'], ['a', 'b']).blocks).toEqual([{ a: 0, b: 1, size: 1 }]);
    expect(alignLines(['b', 'a'], ['a', 'b']).blocks).toEqual([{ a: 1, b: 0, size: 1 }]);
  });
});
