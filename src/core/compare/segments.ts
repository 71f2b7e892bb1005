/**
 * Suspicious segments: long matched line blocks shown as original code.
 */
import type { SegmentSettings } from '../config/index.js';
import type { NormalizedDocument } from '../normalize/index.js';
import { blockRatio, matchBlocks, type MatchBlock } from '../blocks/index.js';
import type { SegmentSide, SuspiciousSegment } from '../ensemble/index.js';

/**
 * Blocks spanning at least `min_lines` normalized lines, resolved to original
 * line ranges and excerpts. Ordered by character-level similarity of the
 * excerpts (highest first, then by position in A), at most `limit` of them.
 */
export function extractSegments(
  a: NormalizedDocument,
  b: NormalizedDocument,
  blocks: readonly MatchBlock[],
  settings: Readonly<SegmentSettings>
): SuspiciousSegment[] {
  if (settings.limit === 0) return [];

  const rawA = a.raw.split(/\r?\n/);
  const rawB = b.raw.split(/\r?\n/);

  const segments = blocks
    .filter((block) => block.size >= settings.min_lines)
    .map((block): SuspiciousSegment => {
      const sideA = side(a, rawA, block.a, block.size);
      const sideB = side(b, rawB, block.b, block.size);
      return {
        a: sideA,
        b: sideB,
        lines: block.size,
        similarity: excerptSimilarity(sideA.excerpt, sideB.excerpt),
      };
    });

  segments.sort((x, y) => y.similarity - x.similarity || x.a.startLine - y.a.startLine);
  return segments.slice(0, settings.limit);
}

function side(document: NormalizedDocument, rawLines: readonly string[], start: number, size: number): SegmentSide {
  const startLine = document.lineMap[start];
  const endLine = document.lineMap[start + size - 1];
  return {
    startLine,
    endLine,
    excerpt: rawLines.slice(startLine - 1, endLine).join('\n'),
  };
}

/**
 * Character-level similarity ratio of two excerpts. Long excerpts are matched
 * with autojunk, so their ratio may come out lower than an exact match count.
 */
export function excerptSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const charsA = Array.from(a);
  const charsB = Array.from(b);
  const matched = matchBlocks(charsA, charsB, { autojunk: true }).reduce((sum, block) => sum + block.size, 0);
  return blockRatio(matched, charsA.length, charsB.length);
}
