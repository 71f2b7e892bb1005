import type { Token } from '../tokenize/index.js';
import type { MatchAnchor, MatchRegion, TokenSpan } from './types.js';

export interface RegionOptions {
  /** Tokens per k-gram; an anchor covers k tokens from its position */
  k: number;
  /** Tokens tolerated between an anchor and the region it extends */
  gap: number;
}

interface OpenRegion {
  aStart: number;
  aEnd: number;
  bStart: number;
  bEnd: number;
  diagonal: number;
  anchors: number;
}

/**
 * Merge anchors into contiguous match regions for display.
 *
 * Anchors are taken in position order for A. An anchor extends the open
 * region when it starts no more than `gap` tokens past the region's end in
 * both documents, does not start before the region in B, and its offset
 * between documents (a - b) moved by at most `gap` since the last anchor.
 */
export function recoverRegions(
  anchors: readonly MatchAnchor[],
  tokensA: readonly Token[],
  tokensB: readonly Token[],
  options: RegionOptions
): MatchRegion[] {
  const sorted = [...anchors].sort((x, y) => x.a - y.a || x.b - y.b);
  const regions: MatchRegion[] = [];
  let open: OpenRegion | null = null;

  for (const anchor of sorted) {
    const diagonal = anchor.a - anchor.b;
    if (
      open !== null &&
      anchor.a <= open.aEnd + options.gap &&
      anchor.b >= open.bStart &&
      anchor.b <= open.bEnd + options.gap &&
      Math.abs(diagonal - open.diagonal) <= options.gap
    ) {
      open.aEnd = Math.max(open.aEnd, anchor.a + options.k);
      open.bEnd = Math.max(open.bEnd, anchor.b + options.k);
      open.diagonal = diagonal;
      open.anchors++;
      continue;
    }

    if (open !== null) {
      regions.push(closeRegion(open, tokensA, tokensB));
    }
    open = {
      aStart: anchor.a,
      aEnd: anchor.a + options.k,
      bStart: anchor.b,
      bEnd: anchor.b + options.k,
      diagonal,
      anchors: 1,
    };
  }

  if (open !== null) {
    regions.push(closeRegion(open, tokensA, tokensB));
  }
  return regions;
}

function closeRegion(open: OpenRegion, tokensA: readonly Token[], tokensB: readonly Token[]): MatchRegion {
  return {
    a: toSpan(open.aStart, open.aEnd, tokensA),
    b: toSpan(open.bStart, open.bEnd, tokensB),
    anchors: open.anchors,
  };
}

function toSpan(start: number, end: number, tokens: readonly Token[]): TokenSpan {
  const endToken = Math.min(end, tokens.length);
  return {
    startToken: start,
    endToken,
    startLine: tokens[start]?.line ?? 0,
    endLine: tokens[endToken - 1]?.line ?? 0,
  };
}
