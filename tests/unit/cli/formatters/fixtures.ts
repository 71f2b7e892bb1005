/**
 * Hand-built report shared by the formatter tests.
 */
import type { SimilarityReport } from '../../../../src/core/ensemble/index.js';

export function sampleReport(): SimilarityReport {
  return {
    documents: {
      a: { id: 'a.cpp', tokens: 40, lines: 8, fingerprints: 6, units: 2 },
      b: { id: 'b.cpp', tokens: 38, lines: 7, fingerprints: 5, units: 1 },
    },
    scores: { moss: 0.5, structure: 0.75, line: 0.25, final: 0.525 },
    rating: 'Moderate',
    weights: { moss: 0.5, structure: 0.3, line: 0.2 },
    evidence: {
      regions: [
        {
          a: { startToken: 0, endToken: 12, startLine: 3, endLine: 5 },
          b: { startToken: 2, endToken: 14, startLine: 4, endLine: 4 },
          anchors: 3,
        },
      ],
      anchors: [
        { hash: 11, a: 0, b: 2 },
        { hash: 12, a: 3, b: 5 },
        { hash: 13, a: 7, b: 9 },
      ],
      blocks: [{ a: 0, b: 0, size: 3 }],
      structuralDiff: {
        onlyInA: [
          {
            kind: 'function',
            name: 'VAR_3',
            displayName: 'helper',
            constructs: {},
            depth: 0,
            startLine: 10,
            endLine: 12,
          },
        ],
        onlyInB: [],
      },
      segments: [
        {
          a: { startLine: 3, endLine: 5, excerpt: 'x();\ny();\nz();' },
          b: { startLine: 4, endLine: 6, excerpt: 'x();\ny();\nz();' },
          lines: 3,
          similarity: 1,
        },
      ],
    },
  };
}
