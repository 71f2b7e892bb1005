/**
 * k-gram fingerprinting of token sequences and fingerprint comparison.
 */
import type { Token } from '../tokenize/index.js';
import { hashKGram } from './hash.js';
import { winnow } from './winnow.js';
import type {
  Fingerprint,
  FingerprintComparison,
  FingerprintOptions,
  FingerprintSet,
  MatchAnchor,
} from './types.js';

/**
 * Hash every window of k consecutive tokens. The k-gram text is the tokens'
 * canonical text joined with single spaces.
 */
export function kgramHashes(tokens: readonly Token[], k: number): Fingerprint[] {
  const hashes: Fingerprint[] = [];
  for (let position = 0; position + k <= tokens.length; position++) {
    const text = tokens
      .slice(position, position + k)
      .map((t) => t.text)
      .join(' ');
    hashes.push({ hash: hashKGram(text), position });
  }
  return hashes;
}

/**
 * Fingerprint a token sequence: k-gram hashes, winnowed, deduplicated by hash
 * (the first selected position of a hash is kept).
 */
export function fingerprint(tokens: readonly Token[], options: FingerprintOptions): FingerprintSet {
  const hashes = kgramHashes(tokens, options.k);
  const positions = new Map<number, number>();
  const selected: Fingerprint[] = [];

  for (const fp of winnow(hashes, options.window)) {
    if (positions.has(fp.hash)) continue;
    positions.set(fp.hash, fp.position);
    selected.push(fp);
  }

  return {
    kgramCount: hashes.length,
    selected,
    positions,
    residue: hashes.length === 0 ? tokens.map((t) => t.text).join(' ') : null,
  };
}

/**
 * Intersect two selected sets and score the overlap.
 *
 * score = 2 * |shared| / (|A| + |B|). When neither document produced a
 * fingerprint, the score is 1 if their token sequences are identical
 * (two empty documents included) and 0 otherwise.
 */
export function compareFingerprints(a: FingerprintSet, b: FingerprintSet): FingerprintComparison {
  const anchors: MatchAnchor[] = [];
  for (const fp of a.selected) {
    const positionInB = b.positions.get(fp.hash);
    if (positionInB !== undefined) {
      anchors.push({ hash: fp.hash, a: fp.position, b: positionInB });
    }
  }

  const total = a.selected.length + b.selected.length;
  let score: number;
  if (total === 0) {
    score = a.residue !== null && a.residue === b.residue ? 1 : 0;
  } else {
    score = Math.min(1, (2 * anchors.length) / total);
  }

  return { score, anchors };
}
