/**
 * MOSS-style fingerprinting exports.
 */
export { fingerprint, kgramHashes, compareFingerprints } from './fingerprinter.js';
export { winnow, WinnowingWindow } from './winnow.js';
export { recoverRegions } from './regions.js';
export { hashKGram } from './hash.js';
export type { RegionOptions } from './regions.js';
export type {
  Fingerprint,
  FingerprintOptions,
  FingerprintSet,
  FingerprintComparison,
  MatchAnchor,
  MatchRegion,
  TokenSpan,
} from './types.js';
