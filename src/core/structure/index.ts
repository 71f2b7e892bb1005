/**
 * Structural profile exports.
 */
export { profileStructure } from './profiler.js';
export { compareProfiles, structureScore, constructBuckets, diffProfiles, unitShape } from './score.js';
export type {
  ConstructCounts,
  ProfileComparison,
  ProfileOptions,
  StructuralDiff,
  StructuralProfile,
  StructuralUnit,
  UnitKind,
} from './types.js';
