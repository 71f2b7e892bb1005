import type {
  ConstructCounts,
  ProfileComparison,
  StructuralDiff,
  StructuralProfile,
  StructuralUnit,
} from './types.js';

/**
 * Score two profiles and list the units without a counterpart.
 */
export function compareProfiles(a: StructuralProfile, b: StructuralProfile): ProfileComparison {
  return { score: structureScore(a, b), diff: diffProfiles(a, b) };
}

const OUTSIDE = 'outside';

/**
 * Per-kind presence overlap over unit-aligned buckets.
 *
 * Each unit (by opening order) is a bucket, plus one bucket for constructs
 * outside every unit. For every construct kind seen in either document the
 * buckets holding it form a set per document; the score is the mean Jaccard
 * index of those sets. Two documents without any control construct score 1.
 */
export function structureScore(a: StructuralProfile, b: StructuralProfile): number {
  const bucketsA = constructBuckets(a);
  const bucketsB = constructBuckets(b);
  const kinds = [...new Set([...bucketsA.keys(), ...bucketsB.keys()])].sort();
  if (kinds.length === 0) return 1;

  let sum = 0;
  for (const kind of kinds) {
    sum += jaccard(bucketsA.get(kind) ?? new Set<string>(), bucketsB.get(kind) ?? new Set<string>());
  }
  return sum / kinds.length;
}

/** Construct kind -> buckets in which it occurs. */
export function constructBuckets(profile: StructuralProfile): Map<string, Set<string>> {
  const buckets = new Map<string, Set<string>>();
  const add = (kind: string, bucket: string) => {
    const set = buckets.get(kind);
    if (set) {
      set.add(bucket);
    } else {
      buckets.set(kind, new Set([bucket]));
    }
  };

  // Nested units count into their enclosing units too, so top-level units cover everything inside a unit.
  const insideUnits: ConstructCounts = {};
  profile.units.forEach((unit, index) => {
    for (const [kind, count] of Object.entries(unit.constructs)) {
      if (count <= 0) continue;
      add(kind, String(index));
      if (unit.depth === 0) insideUnits[kind] = (insideUnits[kind] ?? 0) + count;
    }
  });
  for (const [kind, count] of Object.entries(profile.totals)) {
    if (count > (insideUnits[kind] ?? 0)) add(kind, OUTSIDE);
  }
  return buckets;
}

function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let shared = 0;
  for (const bucket of a) {
    if (b.has(bucket)) shared++;
  }
  const union = a.size + b.size - shared;
  return union === 0 ? 1 : shared / union;
}

/**
 * Shape of a unit independent of names: kind, depth and construct counts.
 */
export function unitShape(unit: StructuralUnit): string {
  const counts = Object.keys(unit.constructs)
    .sort()
    .filter((kind) => unit.constructs[kind] > 0)
    .map((kind) => `${kind}=${unit.constructs[kind]}`)
    .join(',');
  return `${unit.kind}|${unit.depth}|${counts}`;
}

/**
 * Units whose shape has no remaining counterpart in the other profile
 * (multiset difference, so two same-shaped units in A need two in B).
 * Units are not aligned by name.
 */
export function diffProfiles(a: StructuralProfile, b: StructuralProfile): StructuralDiff {
  return {
    onlyInA: unmatchedUnits(a.units, b.units),
    onlyInB: unmatchedUnits(b.units, a.units),
  };
}

function unmatchedUnits(units: readonly StructuralUnit[], others: readonly StructuralUnit[]): StructuralUnit[] {
  const available = new Map<string, number>();
  for (const unit of others) {
    const shape = unitShape(unit);
    available.set(shape, (available.get(shape) ?? 0) + 1);
  }

  const unmatched: StructuralUnit[] = [];
  for (const unit of units) {
    const shape = unitShape(unit);
    const count = available.get(shape) ?? 0;
    if (count > 0) {
      available.set(shape, count - 1);
    } else {
      unmatched.push(unit);
    }
  }
  return unmatched;
}
