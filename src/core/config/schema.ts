/**
 * Engine configuration schema.
 *
 * Keys are snake_case so that the same shape is used in .codesim.yaml and in code.
 */
import { z } from 'zod';
import { DEFAULT_CONTROL_CONSTRUCTS, DEFAULT_KEYWORDS } from '../lexicon/index.js';

/** Allowed drift when checking that the weights sum to 1. */
export const WEIGHT_SUM_TOLERANCE = 1e-9;

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** k-gram and winnowing parameters. */
export const FingerprintSettingsSchema = z.object({
  /** Tokens per k-gram */
  k: z.number().int().positive().default(5),
  /** Winnowing window, in consecutive k-gram hashes */
  window: z.number().int().positive().default(10),
  /** Token gap tolerated when merging anchors into regions (default: k - 1) */
  region_gap: z.number().int().min(0).optional(),
});

/** Ensemble weights. Must sum to 1. */
export const WeightsSchema = z.object({
  moss: z.number().min(0).max(1).default(0.5),
  structure: z.number().min(0).max(1).default(0.3),
  line: z.number().min(0).max(1).default(0.2),
});

/** One rating bucket: scores >= min (and below the next bucket) get this label. */
export const RatingBucketSchema = z.object({
  label: z.string().min(1),
  min: z.number().min(0).max(1),
});

export const DEFAULT_RATINGS: ReadonlyArray<z.infer<typeof RatingBucketSchema>> = [
  { label: 'Very High', min: 0.8 },
  { label: 'High', min: 0.6 },
  { label: 'Moderate', min: 0.4 },
  { label: 'Low', min: 0.2 },
  { label: 'Very Low', min: 0 },
];

/** Keyword tables used by the normalizer, tokenizer and profiler. */
export const LanguageSettingsSchema = z.object({
  keywords: z.array(z.string().min(1)).default(() => [...DEFAULT_KEYWORDS]),
  control_constructs: z.array(z.string().min(1)).default(() => [...DEFAULT_CONTROL_CONSTRUCTS]),
});

/** Canonicalization switches. Turning them off is meant for diagnostics. */
export const NormalizeSettingsSchema = z.object({
  identifiers: z.boolean().default(true),
  literals: z.boolean().default(true),
});

/** Suspicious segment extraction. */
export const SegmentSettingsSchema = z.object({
  min_lines: z.number().int().positive().default(3),
  limit: z.number().int().min(0).default(5),
});

/** Complete .codesim.yaml schema. */
export const ConfigSchema = z
  .object({
    fingerprint: withDefaults(FingerprintSettingsSchema),
    weights: withDefaults(WeightsSchema),
    ratings: z.array(RatingBucketSchema).default(() => DEFAULT_RATINGS.map((r) => ({ ...r }))),
    language: withDefaults(LanguageSettingsSchema),
    normalize: withDefaults(NormalizeSettingsSchema),
    segments: withDefaults(SegmentSettingsSchema),
  })
  .superRefine((config, ctx) => {
    const { moss, structure, line } = config.weights;
    const sum = moss + structure + line;
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: 'custom',
        path: ['weights'],
        message: `weights must sum to 1 (got ${sum})`,
      });
    }

    if (config.ratings.length === 0) {
      ctx.addIssue({ code: 'custom', path: ['ratings'], message: 'at least one rating bucket is required' });
    } else {
      for (let i = 1; i < config.ratings.length; i++) {
        if (config.ratings[i].min >= config.ratings[i - 1].min) {
          ctx.addIssue({
            code: 'custom',
            path: ['ratings', i, 'min'],
            message: 'rating buckets must be listed with strictly descending min values',
          });
        }
      }
      if (config.ratings[config.ratings.length - 1].min !== 0) {
        ctx.addIssue({
          code: 'custom',
          path: ['ratings'],
          message: 'the last rating bucket must start at 0',
        });
      }
    }

    const keywords = new Set(config.language.keywords);
    for (const construct of config.language.control_constructs) {
      if (!keywords.has(construct)) {
        ctx.addIssue({
          code: 'custom',
          path: ['language', 'control_constructs'],
          message: `control construct '${construct}' is not in the keyword list`,
        });
      }
    }
  });

// Type exports (inferred from schemas)
export type Config = z.infer<typeof ConfigSchema>;
export type FingerprintSettings = z.infer<typeof FingerprintSettingsSchema>;
export type Weights = z.infer<typeof WeightsSchema>;
export type RatingBucket = z.infer<typeof RatingBucketSchema>;
export type LanguageSettings = z.infer<typeof LanguageSettingsSchema>;
export type NormalizeSettings = z.infer<typeof NormalizeSettingsSchema>;
export type SegmentSettings = z.infer<typeof SegmentSettingsSchema>;

/**
 * Partial configuration accepted by resolveEngineConfig and mergeConfig.
 * Missing sections and keys take their defaults.
 */
export interface ConfigInput {
  fingerprint?: Partial<FingerprintSettings>;
  weights?: Partial<Weights>;
  ratings?: ReadonlyArray<Readonly<RatingBucket>>;
  language?: {
    keywords?: readonly string[];
    control_constructs?: readonly string[];
  };
  normalize?: Partial<NormalizeSettings>;
  segments?: Partial<SegmentSettings>;
}

/**
 * Validated, frozen configuration handed to the engine.
 */
export interface EngineConfig {
  readonly fingerprint: Readonly<FingerprintSettings>;
  readonly weights: Readonly<Weights>;
  readonly ratings: ReadonlyArray<Readonly<RatingBucket>>;
  readonly language: {
    readonly keywords: readonly string[];
    readonly control_constructs: readonly string[];
  };
  readonly normalize: Readonly<NormalizeSettings>;
  readonly segments: Readonly<SegmentSettings>;
}
