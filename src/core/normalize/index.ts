export {
  normalizeSource,
  placeholderNames,
  IDENTIFIER_PREFIX,
  NUMBER_PLACEHOLDER,
  STRING_PLACEHOLDER,
} from './normalizer.js';
export type { NormalizedDocument, NormalizeOptions } from './types.js';
