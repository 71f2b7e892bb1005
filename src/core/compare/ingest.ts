/**
 * Document ingestion: decoding and per-document analysis.
 */
import type { EngineConfig } from '../config/index.js';
import { normalizeSource, placeholderNames } from '../normalize/index.js';
import { tokenizeDocument } from '../tokenize/index.js';
import { fingerprint } from '../fingerprint/index.js';
import { profileStructure } from '../structure/index.js';
import { InputError, ErrorCodes } from '../../utils/errors.js';
import type { DocumentAnalysis, SourceInput } from './types.js';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Text of a source input.
 *
 * Bytes are decoded as strict UTF-8; strings must be well-formed UTF-16.
 * A leading byte order mark is dropped either way.
 */
export function decodeSource(input: SourceInput): string {
  if (typeof input.content !== 'string') {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(input.content);
    } catch (error) {
      throw new InputError(ErrorCodes.ENCODING_ERROR, `${input.id} is not valid UTF-8`, {
        id: input.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const match = LONE_SURROGATE.exec(input.content);
  if (match) {
    throw new InputError(ErrorCodes.ENCODING_ERROR, `${input.id} contains an unpaired surrogate`, {
      id: input.id,
      offset: match.index,
    });
  }
  return input.content.startsWith(BYTE_ORDER_MARK) ? input.content.slice(1) : input.content;
}

/**
 * Normalize, tokenize, fingerprint and profile already decoded text.
 */
export function analyzeText(
  id: string,
  text: string,
  config: EngineConfig,
  keywords: ReadonlySet<string> = new Set(config.language.keywords)
): DocumentAnalysis {
  const document = normalizeSource(id, text, {
    keywords,
    identifiers: config.normalize.identifiers,
    literals: config.normalize.literals,
  });
  const tokens = tokenizeDocument(document, keywords);
  const names = placeholderNames(document);

  return {
    document,
    tokens,
    fingerprints: fingerprint(tokens, { k: config.fingerprint.k, window: config.fingerprint.window }),
    profile: profileStructure(tokens, {
      controlConstructs: config.language.control_constructs,
      resolveName: (canonical) => names.get(canonical) ?? canonical,
    }),
  };
}

export function analyzeSource(input: SourceInput, config: EngineConfig): DocumentAnalysis {
  return analyzeText(input.id, decodeSource(input), config);
}
