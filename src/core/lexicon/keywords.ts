/**
 * Default language tables for C-family sources.
 *
 * The keyword list lives in data/cpp-keywords.json at the package root and is
 * resolved relative to this module, so it is found both from src/ and dist/.
 */
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

const KEYWORDS_FILE = fileURLToPath(new URL('../../../data/cpp-keywords.json', import.meta.url));

const KeywordTableSchema = z.object({
  language: z.string(),
  keywords: z.array(z.string().min(1)).min(1),
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

/**
 * Load and validate a keyword table file.
 */
export function loadKeywordTable(filePath: string = KEYWORDS_FILE): KeywordTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_READ_ERROR,
      `Failed to read keyword table: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }

  const result = KeywordTableSchema.safeParse(raw);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Invalid keyword table ${filePath}: ${formatZodError(result.error)}`,
      { filePath, errors: result.error.issues }
    );
  }
  return result.data;
}

/** C++ reserved words (plus the contextual `override` and `final`). */
export const DEFAULT_KEYWORDS: readonly string[] = Object.freeze(loadKeywordTable().keywords);

/** Control-construct keywords counted by the structural profiler. */
export const DEFAULT_CONTROL_CONSTRUCTS: readonly string[] = Object.freeze([
  'if',
  'else',
  'for',
  'while',
  'do',
  'switch',
  'case',
  'try',
  'catch',
]);
