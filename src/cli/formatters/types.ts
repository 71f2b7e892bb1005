/**
 * Formatter type definitions.
 */
import type { SimilarityReport } from '../../core/ensemble/index.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Include segment excerpts and per-anchor detail */
  verbose: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format the report of one comparison.
   */
  formatReport(report: SimilarityReport): string;
}
