import type { SimilarityReport } from '../../core/ensemble/index.js';
import type { IFormatter, FormatOptions } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private verbose: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.verbose = options.verbose ?? false;
  }

  formatReport(report: SimilarityReport): string {
    if (this.verbose) {
      return JSON.stringify(report, null, 2);
    }
    // Anchors can number in the thousands; the regions summarize them.
    const { anchors, ...evidence } = report.evidence;
    return JSON.stringify({ ...report, evidence: { ...evidence, anchorCount: anchors.length } }, null, 2);
  }
}
