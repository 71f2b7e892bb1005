import chalk from 'chalk';
import type { SimilarityReport, SuspiciousSegment } from '../../core/ensemble/index.js';
import type { StructuralUnit } from '../../core/structure/index.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatReport(report: SimilarityReport): string {
    const { scores, weights, documents, evidence } = report;
    const lines: string[] = [];

    lines.push(
      `${this.colorize('Similarity:', 'bold')} ${this.colorize(percent(scores.final), this.scoreColor(scores.final))} (${report.rating})`
    );
    lines.push(`   ${documents.a.id} ${this.colorize('vs', 'dim')} ${documents.b.id}`);
    lines.push('');

    lines.push(`   ${this.colorize('SIGNALS:', 'cyan')}`);
    lines.push(`      Fingerprints  ${percent(scores.moss).padStart(6)}  x ${weights.moss}`);
    lines.push(`      Structure     ${percent(scores.structure).padStart(6)}  x ${weights.structure}`);
    lines.push(`      Lines         ${percent(scores.line).padStart(6)}  x ${weights.line}`);
    lines.push('');

    lines.push(`   ${this.colorize('DOCUMENTS:', 'cyan')}`);
    for (const doc of [documents.a, documents.b]) {
      lines.push(
        `      ${doc.id}: ${doc.tokens} tokens, ${doc.lines} lines, ${doc.fingerprints} fingerprints, ${doc.units} units`
      );
    }

    if (evidence.regions.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`MATCHED REGIONS (${evidence.regions.length}):`, 'cyan')}`);
      for (const region of evidence.regions) {
        lines.push(
          `      A ${range(region.a.startLine, region.a.endLine)}  B ${range(region.b.startLine, region.b.endLine)}  ${this.colorize(`(${region.anchors} anchors)`, 'dim')}`
        );
      }
    }

    const { onlyInA, onlyInB } = evidence.structuralDiff;
    if (onlyInA.length > 0 || onlyInB.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize('STRUCTURAL DIFFERENCES:', 'yellow')}`);
      for (const unit of onlyInA) {
        lines.push(`      only in A: ${describeUnit(unit)}`);
      }
      for (const unit of onlyInB) {
        lines.push(`      only in B: ${describeUnit(unit)}`);
      }
    }

    if (evidence.segments.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`SUSPICIOUS SEGMENTS (${evidence.segments.length}):`, 'red')}`);
      for (const segment of evidence.segments) {
        lines.push(...this.formatSegment(segment));
      }
    }

    return lines.join('\n');
  }

  private formatSegment(segment: SuspiciousSegment): string[] {
    const lines = [
      `      A ${range(segment.a.startLine, segment.a.endLine)}  B ${range(segment.b.startLine, segment.b.endLine)}  ${segment.lines} lines, ${percent(segment.similarity)} alike`,
    ];
    if (this.options.verbose) {
      for (const [label, excerpt] of [['A', segment.a.excerpt], ['B', segment.b.excerpt]]) {
        lines.push(`        ${this.colorize(`${label}:`, 'dim')}`);
        for (const line of excerpt.split('\n')) {
          lines.push(`          ${line}`);
        }
      }
    }
    return lines;
  }

  private scoreColor(score: number): Color {
    if (score >= 0.6) return 'red';
    if (score >= 0.4) return 'yellow';
    return 'green';
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function range(start: number, end: number): string {
  return start === end ? `line ${start}` : `lines ${start}-${end}`;
}

function describeUnit(unit: StructuralUnit): string {
  return `${unit.kind} ${unit.displayName} (${range(unit.startLine, unit.endLine)})`;
}
