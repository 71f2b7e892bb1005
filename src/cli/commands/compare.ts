/**
 * CLI command for comparing two source files.
 */
import { Command } from 'commander';
import { loadConfig, mergeConfig, type ConfigInput } from '../../core/config/index.js';
import { createComparator } from '../../core/compare/index.js';
import { readFileBytes, resolvePath } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import type { IFormatter } from '../formatters/types.js';

/** Exit code when the final score reaches --fail-above. */
export const EXIT_SIMILAR = 2;

interface CompareOptions {
  json?: boolean;
  config?: string;
  kgram?: string;
  window?: string;
  segments?: string;
  color: boolean;
  verbose?: boolean;
  failAbove?: string;
}

export function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare two source files and report how similar they are')
    .argument('<fileA>', 'First source file')
    .argument('<fileB>', 'Second source file')
    .option('--json', 'Output as JSON')
    .option('--config <path>', 'Path to config file (default: .codesim.yaml)')
    .option('-k, --kgram <n>', 'Tokens per k-gram')
    .option('-w, --window <n>', 'Winnowing window size')
    .option('--segments <n>', 'Maximum suspicious segments to report')
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'Show debug logging and segment excerpts')
    .option('--fail-above <percent>', `Exit with code ${EXIT_SIMILAR} when the final score is at or above this percentage`)
    .action(async (fileA: string, fileB: string, options: CompareOptions) => {
      try {
        await runCompare(fileA, fileB, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runCompare(fileA: string, fileB: string, options: CompareOptions): Promise<void> {
  if (options.verbose) {
    logger.setLevel('debug');
  }

  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);

  const overrides: ConfigInput = { fingerprint: {}, segments: {} };
  if (options.kgram !== undefined) {
    overrides.fingerprint = { ...overrides.fingerprint, k: parseNumber(options.kgram, '--kgram') };
  }
  if (options.window !== undefined) {
    overrides.fingerprint = { ...overrides.fingerprint, window: parseNumber(options.window, '--window') };
  }
  if (options.segments !== undefined) {
    overrides.segments = { limit: parseNumber(options.segments, '--segments') };
  }
  const threshold = options.failAbove !== undefined ? parseNumber(options.failAbove, '--fail-above') : undefined;

  const comparator = createComparator(mergeConfig(config, overrides));

  const [contentA, contentB] = await Promise.all([
    readFileBytes(resolvePath(projectRoot, fileA)),
    readFileBytes(resolvePath(projectRoot, fileB)),
  ]);
  const report = comparator.compare({ id: fileA, content: contentA }, { id: fileB, content: contentB });

  const formatter: IFormatter = options.json
    ? new JsonFormatter({ verbose: options.verbose })
    : new HumanFormatter({ colors: options.color, verbose: options.verbose });
  console.log(formatter.formatReport(report));

  if (threshold === undefined) return;
  const percent = (report.scores.final * 100).toFixed(1);
  if (report.scores.final * 100 >= threshold) {
    process.exitCode = EXIT_SIMILAR;
    if (!options.json) logger.fail(`Similarity ${percent}% is at or above --fail-above ${threshold}%`);
  } else if (!options.json) {
    logger.success(`Similarity ${percent}% is below --fail-above ${threshold}%`);
  }
}

function parseNumber(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, `${flag} expects a number (got '${value}')`, { flag, value });
  }
  return parsed;
}
