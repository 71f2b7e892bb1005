/**
 * CLI command that prints a file as the engine sees it.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/index.js';
import { createComparator } from '../../core/compare/index.js';
import type { Token } from '../../core/tokenize/index.js';
import { readFileBytes, resolvePath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

interface NormalizeOptions {
  config?: string;
  tokens?: boolean;
  color: boolean;
}

export function createNormalizeCommand(): Command {
  return new Command('normalize')
    .description('Print the normalized form of a source file')
    .argument('<file>', 'Source file')
    .option('--config <path>', 'Path to config file (default: .codesim.yaml)')
    .option('--tokens', 'Print the token stream instead of the normalized text')
    .option('--no-color', 'Disable colored output')
    .action(async (file: string, options: NormalizeOptions) => {
      try {
        await runNormalize(file, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runNormalize(file: string, options: NormalizeOptions): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const content = await readFileBytes(resolvePath(projectRoot, file));
  const { document, tokens } = createComparator(config).analyze({ id: file, content });

  if (options.tokens) {
    for (const token of tokens) {
      console.log(formatToken(token, options.color));
    }
    return;
  }

  for (let i = 0; i < document.lines.length; i++) {
    const line = String(document.lineMap[i]).padStart(5);
    console.log(`${options.color ? chalk.dim(line) : line}  ${document.lines[i]}`);
  }
}

function formatToken(token: Token, color: boolean): string {
  const location = String(token.line).padStart(5);
  const kind = token.kind.padEnd(11);
  return color ? `${chalk.dim(location)}  ${chalk.cyan(kind)} ${token.text}` : `${location}  ${kind} ${token.text}`;
}
