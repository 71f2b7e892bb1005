import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createCompareCommand } from './commands/compare.js';
import { createNormalizeCommand } from './commands/normalize.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageSchema = z.object({ version: z.string() });
const { version: VERSION } = PackageSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
);

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('codesim')
    .description('Pairwise similarity detection for C-family source code')
    .version(VERSION);
  [createCompareCommand, createNormalizeCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
