import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createEvalCommand } from './commands/eval.js';
import { createMetadataCommand } from './commands/metadata.js';
import { createPrintEnvCommand } from './commands/print-env.js';
import { createShowCommand } from './commands/show.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z.object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')))
  .version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('devshell')
    .description('Evaluate reproducible development-shell descriptors')
    .version(VERSION);
  [createShowCommand, createEvalCommand, createPrintEnvCommand, createMetadataCommand, createCheckCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
