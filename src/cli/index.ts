import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createResolveCommand } from './commands/resolve.js';
import { createCheckCommand } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('optbind')
    .description('Resolve command-line tokens against typed option declarations')
    .version(VERSION);
  [createResolveCommand, createCheckCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
