/**
 * `optbind resolve <declarations> -- <tokens...>`: run tokens through the
 * engine against a declaration file and print the outcome.
 */
import { Command } from 'commander';
import { loadConfig, toEngineSettings } from '../../core/config/loader.js';
import { LogLevelSchema, OutputFormatSchema, type OutputFormat } from '../../core/config/schema.js';
import { loadDeclarations } from '../../core/declarations/loader.js';
import { resolveTokens } from '../../core/resolution/engine.js';
import { createFormatter } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return new Command('resolve')
    .description('Resolve command-line tokens against an option declaration file')
    .argument('<declarations>', 'Path to a YAML option declaration file')
    .argument('[tokens...]', 'Tokens to resolve (put them after "--")')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .option('--format <format>', 'Output format: human or json')
    .option('--no-color', 'Disable colored output')
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
    .action(async (declarations: string, tokens: string[], options: ResolveOptions) => {
      let failed: boolean;
      try {
        failed = await runResolve(declarations, tokens, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
      if (failed) {
        process.exit(1);
      }
    });
}

export interface ResolveOptions {
  config?: string;
  json?: boolean;
  format?: string;
  color: boolean;
  logLevel?: string;
}

/**
 * Returns true when resolution failed.
 */
async function runResolve(declarations: string, tokens: string[], options: ResolveOptions): Promise<boolean> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);

  log.setLevel(LogLevelSchema.parse(options.logLevel ?? config.log_level));

  const definitions = await loadDeclarations(declarations);
  log.debug(`Loaded ${definitions.length} option(s) from ${declarations}`);

  const outcome = resolveTokens(definitions, tokens, toEngineSettings(config));

  const format = pickFormat(options, config.output.format);
  console.log(createFormatter(format, { colors: options.color }).formatOutcome(outcome));

  return !outcome.ok;
}

export function pickFormat(options: { json?: boolean; format?: string }, configured: OutputFormat): OutputFormat {
  if (options.json) return 'json';
  if (options.format !== undefined) return OutputFormatSchema.parse(options.format);
  return configured;
}
