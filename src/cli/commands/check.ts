/**
 * `optbind check <declarations>`: validate a declaration file and list the
 * options it declares.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { LogLevelSchema } from '../../core/config/schema.js';
import { describeDefinition } from '../../core/definitions/builder.js';
import { loadDeclarations } from '../../core/declarations/loader.js';
import { createFormatter } from '../formatters/index.js';
import { logger } from '../../utils/logger.js';
import { pickFormat } from './resolve.js';

interface CheckOptions {
  config?: string;
  json?: boolean;
  format?: string;
  color: boolean;
  logLevel?: string;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate an option declaration file and list its options')
    .argument('<declarations>', 'Path to a YAML option declaration file')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .option('--format <format>', 'Output format: human or json')
    .option('--no-color', 'Disable colored output')
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
    .action(async (declarations: string, options: CheckOptions) => {
      try {
        const config = await loadConfig(process.cwd(), options.config);
        logger.setLevel(LogLevelSchema.parse(options.logLevel ?? config.log_level));

        const definitions = await loadDeclarations(declarations);
        const format = pickFormat(options, config.output.format);
        console.log(
          createFormatter(format, { colors: options.color }).formatDefinitions(
            definitions.map(describeDefinition)
          )
        );
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
