/**
 * Formatter exports barrel file.
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export { HumanFormatter, JsonFormatter };
export type { EngineOutcome, FormatOptions, IFormatter, OutputFormat } from './types.js';

/**
 * Pick the formatter for an output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
