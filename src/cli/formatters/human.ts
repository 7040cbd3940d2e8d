import chalk from 'chalk';
import type { DefinitionSummary } from '../../core/definitions/types.js';
import { errorCode, formatResolutionError } from '../../core/resolution/messages.js';
import type { EngineOutcome, FormatOptions, IFormatter } from './types.js';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  formatOutcome(outcome: EngineOutcome): string {
    const lines: string[] = [];

    if (!outcome.ok) {
      const count = outcome.errors.length;
      lines.push(
        `${this.colorize('✗', 'red')} ${this.colorize('FAILED', 'red')} (${count} error${count === 1 ? '' : 's'})`
      );
      for (const error of outcome.errors) {
        lines.push(`   ${this.colorize(errorCode(error), 'dim')} ${formatResolutionError(error)}`);
      }
      return lines.join('\n');
    }

    lines.push(`${this.colorize('✓', 'green')} ${this.colorize('RESOLVED', 'green')}`);
    const width = Math.max(0, ...[...outcome.values.keys()].map((key) => key.length));
    for (const [key, value] of outcome.values) {
      lines.push(`   ${this.colorize(key.padEnd(width), 'cyan')} = ${this.formatValue(value)}`);
    }

    if (outcome.remainder.length > 0) {
      lines.push('');
      const rest = outcome.remainder.map((token) => `${token.value} ${this.colorize(`@${token.index}`, 'dim')}`);
      lines.push(`   Remainder: ${rest.join(', ')}`);
    }

    return lines.join('\n');
  }

  formatDefinitions(summaries: DefinitionSummary[]): string {
    const lines: string[] = [];

    for (const summary of summaries) {
      const traits: string[] = [summary.arity];
      if (summary.parsingStrategy) traits.push(summary.parsingStrategy);
      if (summary.required) traits.push('required');
      if (summary.hasDefault) traits.push('default');

      lines.push(`${this.colorize(summary.key, 'cyan')}  ${summary.names.join(', ')}  ${this.colorize(`[${traits.join(', ')}]`, 'dim')}`);
      if (summary.help) {
        lines.push(`    ${summary.help}`);
      }
    }

    lines.push('');
    lines.push(`${summaries.length} option${summaries.length === 1 ? '' : 's'}`);
    return lines.join('\n');
  }

  private formatValue(value: unknown): string {
    if (value === undefined) return this.colorize('(unset)', 'dim');
    return JSON.stringify(value);
  }

  private colorize(text: string, color: 'red' | 'green' | 'cyan' | 'dim'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
