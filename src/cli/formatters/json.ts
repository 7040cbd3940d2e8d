import type { DefinitionSummary } from '../../core/definitions/types.js';
import { errorCode, formatResolutionError } from '../../core/resolution/messages.js';
import type { EngineOutcome, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatOutcome(outcome: EngineOutcome): string {
    if (!outcome.ok) {
      return JSON.stringify(
        {
          ok: false,
          errors: outcome.errors.map((error) => ({
            code: errorCode(error),
            message: formatResolutionError(error),
            ...error,
          })),
        },
        null,
        2
      );
    }

    const values: Record<string, unknown> = {};
    for (const [key, value] of outcome.values) {
      // JSON has no undefined; an unset option is reported as null.
      values[key] = value === undefined ? null : value;
    }

    return JSON.stringify(
      {
        ok: true,
        values,
        remainder: outcome.remainder.map((token) => ({ index: token.index, value: token.value })),
      },
      null,
      2
    );
  }

  formatDefinitions(summaries: DefinitionSummary[]): string {
    return JSON.stringify({ options: summaries }, null, 2);
  }
}
