/**
 * Formatter type definitions.
 */
import type { DefinitionSummary } from '../../core/definitions/types.js';
import type { ResolutionOutcome } from '../../core/resolution/types.js';

export type { OutputFormat } from '../../core/config/schema.js';

/** What `resolveTokens` hands back to the CLI. */
export type EngineOutcome = ResolutionOutcome<ReadonlyMap<string, unknown>>;

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format the outcome of one resolution.
   */
  formatOutcome(outcome: EngineOutcome): string;

  /**
   * Format the definitions a declaration file produced.
   */
  formatDefinitions(summaries: DefinitionSummary[]): string;
}
