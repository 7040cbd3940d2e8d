/**
 * Resolution type definitions: provenance, structured errors, outcomes and
 * engine settings.
 */
import type { Token } from '../tokens/token-stream.js';

/**
 * Which token indices produced a recorded value. Diagnostics only.
 */
export interface ParseOrigin {
  readonly indices: readonly number[];
}

export type ResolutionErrorKind =
  | 'MissingValue'
  | 'UnrecognizedOption'
  | 'InvalidValue'
  | 'AmbiguousConsumption'
  | 'UnexpectedValue'
  | 'MissingRequired';

interface ErrorBase {
  /** Every spelling of the option involved (empty when nothing matched) */
  readonly names: readonly string[];
}

/** A value-taking occurrence found no eligible token. */
export interface MissingValueError extends ErrorBase {
  readonly kind: 'MissingValue';
  readonly key: string;
  /** Spelling used at the occurrence */
  readonly token: string;
  /** Position of the option token */
  readonly position: number;
  /** Position where the value was looked for */
  readonly expectedAt: number;
}

/** An option-like token that no definition owns. */
export interface UnrecognizedOptionError extends ErrorBase {
  readonly kind: 'UnrecognizedOption';
  readonly token: string;
  readonly position: number;
}

/** A raw value the option's conversion rejected. */
export interface InvalidValueError extends ErrorBase {
  readonly kind: 'InvalidValue';
  readonly key: string;
  readonly token: string;
  readonly position: number;
  readonly reason: string;
}

/** A spelling declared by more than one definition. */
export interface AmbiguousConsumptionError extends ErrorBase {
  readonly kind: 'AmbiguousConsumption';
  /** Competing definitions, in declaration order */
  readonly keys: readonly string[];
  readonly token: string;
  readonly position: number;
}

/** An inline `=value` attached to a flag. */
export interface UnexpectedValueError extends ErrorBase {
  readonly kind: 'UnexpectedValue';
  readonly key: string;
  readonly token: string;
  readonly position: number;
}

/** A required single option that never appeared. */
export interface MissingRequiredError extends ErrorBase {
  readonly kind: 'MissingRequired';
  readonly key: string;
}

export type ResolutionError =
  | MissingValueError
  | UnrecognizedOptionError
  | InvalidValueError
  | AmbiguousConsumptionError
  | UnexpectedValueError
  | MissingRequiredError;

export interface ResolutionSuccess<V> {
  readonly ok: true;
  readonly values: V;
  /** Tokens no option claimed, in original order */
  readonly remainder: readonly Token[];
}

export interface ResolutionFailureOutcome {
  readonly ok: false;
  /** Never empty */
  readonly errors: readonly ResolutionError[];
}

/**
 * Either every option bound, or only the errors. Never both.
 */
export type ResolutionOutcome<V> = ResolutionSuccess<V> | ResolutionFailureOutcome;

/**
 * Knobs the engine reads while classifying tokens.
 */
export interface EngineSettings {
  /** Ends option matching; `null` disables it */
  readonly terminator: string | null;
  /** Split `--name=value` into a name and an attached value */
  readonly inlineValues: boolean;
  /** Prefixes that make an unmatched token option-like */
  readonly optionPrefixes: readonly string[];
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = Object.freeze({
  terminator: '--',
  inlineValues: true,
  optionPrefixes: Object.freeze(['-']),
});
