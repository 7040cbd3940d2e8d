/**
 * Option definition type definitions.
 */

/** How an option's value(s) are claimed when it takes exactly one value. */
export type SingleValueParsingStrategy = 'next' | 'unconditional' | 'scanningForValue';

/** How an option's values are claimed when it collects a sequence. */
export type ArrayParsingStrategy =
  | 'singleValue'
  | 'unconditionalSingleValue'
  | 'upToNextOption'
  | 'remaining';

export type ParsingStrategy = SingleValueParsingStrategy | ArrayParsingStrategy;

export const SINGLE_VALUE_STRATEGIES: readonly SingleValueParsingStrategy[] = [
  'next',
  'unconditional',
  'scanningForValue',
];

export const ARRAY_STRATEGIES: readonly ArrayParsingStrategy[] = [
  'singleValue',
  'unconditionalSingleValue',
  'upToNextOption',
  'remaining',
];

export type Arity = 'single' | 'array' | 'flag';

/**
 * A declared spelling of an option.
 * `longWithSingleDash` covers names such as `-name`.
 */
export interface OptionName {
  readonly kind: 'long' | 'short' | 'longWithSingleDash';
  readonly base: string;
}

/**
 * Which spellings to accept. `'long'` and `'short'` derive from the key
 * (`dryRun` becomes `--dry-run` and `-d`).
 */
export type NameSpecification =
  | 'long'
  | 'short'
  | { readonly long: string; readonly singleDash?: boolean }
  | { readonly short: string };

/** Converts one raw string into a typed value, throwing when it cannot. */
export type Converter<T> = (raw: string) => T;

interface DefinitionBase {
  /** Stable identifier, unique among the definitions of one parse */
  readonly key: string;
  /** Accepted spellings, in declaration order */
  readonly names: readonly OptionName[];
  /** Free-form text for a help layer */
  readonly help?: string;
}

export interface SingleOptionDefinition<T = unknown> extends DefinitionBase {
  readonly arity: 'single';
  readonly parsingStrategy: SingleValueParsingStrategy;
  readonly defaultProvider: (() => T) | null;
  readonly convert: Converter<T>;
  /** Absent with no default is reported as MissingRequired */
  readonly required: boolean;
}

export interface ArrayOptionDefinition<T = unknown> extends DefinitionBase {
  readonly arity: 'array';
  readonly parsingStrategy: ArrayParsingStrategy;
  readonly convert: Converter<T>;
  /** Absorbs option-like tokens no other definition recognizes */
  readonly catchAll: boolean;
}

export interface FlagDefinition extends DefinitionBase {
  readonly arity: 'flag';
  readonly defaultProvider: (() => boolean) | null;
}

export type OptionDefinition =
  | SingleOptionDefinition
  | ArrayOptionDefinition
  | FlagDefinition;

/**
 * Metadata a help or usage layer reads from a definition.
 */
export interface DefinitionSummary {
  key: string;
  names: string[];
  arity: Arity;
  parsingStrategy: ParsingStrategy | null;
  hasDefault: boolean;
  required: boolean;
  repeating: boolean;
  help?: string;
}
