/**
 * Registration phase: typed option declarations and the immutable option set
 * built from them.
 *
 * ```ts
 * const options = defineOptions({
 *   name: option.single({ convert: asString, required: true }),
 *   count: option.single({ convert: asInteger, names: ['long', 'short'], defaultValue: 1 }),
 *   include: option.array({ convert: asString, parsing: 'upToNextOption' }),
 *   verbose: option.flag({ names: ['long', 'short'] }),
 * });
 *
 * const outcome = options.parse(process.argv.slice(2));
 * if (outcome.ok) outcome.values.count; // number
 * ```
 */
import { ErrorCodes, ResolutionFailure } from '../../utils/errors.js';
import type { Token } from '../tokens/token-stream.js';
import { resolveTokens } from '../resolution/engine.js';
import { formatResolutionError } from '../resolution/messages.js';
import type { EngineSettings, ResolutionOutcome } from '../resolution/types.js';
import { resolveNames, spellings } from './names.js';
import type {
  ArrayParsingStrategy,
  Converter,
  DefinitionSummary,
  NameSpecification,
  OptionDefinition,
  SingleValueParsingStrategy,
} from './types.js';
import { validateDefinitions } from './validate.js';

/**
 * A not-yet-keyed option. `V` is the type the option resolves to; it exists
 * only at the type level.
 */
export class OptionDeclaration<V> {
  declare readonly _value: V;

  constructor(private readonly factory: (key: string) => OptionDefinition) {}

  /** Build the immutable definition for `key`. */
  define(key: string): OptionDefinition {
    return Object.freeze(this.factory(key));
  }
}

export interface SingleOptionConfig<T> {
  convert: Converter<T>;
  names?: readonly NameSpecification[];
  parsing?: SingleValueParsingStrategy;
  defaultValue?: T;
  required?: boolean;
  help?: string;
}

export interface ArrayOptionConfig<T> {
  convert: Converter<T>;
  names?: readonly NameSpecification[];
  parsing?: ArrayParsingStrategy;
  /** Collect option-like tokens that no other option recognizes */
  catchAll?: boolean;
  help?: string;
}

export interface FlagConfig {
  names?: readonly NameSpecification[];
  defaultValue?: boolean;
  help?: string;
}

function single<T>(config: SingleOptionConfig<T> & { defaultValue: T }): OptionDeclaration<T>;
function single<T>(config: SingleOptionConfig<T> & { required: true }): OptionDeclaration<T>;
function single<T>(config: SingleOptionConfig<T>): OptionDeclaration<T | undefined>;
function single<T>(config: SingleOptionConfig<T>): OptionDeclaration<T | undefined> {
  const { defaultValue } = config;
  return new OptionDeclaration<T | undefined>((key) => ({
    key,
    arity: 'single',
    names: resolveNames(key, config.names),
    parsingStrategy: config.parsing ?? 'next',
    defaultProvider: defaultValue === undefined ? null : provide(defaultValue),
    convert: config.convert,
    required: config.required ?? false,
    help: config.help,
  }));
}

function array<T>(config: ArrayOptionConfig<T>): OptionDeclaration<T[]> {
  return new OptionDeclaration<T[]>((key) => ({
    key,
    arity: 'array',
    names: resolveNames(key, config.names),
    parsingStrategy: config.parsing ?? 'singleValue',
    convert: config.convert,
    catchAll: config.catchAll ?? false,
    help: config.help,
  }));
}

function flag(config: FlagConfig = {}): OptionDeclaration<boolean> {
  const { defaultValue } = config;
  return new OptionDeclaration<boolean>((key) => ({
    key,
    arity: 'flag',
    names: resolveNames(key, config.names),
    defaultProvider: defaultValue === undefined ? null : provide(defaultValue),
    help: config.help,
  }));
}

export const option = { single, array, flag };

/** A default provider that always yields `value`. */
export function provide<T>(value: T): () => T {
  return () => value;
}

export type OptionSchema = Record<string, OptionDeclaration<unknown>>;

export type ResolvedValues<S extends OptionSchema> = {
  readonly [K in keyof S]: S[K]['_value'];
};

export interface ParsedOptions<S extends OptionSchema> {
  readonly values: ResolvedValues<S>;
  readonly remainder: readonly Token[];
}

/**
 * The immutable, validated definitions for one schema. Safe to share; every
 * parse call gets its own stream and store.
 */
export class OptionSet<S extends OptionSchema> {
  readonly definitions: readonly OptionDefinition[];

  constructor(schema: S) {
    const definitions = Object.entries(schema).map(([key, declaration]) => declaration.define(key));
    validateDefinitions(definitions);
    this.definitions = Object.freeze(definitions);
  }

  parse(argv: readonly string[], settings: Partial<EngineSettings> = {}): ResolutionOutcome<ResolvedValues<S>> {
    const outcome = resolveTokens(this.definitions, argv, settings);
    if (!outcome.ok) return outcome;
    return { ok: true, values: bindValues<S>(outcome.values), remainder: outcome.remainder };
  }

  /**
   * Like `parse`, but throws a ResolutionFailure carrying every error.
   */
  parseOrThrow(argv: readonly string[], settings: Partial<EngineSettings> = {}): ParsedOptions<S> {
    const outcome = this.parse(argv, settings);
    if (!outcome.ok) {
      const lines = outcome.errors.map(formatResolutionError);
      throw new ResolutionFailure(ErrorCodes.RESOLUTION_FAILED, lines.join('\n'), {
        errors: outcome.errors,
      });
    }
    return { values: outcome.values, remainder: outcome.remainder };
  }

  describe(): DefinitionSummary[] {
    return this.definitions.map(describeDefinition);
  }
}

export function defineOptions<S extends OptionSchema>(schema: S): OptionSet<S> {
  return new OptionSet(schema);
}

/**
 * One-shot registration and resolution.
 */
export function parseOptions<S extends OptionSchema>(
  schema: S,
  argv: readonly string[],
  settings: Partial<EngineSettings> = {}
): ResolutionOutcome<ResolvedValues<S>> {
  return defineOptions(schema).parse(argv, settings);
}

/**
 * One-shot registration and resolution that throws a ResolutionFailure
 * instead of returning errors.
 */
export function parseOptionsOrThrow<S extends OptionSchema>(
  schema: S,
  argv: readonly string[],
  settings: Partial<EngineSettings> = {}
): ParsedOptions<S> {
  return defineOptions(schema).parseOrThrow(argv, settings);
}

export function describeDefinition(definition: OptionDefinition): DefinitionSummary {
  return {
    key: definition.key,
    names: spellings(definition),
    arity: definition.arity,
    parsingStrategy: definition.arity === 'flag' ? null : definition.parsingStrategy,
    hasDefault: definition.arity !== 'array' && definition.defaultProvider !== null,
    required: definition.arity === 'single' && definition.required,
    repeating: definition.arity === 'array',
    help: definition.help,
  };
}

function bindValues<S extends OptionSchema>(values: ReadonlyMap<string, unknown>): ResolvedValues<S> {
  const bound: Record<string, unknown> = {};
  for (const [key, value] of values) {
    bound[key] = value;
  }
  return Object.freeze(bound) as ResolvedValues<S>;
}
