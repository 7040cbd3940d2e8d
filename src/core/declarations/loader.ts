/**
 * Turns YAML declaration documents into validated option definitions.
 */
import { builtinConverter } from '../conversion/converters.js';
import { resolveNames } from '../definitions/names.js';
import {
  ARRAY_STRATEGIES,
  SINGLE_VALUE_STRATEGIES,
  type NameSpecification,
  type OptionDefinition,
  type ParsingStrategy,
} from '../definitions/types.js';
import { provide } from '../definitions/builder.js';
import { validateDefinitions } from '../definitions/validate.js';
import { DeclarationError, ErrorCodes, SystemError } from '../../utils/errors.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import {
  DeclarationDocumentSchema,
  type DeclarationDocument,
  type NameSpec,
  type OptionDeclarationEntry,
} from './schema.js';

/**
 * Load a declaration file and build its definitions.
 */
export async function loadDeclarations(filePath: string): Promise<OptionDefinition[]> {
  try {
    return definitionsFromDocument(await loadYamlWithSchema(filePath, DeclarationDocumentSchema));
  } catch (error) {
    throw asDeclarationError(error);
  }
}

/**
 * Build definitions from YAML text.
 */
export function parseDeclarations(content: string): OptionDefinition[] {
  try {
    return definitionsFromDocument(parseYamlWithSchema(content, DeclarationDocumentSchema));
  } catch (error) {
    throw asDeclarationError(error);
  }
}

/**
 * Build and validate definitions from an already-parsed document, keeping
 * the document's key order.
 */
export function definitionsFromDocument(document: DeclarationDocument): OptionDefinition[] {
  const definitions = Object.entries(document.options).map(([key, entry]) =>
    Object.freeze(toDefinition(key, entry))
  );
  validateDefinitions(definitions);
  return definitions;
}

function toDefinition(key: string, entry: OptionDeclarationEntry): OptionDefinition {
  const names = resolveNames(key, entry.names?.map(toNameSpecification));

  if (entry.arity === 'flag') {
    const fallback = entry.default;
    return {
      key,
      arity: 'flag',
      names,
      defaultProvider: typeof fallback === 'boolean' ? provide(fallback) : null,
      help: entry.help,
    };
  }

  const convert = builtinConverter(entry.type, entry.choices);

  if (entry.arity === 'array') {
    return {
      key,
      arity: 'array',
      names,
      parsingStrategy: pickStrategy(key, entry.parsing, ARRAY_STRATEGIES, 'singleValue'),
      convert,
      catchAll: entry.catch_all,
      help: entry.help,
    };
  }

  const fallback = entry.default === undefined ? undefined : convertDefault(key, entry.default, convert);
  return {
    key,
    arity: 'single',
    names,
    parsingStrategy: pickStrategy(key, entry.parsing, SINGLE_VALUE_STRATEGIES, 'next'),
    defaultProvider: fallback === undefined ? null : provide(fallback),
    convert,
    required: entry.required,
    help: entry.help,
  };
}

function toNameSpecification(spec: NameSpec): NameSpecification {
  if (typeof spec === 'string') return spec;
  if ('long' in spec) return { long: spec.long, singleDash: spec.single_dash ?? false };
  return { short: spec.short };
}

function pickStrategy<S extends ParsingStrategy>(
  key: string,
  requested: ParsingStrategy | undefined,
  allowed: readonly S[],
  fallback: S
): S {
  if (requested === undefined) return fallback;
  const match = allowed.find((strategy) => strategy === requested);
  if (match === undefined) {
    throw new DeclarationError(
      ErrorCodes.STRATEGY_MISMATCH,
      `Option '${key}' cannot use parsing strategy '${requested}'`,
      { key, strategy: requested }
    );
  }
  return match;
}

/**
 * Defaults are written as YAML scalars; run them through the option's
 * converter so `default: "5"` on an integer option becomes 5.
 */
function convertDefault<T>(key: string, value: string | number | boolean, convert: (raw: string) => T): T {
  try {
    return convert(String(value));
  } catch (error) {
    throw new DeclarationError(
      ErrorCodes.INVALID_DECLARATION,
      `Default for option '${key}' is invalid: ${error instanceof Error ? error.message : String(error)}`,
      { key, default: value }
    );
  }
}

function asDeclarationError(error: unknown): unknown {
  if (error instanceof SystemError) {
    return new DeclarationError(ErrorCodes.INVALID_DECLARATION, error.message, error.details);
  }
  return error;
}
