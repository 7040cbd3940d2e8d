/**
 * Consistency checks for a set of option definitions, run at registration.
 */
import { DeclarationError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { spell } from './names.js';
import {
  ARRAY_STRATEGIES,
  SINGLE_VALUE_STRATEGIES,
  type OptionDefinition,
  type OptionName,
  type ParsingStrategy,
} from './types.js';

const INVALID_BASE = /[\s=]/;

/**
 * Throw a DeclarationError for the first inconsistency found.
 * Spellings shared between definitions are allowed; they are reported at
 * resolution time when a token actually uses one.
 */
export function validateDefinitions(definitions: readonly OptionDefinition[]): void {
  const keys = new Set<string>();
  const owners = new Map<string, string>();
  let catchAllKey: string | null = null;

  for (const definition of definitions) {
    if (keys.has(definition.key)) {
      throw new DeclarationError(
        ErrorCodes.DUPLICATE_KEY,
        `Option key '${definition.key}' is declared more than once`,
        { key: definition.key }
      );
    }
    keys.add(definition.key);

    if (definition.names.length === 0) {
      throw new DeclarationError(
        ErrorCodes.EMPTY_NAMES,
        `Option '${definition.key}' has no names`,
        { key: definition.key }
      );
    }

    for (const name of definition.names) {
      validateName(definition.key, name);
      const spelling = spell(name);
      const owner = owners.get(spelling);
      if (owner !== undefined) {
        logger.warn(`'${spelling}' is declared by both '${owner}' and '${definition.key}'`);
      } else {
        owners.set(spelling, definition.key);
      }
    }

    if (definition.arity === 'single') {
      assertStrategy(definition.key, definition.parsingStrategy, SINGLE_VALUE_STRATEGIES);
    }

    if (definition.arity === 'array') {
      assertStrategy(definition.key, definition.parsingStrategy, ARRAY_STRATEGIES);
      if (definition.catchAll) {
        if (catchAllKey !== null) {
          throw new DeclarationError(
            ErrorCodes.MULTIPLE_CATCH_ALL,
            `Options '${catchAllKey}' and '${definition.key}' are both catch-all`,
            { keys: [catchAllKey, definition.key] }
          );
        }
        catchAllKey = definition.key;
      }
    }
  }
}

function validateName(key: string, name: OptionName): void {
  const spelling = spell(name);
  if (name.base.length === 0 || name.base.startsWith('-') || INVALID_BASE.test(name.base)) {
    throw new DeclarationError(
      ErrorCodes.INVALID_NAME,
      `Option '${key}' has an invalid name '${spelling}'`,
      { key, name: spelling }
    );
  }
  if (name.kind === 'short' && [...name.base].length !== 1) {
    throw new DeclarationError(
      ErrorCodes.INVALID_NAME,
      `Short name '${spelling}' of option '${key}' must be a single character`,
      { key, name: spelling }
    );
  }
}

function assertStrategy(
  key: string,
  strategy: ParsingStrategy,
  allowed: readonly ParsingStrategy[]
): void {
  if (!allowed.includes(strategy)) {
    throw new DeclarationError(
      ErrorCodes.STRATEGY_MISMATCH,
      `Option '${key}' cannot use parsing strategy '${strategy}'`,
      { key, strategy, allowed }
    );
  }
}
