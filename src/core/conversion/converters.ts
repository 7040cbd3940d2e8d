/**
 * Built-in conversions from raw argument strings to typed values.
 * A converter throws to reject a value; the message becomes the reason on the
 * resulting InvalidValue error.
 */
import type { Converter } from '../definitions/types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

export const asString: Converter<string> = (raw) => raw;

export const asInteger: Converter<number> = (raw) => {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new Error(`'${raw}' is not an integer`);
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`'${raw}' is outside the safe integer range`);
  }
  return value;
};

export const asNumber: Converter<number> = (raw) => {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new Error(`'${raw}' is not a number`);
  }
  return value;
};

export const asBoolean: Converter<boolean> = (raw) => {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new Error(`'${raw}' is not a boolean (expected true/false, yes/no, on/off, 1/0)`);
};

/**
 * Accept only one of `choices`, compared exactly.
 */
export function oneOf<C extends string>(choices: readonly C[]): Converter<C> {
  return (raw) => {
    const match = choices.find((choice) => choice === raw);
    if (match === undefined) {
      throw new Error(`'${raw}' is not one of: ${choices.join(', ')}`);
    }
    return match;
  };
}

export type BuiltinConverterName = 'string' | 'integer' | 'number' | 'boolean' | 'choice';

/**
 * Converter by name, as used by declaration files.
 */
export function builtinConverter(
  name: BuiltinConverterName,
  choices: readonly string[] = []
): Converter<string | number | boolean> {
  switch (name) {
    case 'string':
      return asString;
    case 'integer':
      return asInteger;
    case 'number':
      return asNumber;
    case 'boolean':
      return asBoolean;
    case 'choice':
      return oneOf(choices);
  }
}
