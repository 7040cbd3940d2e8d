/**
 * Name specifications: turning a key plus a list of requested spellings into
 * concrete OptionNames.
 */
import { toKebabCase } from '../../utils/string.js';
import type { NameSpecification, OptionDefinition, OptionName } from './types.js';

export const DEFAULT_NAME_SPECIFICATION: readonly NameSpecification[] = ['long'];

/**
 * The exact command-line spelling of a name.
 */
export function spell(name: OptionName): string {
  switch (name.kind) {
    case 'long':
      return `--${name.base}`;
    case 'short':
      return `-${name.base}`;
    case 'longWithSingleDash':
      return `-${name.base}`;
  }
}

/**
 * Expand a name specification for `key` into concrete names. Duplicate
 * spellings collapse onto their first occurrence.
 */
export function resolveNames(
  key: string,
  specification: readonly NameSpecification[] = DEFAULT_NAME_SPECIFICATION
): OptionName[] {
  const names: OptionName[] = [];
  const seen = new Set<string>();

  for (const spec of specification) {
    const name = toOptionName(key, spec);
    const spelling = spell(name);
    if (seen.has(spelling)) continue;
    seen.add(spelling);
    names.push(Object.freeze(name));
  }

  return names;
}

function toOptionName(key: string, spec: NameSpecification): OptionName {
  if (spec === 'long') {
    return { kind: 'long', base: toKebabCase(key) };
  }
  if (spec === 'short') {
    return { kind: 'short', base: key.charAt(0) };
  }
  if ('long' in spec) {
    return { kind: spec.singleDash ? 'longWithSingleDash' : 'long', base: spec.long };
  }
  return { kind: 'short', base: spec.short };
}

/**
 * Every spelling a definition answers to, in declaration order.
 */
export function spellings(definition: OptionDefinition): string[] {
  return definition.names.map(spell);
}

/**
 * The preferred spelling for messages: the first long name, else the first
 * declared name.
 */
export function preferredSpelling(definition: OptionDefinition): string {
  const long = definition.names.find((name) => name.kind === 'long');
  const name = long ?? definition.names[0];
  return name ? spell(name) : definition.key;
}
