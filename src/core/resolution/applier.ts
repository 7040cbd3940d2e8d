/**
 * Default/transform applier: runs after the scan, turns recorded raw strings
 * into typed values and fills in whatever never appeared.
 */
import { spellings } from '../definitions/names.js';
import type { Converter, OptionDefinition } from '../definitions/types.js';
import type { RecordedValue, ValueStore } from './value-store.js';
import type { ResolutionError } from './types.js';

export interface AppliedValues {
  readonly values: Map<string, unknown>;
  readonly errors: ResolutionError[];
}

/**
 * Produce the final value for every definition, in declaration order.
 * Conversion failures are collected, never thrown.
 */
export function applyDefinitions(
  definitions: readonly OptionDefinition[],
  store: ValueStore
): AppliedValues {
  const values = new Map<string, unknown>();
  const errors: ResolutionError[] = [];

  for (const definition of definitions) {
    const entry = store.get(definition.key);

    switch (definition.arity) {
      case 'flag': {
        values.set(
          definition.key,
          entry ? true : (definition.defaultProvider?.() ?? false)
        );
        break;
      }

      case 'single': {
        const recorded = entry?.values ?? [];
        if (recorded.length > 0) {
          // Every occurrence is converted; the last one is bound.
          const converted = recorded.map((value) =>
            convertRecorded(definition, definition.convert, value, errors)
          );
          values.set(definition.key, converted[converted.length - 1]);
        } else if (definition.defaultProvider) {
          values.set(definition.key, definition.defaultProvider());
        } else {
          if (definition.required && !store.wasSeen(definition.key)) {
            errors.push({
              kind: 'MissingRequired',
              key: definition.key,
              names: spellings(definition),
            });
          }
          values.set(definition.key, undefined);
        }
        break;
      }

      case 'array': {
        const recorded = entry?.values ?? [];
        values.set(
          definition.key,
          recorded.map((value) => convertRecorded(definition, definition.convert, value, errors))
        );
        break;
      }
    }
  }

  return { values, errors };
}

function convertRecorded<T>(
  definition: OptionDefinition,
  convert: Converter<T>,
  value: RecordedValue,
  errors: ResolutionError[]
): T | undefined {
  if (value.kind !== 'raw') return undefined;

  try {
    return convert(value.raw);
  } catch (error) {
    errors.push({
      kind: 'InvalidValue',
      key: definition.key,
      names: spellings(definition),
      token: value.raw,
      position: value.origin.indices[0] ?? -1,
      reason: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
