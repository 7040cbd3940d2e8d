/**
 * Option resolution engine.
 *
 * One forward pass over the token stream. Each option occurrence is handled
 * the moment it is reached, so when several occurrences could claim the same
 * value the earlier one wins. Errors from the scan and from conversion are
 * collected together; a failed outcome carries no values.
 */
import { NameMatcher } from '../matching/name-matcher.js';
import { spellings } from '../definitions/names.js';
import type { ArrayOptionDefinition, OptionDefinition } from '../definitions/types.js';
import { TokenStream } from '../tokens/token-stream.js';
import { applyDefinitions } from './applier.js';
import { resolveOccurrence, type StrategyContext } from './strategies.js';
import {
  DEFAULT_ENGINE_SETTINGS,
  type EngineSettings,
  type ResolutionError,
  type ResolutionOutcome,
} from './types.js';
import { ValueStore, originAt } from './value-store.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('resolve');

/**
 * Resolve `tokens` against `definitions`.
 *
 * Definitions are trusted to have unique keys. The returned map holds one
 * entry per definition: converted value, converted array, flag boolean, or
 * `undefined` for an absent optional single option.
 */
export function resolveTokens(
  definitions: readonly OptionDefinition[],
  tokens: readonly string[],
  settings: Partial<EngineSettings> = {}
): ResolutionOutcome<ReadonlyMap<string, unknown>> {
  const effective: EngineSettings = { ...DEFAULT_ENGINE_SETTINGS, ...settings };
  const stream = new TokenStream(tokens);
  const matcher = new NameMatcher(definitions, effective);
  const store = new ValueStore();
  const errors: ResolutionError[] = [];
  const context: StrategyContext = { stream, matcher, store, errors };
  const catchAll = definitions.find(
    (definition): definition is ArrayOptionDefinition =>
      definition.arity === 'array' && definition.catchAll
  );

  log.debug(`resolving ${tokens.length} token(s) against ${definitions.length} option(s)`);

  scan: while (!stream.atEnd) {
    const token = stream.peek();
    if (!token) break;
    const classified = matcher.classify(token.value);

    switch (classified.kind) {
      case 'value':
        stream.skip();
        break;

      case 'terminator':
        stream.consume();
        break scan;

      case 'unrecognized':
        stream.consume();
        if (catchAll) {
          store.update(catchAll.key, {
            kind: 'raw',
            raw: token.value,
            origin: originAt(token.index),
          });
        } else {
          errors.push({
            kind: 'UnrecognizedOption',
            names: [],
            token: token.value,
            position: token.index,
          });
        }
        break;

      case 'ambiguous':
        stream.consume();
        errors.push({
          kind: 'AmbiguousConsumption',
          keys: classified.definitions.map((definition) => definition.key),
          names: classified.definitions.flatMap((definition) => spellings(definition)),
          token: token.value,
          position: token.index,
        });
        break;

      case 'match': {
        stream.consume();
        const result = resolveOccurrence(
          {
            definition: classified.definition,
            token,
            spelling: classified.spelling,
            inlineValue: classified.inlineValue,
          },
          context
        );
        if (result === 'halt') break scan;
        break;
      }
    }
  }

  const applied = applyDefinitions(definitions, store);
  const allErrors = [...errors, ...applied.errors];

  if (allErrors.length > 0) {
    log.debug(`resolution failed with ${allErrors.length} error(s)`);
    return { ok: false, errors: allErrors };
  }

  return { ok: true, values: applied.values, remainder: stream.unclaimed() };
}
