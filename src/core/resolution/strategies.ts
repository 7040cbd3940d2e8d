/**
 * Strategy resolver: decides which tokens an option occurrence claims.
 *
 * Positions such as "the token after the option" always mean the next
 * unclaimed token after the cursor; the engine has already consumed the
 * option token itself when these run.
 */
import type { NameMatcher } from '../matching/name-matcher.js';
import { spellings } from '../definitions/names.js';
import type {
  ArrayOptionDefinition,
  OptionDefinition,
  SingleOptionDefinition,
} from '../definitions/types.js';
import type { Token, TokenStream } from '../tokens/token-stream.js';
import type { ResolutionError } from './types.js';
import { originAt, type RecordedValue, type ValueStore } from './value-store.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('resolve');

export interface Occurrence {
  readonly definition: OptionDefinition;
  /** The option token as it appeared */
  readonly token: Token;
  readonly spelling: string;
  readonly inlineValue: string | null;
}

export interface StrategyContext {
  readonly stream: TokenStream;
  readonly matcher: NameMatcher;
  readonly store: ValueStore;
  readonly errors: ResolutionError[];
}

/** `halt` stops option matching for the rest of the parse. */
export type StrategyResult = 'continue' | 'halt';

export function resolveOccurrence(occurrence: Occurrence, context: StrategyContext): StrategyResult {
  const { definition } = occurrence;
  context.store.markSeen(definition.key);
  switch (definition.arity) {
    case 'flag':
      resolveFlag(definition.key, occurrence, context);
      return 'continue';
    case 'single':
      resolveSingle(definition, occurrence, context);
      return 'continue';
    case 'array':
      return resolveArray(definition, occurrence, context);
  }
}

function resolveFlag(key: string, occurrence: Occurrence, context: StrategyContext): void {
  if (occurrence.inlineValue !== null) {
    context.errors.push({
      kind: 'UnexpectedValue',
      key,
      names: spellings(occurrence.definition),
      token: occurrence.token.value,
      position: occurrence.token.index,
    });
    return;
  }
  context.store.set(key, { kind: 'present', origin: originAt(occurrence.token.index) });
}

function resolveSingle(
  definition: SingleOptionDefinition,
  occurrence: Occurrence,
  context: StrategyContext
): void {
  if (occurrence.inlineValue !== null) {
    context.store.update(definition.key, inline(occurrence));
    return;
  }

  const value =
    definition.parsingStrategy === 'scanningForValue'
      ? claimNextPlainValue(context)
      : context.stream.consume();

  if (!value) {
    reportMissingValue(occurrence, context);
    return;
  }

  log.debug(`${occurrence.spelling} <- '${value.value}' (${definition.parsingStrategy})`);
  context.store.update(definition.key, recorded(value));
}

function resolveArray(
  definition: ArrayOptionDefinition,
  occurrence: Occurrence,
  context: StrategyContext
): StrategyResult {
  const { key, parsingStrategy } = definition;
  const { stream, store } = context;
  const hasInline = occurrence.inlineValue !== null;

  if (hasInline) {
    store.update(key, inline(occurrence));
  }

  switch (parsingStrategy) {
    case 'singleValue':
    case 'unconditionalSingleValue': {
      if (hasInline) return 'continue';
      const value =
        parsingStrategy === 'singleValue' ? claimNextPlainValue(context) : stream.consume();
      if (!value) {
        reportMissingValue(occurrence, context);
        return 'continue';
      }
      store.update(key, recorded(value));
      return 'continue';
    }

    case 'upToNextOption': {
      const taken: Token[] = [];
      for (
        let value = stream.consumeIf((token) => context.matcher.isPlainValue(token.value));
        value;
        value = stream.consumeIf((token) => context.matcher.isPlainValue(token.value))
      ) {
        taken.push(value);
        store.update(key, recorded(value));
      }
      if (taken.length === 0 && !hasInline) {
        reportMissingValue(occurrence, context);
      }
      log.debug(`${occurrence.spelling} took ${taken.length} value(s) up to the next option`);
      return 'continue';
    }

    case 'remaining': {
      const rest = stream.drain();
      for (const value of rest) {
        store.update(key, recorded(value));
      }
      log.debug(`${occurrence.spelling} took the remaining ${rest.length} token(s)`);
      return 'halt';
    }
  }
}

/**
 * Claim the first plain value after the cursor, skipping over (and leaving in
 * place) option-like tokens. The terminator ends the search.
 */
function claimNextPlainValue(context: StrategyContext): Token | undefined {
  const { stream, matcher } = context;
  const candidate = stream.find(
    (token) => matcher.isPlainValue(token.value),
    (token) => matcher.isTerminator(token.value)
  );
  if (candidate) {
    stream.claim(candidate);
  }
  return candidate;
}

function reportMissingValue(occurrence: Occurrence, context: StrategyContext): void {
  context.errors.push({
    kind: 'MissingValue',
    key: occurrence.definition.key,
    names: spellings(occurrence.definition),
    token: occurrence.spelling,
    position: occurrence.token.index,
    expectedAt: occurrence.token.index + 1,
  });
}

function recorded(token: Token): RecordedValue {
  return { kind: 'raw', raw: token.value, origin: originAt(token.index) };
}

function inline(occurrence: Occurrence): RecordedValue {
  return {
    kind: 'raw',
    raw: occurrence.inlineValue ?? '',
    origin: originAt(occurrence.token.index),
  };
}
