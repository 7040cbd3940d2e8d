/**
 * Classifies raw tokens against the declared option spellings.
 */
import { spellings } from '../definitions/names.js';
import type { OptionDefinition } from '../definitions/types.js';
import type { EngineSettings } from '../resolution/types.js';

export type TokenClass =
  | {
      kind: 'match';
      definition: OptionDefinition;
      /** The spelling as written, without any attached value */
      spelling: string;
      /** Value attached with `=`, or null */
      inlineValue: string | null;
    }
  | {
      kind: 'ambiguous';
      definitions: readonly OptionDefinition[];
      spelling: string;
    }
  | { kind: 'unrecognized' }
  | { kind: 'terminator' }
  | { kind: 'value' };

export class NameMatcher {
  private readonly owners = new Map<string, OptionDefinition[]>();

  constructor(
    definitions: readonly OptionDefinition[],
    private readonly settings: EngineSettings
  ) {
    for (const definition of definitions) {
      for (const spelling of spellings(definition)) {
        const existing = this.owners.get(spelling);
        if (existing) {
          if (!existing.includes(definition)) existing.push(definition);
        } else {
          this.owners.set(spelling, [definition]);
        }
      }
    }
  }

  classify(raw: string): TokenClass {
    if (this.settings.terminator !== null && raw === this.settings.terminator) {
      return { kind: 'terminator' };
    }

    const exact = this.lookup(raw, null);
    if (exact) return exact;

    if (this.settings.inlineValues) {
      const equals = raw.indexOf('=');
      if (equals > 0) {
        const attached = this.lookup(raw.slice(0, equals), raw.slice(equals + 1));
        if (attached) return attached;
      }
    }

    return this.looksLikeOption(raw) ? { kind: 'unrecognized' } : { kind: 'value' };
  }

  /**
   * True for anything that is not a plain value: declared names, unknown
   * option-like tokens and the terminator.
   */
  isOptionLike(raw: string): boolean {
    return this.classify(raw).kind !== 'value';
  }

  isPlainValue(raw: string): boolean {
    return this.classify(raw).kind === 'value';
  }

  isTerminator(raw: string): boolean {
    return this.settings.terminator !== null && raw === this.settings.terminator;
  }

  private lookup(spelling: string, inlineValue: string | null): TokenClass | null {
    const owners = this.owners.get(spelling);
    if (!owners) return null;
    if (owners.length > 1) {
      return { kind: 'ambiguous', definitions: owners, spelling };
    }
    return { kind: 'match', definition: owners[0], spelling, inlineValue };
  }

  private looksLikeOption(raw: string): boolean {
    return this.settings.optionPrefixes.some(
      (prefix) => raw.startsWith(prefix) && raw.length > prefix.length
    );
  }
}
