/**
 * Accumulates what the scan recorded for each option key, with provenance.
 * Raw strings stay raw here; conversion happens afterwards in the applier.
 */
import type { ParseOrigin } from './types.js';

export type RecordedValue =
  | { readonly kind: 'raw'; readonly raw: string; readonly origin: ParseOrigin }
  | { readonly kind: 'present'; readonly origin: ParseOrigin };

export interface StoreEntry {
  readonly key: string;
  readonly values: readonly RecordedValue[];
  readonly origin: ParseOrigin;
}

export function originAt(...indices: number[]): ParseOrigin {
  return Object.freeze({ indices: Object.freeze(indices) });
}

export class ValueStore {
  private readonly entries = new Map<string, StoreEntry>();
  private readonly seen = new Set<string>();

  /** Note that an occurrence of `key` was matched, whether or not it recorded a value. */
  markSeen(key: string): void {
    this.seen.add(key);
  }

  wasSeen(key: string): boolean {
    return this.seen.has(key) || this.entries.has(key);
  }

  /** Replace whatever `key` held. */
  set(key: string, value: RecordedValue): void {
    this.entries.set(key, { key, values: [value], origin: value.origin });
  }

  /** Append to `key`, creating the entry on first use. */
  update(key: string, value: RecordedValue): void {
    const existing = this.entries.get(key);
    if (!existing) {
      this.set(key, value);
      return;
    }
    this.entries.set(key, {
      key,
      values: [...existing.values, value],
      origin: originAt(...existing.origin.indices, ...value.origin.indices),
    });
  }

  get(key: string): StoreEntry | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
