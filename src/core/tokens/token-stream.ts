/**
 * Indexed, mutable view over the raw argument tokens of one parse call.
 *
 * Tokens themselves never change; the stream tracks which ones have been
 * claimed and where the cursor stands. Claiming is permanent. A token can be
 * claimed away from the cursor (scanning strategies do this), which leaves the
 * relative order of everything still unclaimed intact.
 */

/** One raw argument and its position in the original argument list. */
export interface Token {
  readonly index: number;
  readonly value: string;
}

export class TokenStream {
  private readonly tokens: readonly Token[];
  private readonly claimed: boolean[];
  private cursor = 0;

  constructor(values: readonly string[]) {
    this.tokens = values.map((value, index) => Object.freeze({ index, value }));
    this.claimed = values.map(() => false);
    this.settle();
  }

  /** Number of tokens in the original argument list. */
  get length(): number {
    return this.tokens.length;
  }

  /** True when no unclaimed token remains at or after the cursor. */
  get atEnd(): boolean {
    return this.cursor >= this.tokens.length;
  }

  /**
   * The `offset`-th unclaimed token at or after the cursor, without
   * consuming it. `undefined` once the offset runs past the end of input.
   */
  peek(offset = 0): Token | undefined {
    let remaining = offset;
    for (let i = this.cursor; i < this.tokens.length; i += 1) {
      if (this.claimed[i]) continue;
      if (remaining === 0) return this.tokens[i];
      remaining -= 1;
    }
    return undefined;
  }

  /** Claim and return the token at the cursor. */
  consume(): Token | undefined {
    const token = this.peek();
    if (!token) return undefined;
    this.claimed[token.index] = true;
    this.settle();
    return token;
  }

  /** Claim the token at the cursor only when it satisfies `predicate`. */
  consumeIf(predicate: (token: Token) => boolean): Token | undefined {
    const token = this.peek();
    if (!token || !predicate(token)) return undefined;
    return this.consume();
  }

  /** Move the cursor past the current token, leaving it unclaimed. */
  skip(): Token | undefined {
    const token = this.peek();
    if (!token) return undefined;
    this.cursor = token.index + 1;
    this.settle();
    return token;
  }

  /**
   * Claim a token anywhere in the stream. Returns false if it was already
   * claimed.
   */
  claim(token: Token): boolean {
    if (this.claimed[token.index]) return false;
    this.claimed[token.index] = true;
    this.settle();
    return true;
  }

  /**
   * First unclaimed token after the cursor satisfying `predicate`. Scanning
   * gives up at the first token matching `stop`.
   */
  find(
    predicate: (token: Token) => boolean,
    stop: (token: Token) => boolean = () => false
  ): Token | undefined {
    for (let i = this.cursor; i < this.tokens.length; i += 1) {
      if (this.claimed[i]) continue;
      const token = this.tokens[i];
      if (stop(token)) return undefined;
      if (predicate(token)) return token;
    }
    return undefined;
  }

  /** Claim every unclaimed token from the cursor to the end of input. */
  drain(): Token[] {
    const drained: Token[] = [];
    for (let token = this.consume(); token; token = this.consume()) {
      drained.push(token);
    }
    return drained;
  }

  /** Every token that no one has claimed, in original order. */
  unclaimed(): Token[] {
    return this.tokens.filter((token) => !this.claimed[token.index]);
  }

  private settle(): void {
    while (this.cursor < this.tokens.length && this.claimed[this.cursor]) {
      this.cursor += 1;
    }
  }
}
