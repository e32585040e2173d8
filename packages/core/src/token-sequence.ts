/**
 * The arguments a decode pass has not claimed yet.
 *
 * Immutable: claiming tokens returns a new sequence, so the caller's argv
 * array and any snapshot taken earlier never change under the decoder.
 */
export class TokenSequence {
  private readonly tokens: readonly string[];

  constructor(tokens: readonly string[]) {
    this.tokens = [...tokens];
  }

  get length(): number {
    return this.tokens.length;
  }

  /** Position of the first token equal to `token`, if any. */
  indexOf(token: string): number | undefined {
    const index = this.tokens.indexOf(token);
    return index === -1 ? undefined : index;
  }

  at(index: number): string | undefined {
    return this.tokens[index];
  }

  /** A new sequence without `count` tokens starting at `index`. */
  without(index: number, count: number): TokenSequence {
    return new TokenSequence([
      ...this.tokens.slice(0, index),
      ...this.tokens.slice(index + count),
    ]);
  }

  toArray(): string[] {
    return [...this.tokens];
  }
}
