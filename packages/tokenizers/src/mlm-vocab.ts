/**
 * Word vocabulary for the masked-language-model head.
 *
 * Only labels MLM targets; model input never goes through it. The text form
 * is one token per line, the line number being the token's index.
 */

/** A break in the index sequence found while serialising. */
export interface IndexGap {
  readonly expected: number;
  readonly found: number;
}

export class MlmVocabulary {
  /** token -> index */
  private readonly _stoi = new Map<string, number>();

  /** index -> token */
  private readonly _itos = new Map<number, string>();

  constructor(entries: Iterable<readonly [string, number]> = []) {
    for (const [token, index] of entries) {
      this._stoi.set(token, index);
    }
    for (const [token, index] of this._stoi) {
      this._itos.set(index, token);
    }
  }

  static empty(): MlmVocabulary {
    return new MlmVocabulary();
  }

  static fromTokens(tokens: readonly string[]): MlmVocabulary {
    return new MlmVocabulary(tokens.map((token, index) => [token, index] as const));
  }

  /**
   * Parse the one-token-per-line text form. `\r\n` and `\r` count as line
   * breaks; a final line break does not start another token. A repeated
   * token keeps its last index.
   */
  static parse(text: string): MlmVocabulary {
    if (text.length === 0) return MlmVocabulary.empty();
    const lines = text.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === "") lines.pop();
    return MlmVocabulary.fromTokens(lines);
  }

  get size(): number {
    return this._stoi.size;
  }

  tokenToId(token: string): number | undefined {
    return this._stoi.get(token);
  }

  idToToken(index: number): string | undefined {
    return this._itos.get(index);
  }

  /** Entries ordered by index. */
  entries(): [string, number][] {
    return [...this._stoi].sort((a, b) => a[1] - b[1]);
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this._stoi);
  }

  /**
   * Text form ordered by index. Indices that do not follow on from the
   * previous one are reported in `gaps`; the tokens are written regardless,
   * so reloading renumbers them.
   */
  serialize(): { readonly text: string; readonly gaps: readonly IndexGap[] } {
    const gaps: IndexGap[] = [];
    const lines: string[] = [];
    let expected = 0;
    for (const [token, index] of this.entries()) {
      if (index !== expected) {
        gaps.push({ expected, found: index });
        expected = index;
      }
      lines.push(`${token}\n`);
      expected++;
    }
    return { text: lines.join(""), gaps };
  }
}
