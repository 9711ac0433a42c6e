/**
 * Basic segmenter.
 *
 * Turns raw text into word-like tokens: cleanup, CJK isolation, NFC,
 * whitespace splitting, casing/accent normalisation and punctuation
 * splitting. Segmentation is deterministic and not invertible.
 */
import type { TokenizerConfig } from "@charword/core";
import { cleanText, isPunctuation, isolateCjk, stripAccents } from "./unicode.js";

export type SegmenterOptions = Pick<
  TokenizerConfig,
  "doLowerCase" | "neverSplit" | "tokenizeChineseChars" | "stripAccents" | "doSplitOnPunc"
>;

/** Trim and split on runs of whitespace. Blank input gives no tokens. */
export function whitespaceTokenize(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  return trimmed.split(/\s+/);
}

export class BasicSegmenter {
  readonly doLowerCase: boolean;
  readonly tokenizeChineseChars: boolean;
  readonly stripAccents: boolean | undefined;
  readonly doSplitOnPunc: boolean;

  /** Tokens kept verbatim: no casing, accent or punctuation changes. */
  private readonly _neverSplit: ReadonlySet<string>;

  constructor(options: SegmenterOptions) {
    this.doLowerCase = options.doLowerCase;
    this.tokenizeChineseChars = options.tokenizeChineseChars;
    this.stripAccents = options.stripAccents;
    this.doSplitOnPunc = options.doSplitOnPunc;
    this._neverSplit = new Set(options.neverSplit);
  }

  /**
   * Segment `text` into tokens.
   *
   * `neverSplit` adds to the configured set for this call only.
   */
  segment(text: string, neverSplit?: Iterable<string>): string[] {
    const keep = neverSplit ? new Set([...this._neverSplit, ...neverSplit]) : this._neverSplit;

    let cleaned = cleanText(text);
    if (this.tokenizeChineseChars) {
      cleaned = isolateCjk(cleaned);
    }
    // Same character written with different code points should match.
    const normalized = cleaned.normalize("NFC");

    const segments: string[] = [];
    for (const original of whitespaceTokenize(normalized)) {
      let token = original;
      if (!keep.has(token)) {
        if (this.doLowerCase) {
          token = token.toLowerCase();
          if (this.stripAccents !== false) token = stripAccents(token);
        } else if (this.stripAccents) {
          token = stripAccents(token);
        }
      }
      for (const piece of this._splitOnPunctuation(token, keep)) {
        segments.push(piece);
      }
    }

    return whitespaceTokenize(segments.join(" "));
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  /** Each punctuation character becomes its own piece. */
  private _splitOnPunctuation(token: string, keep: ReadonlySet<string>): string[] {
    if (!this.doSplitOnPunc || keep.has(token)) {
      return [token];
    }
    const pieces: string[] = [];
    let current = "";
    for (const ch of token) {
      if (isPunctuation(ch)) {
        if (current) pieces.push(current);
        current = "";
        pieces.push(ch);
      } else {
        current += ch;
      }
    }
    if (current) pieces.push(current);
    return pieces;
  }
}
