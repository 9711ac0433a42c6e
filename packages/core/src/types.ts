/**
 * Core types for the charword system.
 */
import { Data } from "effect";

// ── Character ids ──────────────────────────────────────────────────────────

/**
 * One word as model input: exactly `maxWordLength` shifted character ids.
 * Value 0 only ever appears in the all-zero padding array.
 */
export type CharacterIds = Int32Array;

// ── Tokens ─────────────────────────────────────────────────────────────────

export type SpecialKind = "cls" | "sep" | "mask" | "pad";

export const SPECIAL_KINDS: readonly SpecialKind[] = ["cls", "sep", "mask", "pad"];

/**
 * A token on its way into (or out of) the character-id codec.
 *
 * Special tokens are recognised once, when a string becomes a `Token`, so
 * the codec never compares against configurable special-token text.
 */
export type Token = Data.TaggedEnum<{
  Word: { readonly text: string };
  Special: { readonly kind: SpecialKind };
}>;

export const Token = Data.taggedEnum<Token>();

// ── Model input ────────────────────────────────────────────────────────────

export interface EncodedInput {
  readonly inputIds: readonly CharacterIds[];
  /** 0 for the first segment, 1 for the second. */
  readonly tokenTypeIds: readonly number[];
  /** 1 for real positions, 0 for padding. */
  readonly attentionMask: readonly number[];
  /** 1 for CLS/SEP/PAD positions, 0 for words. */
  readonly specialTokensMask: readonly number[];
  /** Words whose UTF-8 form did not fit and were cut short. */
  readonly truncatedWords: readonly string[];
}

export type PaddingStrategy = "max_length" | "longest" | false;

export interface EncodeOptions {
  /** Wrap the sequence(s) in CLS/SEP. Defaults to true. */
  readonly addSpecialTokens?: boolean;
  /** Drop words (longest sequence first) so the output fits `maxLength`. */
  readonly truncation?: boolean;
  /** Defaults to the tokenizer's `modelMaxLength`. */
  readonly maxLength?: number;
  /** `"longest"` only has an effect on batches. */
  readonly padding?: PaddingStrategy;
}
