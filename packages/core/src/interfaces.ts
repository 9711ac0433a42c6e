/**
 * Subsystem interfaces (ports).
 */
import { Context, Effect } from "effect";
import type { DecodeError } from "./errors.js";
import type { CharacterIds, EncodeOptions, EncodedInput, Token } from "./types.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────

export interface Tokenizer {
  readonly name: string;
  readonly maxWordLength: number;
  tokenize(text: string): string[];
  encodeToken(token: string | Token): CharacterIds;
  decodeIds(ids: ArrayLike<number>): Effect.Effect<string, DecodeError>;
  buildInputs(seqA: readonly CharacterIds[], seqB?: readonly CharacterIds[]): CharacterIds[];
  tokenTypeIds(seqA: readonly CharacterIds[], seqB?: readonly CharacterIds[]): number[];
  specialTokensMask(seqA: readonly CharacterIds[], seqB?: readonly CharacterIds[]): number[];
  convertTokensToString(tokens: readonly string[]): string;
  encode(text: string, pair?: string, options?: EncodeOptions): EncodedInput;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}
