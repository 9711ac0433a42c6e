/**
 * Character-id codec.
 *
 * Every word becomes a fixed-width array of `maxWordLength` ids:
 *
 *   [BOW, byte_1, ..., byte_n, EOW, PAD_CHAR, ..., PAD_CHAR]
 *
 * where the bytes are the word's UTF-8 encoding (cut to `maxWordLength - 2`)
 * and every entry is shifted by +1. Id 0 is left to the all-zero PAD
 * array. CLS, SEP and MASK use their own marker id in place of the bytes.
 */
import { Effect } from "effect";
import {
  InvalidByteSequenceError,
  LengthMismatchError,
  SPECIAL_KINDS,
  Token,
  checkMaxWordLength,
  type CharacterIds,
  type DecodeError,
  type SpecialKind,
} from "@charword/core";

// Reserved ids, before the shift. 0-255 are raw UTF-8 bytes.
export const BEGIN_OF_TEXT = 256;
export const END_OF_TEXT = 257;
export const BEGIN_OF_WORD = 258;
export const END_OF_WORD = 259;
export const PAD_CHARACTER = 260;
export const MASK_CHARACTER = 261;

export const ID_SHIFT = 1;

/** Number of distinct shifted ids (0 through MASK_CHARACTER + 1). */
export const CHARACTER_VOCAB_SIZE = MASK_CHARACTER + ID_SHIFT + 1;

const LONE_SURROGATE = /\p{Cs}/gu;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export interface EncodedWord {
  readonly ids: CharacterIds;
  /** UTF-8 length before truncation. */
  readonly byteLength: number;
  readonly truncated: boolean;
}

function shifted(ids: Int32Array): Int32Array {
  for (let i = 0; i < ids.length; i++) ids[i] += ID_SHIFT;
  return ids;
}

function specialCharacterIds(marker: number, maxWordLength: number): Int32Array {
  const ids = new Int32Array(maxWordLength).fill(PAD_CHARACTER);
  ids[0] = BEGIN_OF_WORD;
  ids[1] = marker;
  ids[2] = END_OF_WORD;
  return shifted(ids);
}

export class CharacterIdCodec {
  readonly maxWordLength: number;

  /** Shifted special arrays, built once. Only copies leave the codec. */
  private readonly _special: Readonly<Record<SpecialKind, Int32Array>>;

  constructor(maxWordLength: number) {
    const error = checkMaxWordLength(maxWordLength);
    if (error) throw error;
    this.maxWordLength = maxWordLength;
    this._special = {
      cls: specialCharacterIds(BEGIN_OF_TEXT, maxWordLength),
      sep: specialCharacterIds(END_OF_TEXT, maxWordLength),
      mask: specialCharacterIds(MASK_CHARACTER, maxWordLength),
      pad: new Int32Array(maxWordLength),
    };
  }

  /** Bytes of a word that fit between BOW and EOW. */
  get wordCapacity(): number {
    return this.maxWordLength - 2;
  }

  special(kind: SpecialKind): CharacterIds {
    return this._special[kind].slice();
  }

  encode(token: Token): CharacterIds {
    return Token.$match(token, {
      Word: ({ text }) => this.encodeWord(text).ids,
      Special: ({ kind }) => this.special(kind),
    });
  }

  /**
   * Encode an ordinary word and report whether it was truncated.
   *
   * Lone surrogates have no UTF-8 form and are dropped. Truncation works on
   * bytes, so it may cut a multi-byte character in half; such an array no
   * longer decodes.
   */
  encodeWord(text: string): EncodedWord {
    const bytes = utf8Encoder.encode(text.replace(LONE_SURROGATE, ""));
    const truncated = bytes.length > this.wordCapacity;
    const kept = truncated ? bytes.subarray(0, this.wordCapacity) : bytes;

    const ids = new Int32Array(this.maxWordLength).fill(PAD_CHARACTER);
    ids[0] = BEGIN_OF_WORD;
    ids.set(kept, 1);
    ids[kept.length + 1] = END_OF_WORD;

    return { ids: shifted(ids), byteLength: bytes.length, truncated };
  }

  /**
   * Decode one array back into a token.
   *
   * Fails when the length is not `maxWordLength`, when an id outside the
   * byte range survives delimiter removal, or when the bytes are not UTF-8.
   */
  decode(ids: ArrayLike<number>): Effect.Effect<Token, DecodeError> {
    if (ids.length !== this.maxWordLength) {
      return Effect.fail(
        new LengthMismatchError({
          message: `Got a character sequence of length ${ids.length} while maxWordLength=${this.maxWordLength}`,
          expected: this.maxWordLength,
          actual: ids.length,
        }),
      );
    }

    const unshifted = Array.from(ids, (id) => id - ID_SHIFT);
    for (const kind of SPECIAL_KINDS) {
      if (this._isSpecial(unshifted, kind)) {
        return Effect.succeed(Token.Special({ kind }));
      }
    }

    const bytes: number[] = [];
    for (const id of unshifted) {
      if (id === BEGIN_OF_WORD || id === END_OF_WORD || id === PAD_CHARACTER) continue;
      if (!Number.isInteger(id) || id < 0 || id > 255) {
        return Effect.fail(
          new InvalidByteSequenceError({
            message: `Character id ${id + ID_SHIFT} does not stand for a UTF-8 byte`,
          }),
        );
      }
      bytes.push(id);
    }

    return Effect.try({
      try: () => Token.Word({ text: utf8Decoder.decode(Uint8Array.from(bytes)) }),
      catch: (cause) =>
        new InvalidByteSequenceError({ message: "Character ids do not form valid UTF-8", cause }),
    });
  }

  /** Which special array `ids` is, compared as-is (shifted). */
  specialKindOf(ids: ArrayLike<number>): SpecialKind | undefined {
    if (ids.length !== this.maxWordLength) return undefined;
    return SPECIAL_KINDS.find((kind) => this._special[kind].every((id, i) => ids[i] === id));
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _isSpecial(unshifted: readonly number[], kind: SpecialKind): boolean {
    const reference = this._special[kind];
    for (let i = 0; i < reference.length; i++) {
      if (unshifted[i] !== reference[i] - ID_SHIFT) return false;
    }
    return true;
  }
}
