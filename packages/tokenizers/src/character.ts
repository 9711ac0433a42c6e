/**
 * Character-level tokenizer.
 *
 * Text is segmented into words, and every word becomes a fixed-width array
 * of byte-derived character ids (see `codec.ts`). There is no subword
 * vocabulary: any word, seen or unseen, encodes the same way. An optional
 * word vocabulary serves masked-language-model labels only.
 */
import { join } from "node:path";
import { Effect, type Either } from "effect";
import {
  BatchDecodeError,
  ConfigError,
  defaultTokenizerConfig,
  mergeConfig,
  presetOptions,
  presets,
  resolveConfig,
  Token,
  type CharacterIds,
  type DecodeError,
  type EncodeOptions,
  type EncodedInput,
  type MissingFileError,
  type PresetConfig,
  type SpecialKind,
  type Tokenizer,
  type TokenizerConfig,
  type TokenizerOptions,
  type VocabularyError,
} from "@charword/core";
import {
  buildInputs,
  markSpecial,
  specialTokensMask,
  tokenTypeIds,
  truncateLongestFirst,
  type SequenceDelimiters,
} from "./assembly.js";
import { CHARACTER_VOCAB_SIZE, CharacterIdCodec, type EncodedWord } from "./codec.js";
import { MlmVocabulary } from "./mlm-vocab.js";
import {
  MLM_VOCAB_FILE,
  TOKENIZER_CONFIG_FILE,
  loadMlmVocab,
  loadTokenizerConfig,
  saveMlmVocab,
  saveTokenizerConfig,
} from "./persist.js";
import { BasicSegmenter, whitespaceTokenize } from "./segmenter.js";

export interface SpecialTokensMaskOptions {
  /** The sequence was built by `buildInputs` (or equivalent) already. */
  readonly alreadyHasSpecialTokens: boolean;
}

export interface DecodeOptions {
  readonly skipSpecialTokens?: boolean;
}

export type BatchItem = string | readonly [string, string];

type LoadError = ConfigError | MissingFileError | VocabularyError;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class CharacterTokenizer implements Tokenizer {
  readonly name = "character";

  readonly config: TokenizerConfig;

  private readonly _codec: CharacterIdCodec;

  /** Absent when `doBasicTokenize` is off. */
  private readonly _segmenter: BasicSegmenter | undefined;

  private readonly _mlmVocab: MlmVocabulary;

  /** special-token text -> kind. UNK has no array of its own. */
  private readonly _specialByText: ReadonlyMap<string, SpecialKind>;

  /** The UNK text as an ordinary word; still counts as special in masks. */
  private readonly _unkIds: CharacterIds;

  /** Matches any configured special-token text, captured. */
  private readonly _specialPattern: RegExp | undefined;

  private readonly _delimiters: SequenceDelimiters<CharacterIds>;

  /**
   * Throws `ConfigError` when `maxWordLength` is below 3. Use `make` to
   * validate options and load the MLM vocabulary inside an Effect.
   */
  constructor(config: TokenizerConfig, mlmVocab: MlmVocabulary = MlmVocabulary.empty()) {
    this.config = config;
    this._codec = new CharacterIdCodec(config.maxWordLength);
    this._segmenter = config.doBasicTokenize ? new BasicSegmenter(config) : undefined;
    this._mlmVocab = mlmVocab;

    // Later entries win, so CLS beats SEP beats MASK beats PAD on equal text.
    this._specialByText = new Map<string, SpecialKind>([
      [config.padToken, "pad"],
      [config.maskToken, "mask"],
      [config.sepToken, "sep"],
      [config.clsToken, "cls"],
    ]);

    const alternatives = [...new Set(this.allSpecialTokens)]
      .filter((token) => token.length > 0)
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    this._specialPattern =
      alternatives.length > 0 ? new RegExp(`(${alternatives.join("|")})`) : undefined;

    this._unkIds = this._codec.encodeWord(config.unkToken).ids;

    this._delimiters = {
      cls: () => this._codec.special("cls"),
      sep: () => this._codec.special("sep"),
    };
  }

  // ── Construction ─────────────────────────────────────────────────────────

  /**
   * Validate options over `base` (the defaults unless given), load the MLM
   * vocabulary file if one is named, and build the tokenizer.
   */
  static make(
    options: TokenizerOptions = {},
    base: TokenizerConfig = defaultTokenizerConfig,
  ): Effect.Effect<CharacterTokenizer, LoadError> {
    const { mlmVocabFile, ...settings } = options;
    const vocab: Effect.Effect<MlmVocabulary, MissingFileError | VocabularyError> = mlmVocabFile
      ? loadMlmVocab(mlmVocabFile)
      : Effect.succeed(MlmVocabulary.empty());

    return resolveConfig(settings, base).pipe(
      Effect.flatMap((config) => vocab.pipe(Effect.map((mlm) => new CharacterTokenizer(config, mlm)))),
      Effect.tap((tokenizer) =>
        Effect.logDebug(
          `Character tokenizer ready: maxWordLength=${tokenizer.maxWordLength} mlmVocab=${tokenizer.mlmVocabSize}`,
        ),
      ),
    );
  }

  /** Build a tokenizer from a named preset; `overrides` win over the preset. */
  static fromPreset(
    name: string,
    overrides: TokenizerOptions = {},
    table: ReadonlyMap<string, PresetConfig> = presets,
  ): Effect.Effect<CharacterTokenizer, LoadError> {
    const preset = table.get(name);
    if (!preset) {
      const available = [...table.keys()].join(", ");
      return Effect.fail(new ConfigError({ message: `Unknown preset "${name}". Available: ${available}` }));
    }
    return CharacterTokenizer.make(overrides, mergeConfig(presetOptions(preset)));
  }

  /**
   * Reload a tokenizer written by `savePretrained`. The MLM vocabulary is
   * optional; the settings file is not.
   */
  static fromDirectory(dir: string, prefix?: string): Effect.Effect<CharacterTokenizer, LoadError> {
    const vocabPath = join(dir, prefix ? `${prefix}-${MLM_VOCAB_FILE}` : MLM_VOCAB_FILE);
    return loadTokenizerConfig(join(dir, TOKENIZER_CONFIG_FILE)).pipe(
      Effect.flatMap(resolveConfig),
      Effect.flatMap((config) =>
        loadMlmVocab(vocabPath).pipe(
          Effect.catchTag("MissingFileError", () => Effect.succeed(MlmVocabulary.empty())),
          Effect.map((mlm) => new CharacterTokenizer(config, mlm)),
        ),
      ),
      Effect.withSpan("CharacterTokenizer.fromDirectory"),
    );
  }

  // ── Properties ───────────────────────────────────────────────────────────

  get maxWordLength(): number {
    return this._codec.maxWordLength;
  }

  get doLowerCase(): boolean {
    return this.config.doLowerCase;
  }

  /** Distinct character ids an embedding table must cover. */
  get characterVocabSize(): number {
    return CHARACTER_VOCAB_SIZE;
  }

  get mlmVocabSize(): number {
    return this._mlmVocab.size;
  }

  get allSpecialTokens(): string[] {
    const { unkToken, sepToken, padToken, clsToken, maskToken } = this.config;
    return [unkToken, sepToken, padToken, clsToken, maskToken];
  }

  getMlmVocab(): Record<string, number> {
    return this._mlmVocab.toRecord();
  }

  // ── Text <-> tokens ──────────────────────────────────────────────────────

  /**
   * Split text into word tokens. Special-token text (`[CLS]`, `[MASK]`, ...)
   * inside the input is kept whole and never lowercased or split.
   */
  tokenize(text: string): string[] {
    if (!this._specialPattern) {
      return this._tokenizePlain(text);
    }
    const tokens: string[] = [];
    const parts = text.split(this._specialPattern);
    for (let i = 0; i < parts.length; i++) {
      // split() with a capture group puts the matches at odd indices
      if (i % 2 === 1) tokens.push(parts[i]);
      else tokens.push(...this._tokenizePlain(parts[i]));
    }
    return tokens;
  }

  /** Classify a token string. Only CLS/SEP/MASK/PAD text is special. */
  toToken(text: string): Token {
    const kind = this._specialByText.get(text);
    return kind === undefined ? Token.Word({ text }) : Token.Special({ kind });
  }

  tokenToString(token: Token): string {
    return Token.$match(token, {
      Word: ({ text }) => text,
      Special: ({ kind }) => this._specialText(kind),
    });
  }

  /** Join with spaces, dropping `##` continuation joins. */
  convertTokensToString(tokens: readonly string[]): string {
    return tokens.join(" ").replace(/ ##/g, "").trim();
  }

  // ── Tokens <-> character ids ─────────────────────────────────────────────

  encodeToken(token: string | Token): CharacterIds {
    return this._codec.encode(typeof token === "string" ? this.toToken(token) : token);
  }

  /** Encode an ordinary word and report truncation. */
  encodeWord(text: string): EncodedWord {
    return this._codec.encodeWord(text);
  }

  decodeToken(ids: ArrayLike<number>): Effect.Effect<Token, DecodeError> {
    return this._codec.decode(ids);
  }

  /** Decode one array; special arrays come back as their configured text. */
  decodeIds(ids: ArrayLike<number>): Effect.Effect<string, DecodeError> {
    return this._codec.decode(ids).pipe(Effect.map((token) => this.tokenToString(token)));
  }

  /** Whether `ids` is exactly the CLS, SEP, MASK, PAD or UNK array. */
  isSpecialIds(ids: ArrayLike<number>): boolean {
    if (this._codec.specialKindOf(ids) !== undefined) return true;
    return ids.length === this._unkIds.length && this._unkIds.every((id, i) => ids[i] === id);
  }

  // ── Sequence assembly ────────────────────────────────────────────────────

  buildInputs(seqA: readonly CharacterIds[], seqB?: readonly CharacterIds[]): CharacterIds[] {
    return buildInputs(this._delimiters, seqA, seqB);
  }

  tokenTypeIds(seqA: readonly CharacterIds[], seqB?: readonly CharacterIds[]): number[] {
    return tokenTypeIds(seqA, seqB);
  }

  specialTokensMask(seqA: readonly CharacterIds[], seqB?: readonly CharacterIds[]): number[];
  specialTokensMask(sequence: readonly ArrayLike<number>[], options: SpecialTokensMaskOptions): number[];
  specialTokensMask(
    seqA: readonly ArrayLike<number>[],
    second?: readonly ArrayLike<number>[] | SpecialTokensMaskOptions,
  ): number[] {
    if (second !== undefined && "alreadyHasSpecialTokens" in second) {
      return second.alreadyHasSpecialTokens
        ? markSpecial(seqA, (ids) => this.isSpecialIds(ids))
        : specialTokensMask(seqA);
    }
    return specialTokensMask(seqA, second);
  }

  // ── Full pipeline ────────────────────────────────────────────────────────

  /**
   * Text (or a text pair) to model input.
   *
   * With `truncation`, words are dropped longest-sequence-first until the
   * output, special tokens included, fits `maxLength`. With
   * `padding: "max_length"` the output is filled up to `maxLength` with PAD
   * arrays.
   */
  encode(text: string, pair?: string, options: EncodeOptions = {}): EncodedInput {
    const addSpecialTokens = options.addSpecialTokens ?? true;
    const maxLength = options.maxLength ?? this.config.modelMaxLength;
    const truncatedWords: string[] = [];

    const encodeAll = (words: readonly string[]): CharacterIds[] =>
      words.map((word) => {
        const token = this.toToken(word);
        if (token._tag === "Special") return this._codec.special(token.kind);
        const encoded = this._codec.encodeWord(token.text);
        if (encoded.truncated) truncatedWords.push(token.text);
        return encoded.ids;
      });

    let seqA = encodeAll(this.tokenize(text));
    let seqB = pair === undefined ? undefined : encodeAll(this.tokenize(pair));

    if (options.truncation && maxLength !== undefined) {
      const reserved = addSpecialTokens ? (seqB === undefined ? 2 : 3) : 0;
      [seqA, seqB] = truncateLongestFirst(seqA, seqB, Math.max(0, maxLength - reserved));
    }

    const lengthB = seqB?.length ?? 0;
    const encoded: EncodedInput = addSpecialTokens
      ? {
          inputIds: this.buildInputs(seqA, seqB),
          tokenTypeIds: this.tokenTypeIds(seqA, seqB),
          attentionMask: new Array<number>(seqA.length + lengthB + (seqB === undefined ? 2 : 3)).fill(1),
          specialTokensMask: this.specialTokensMask(seqA, seqB),
          truncatedWords,
        }
      : {
          inputIds: [...seqA, ...(seqB ?? [])],
          tokenTypeIds: [...new Array<number>(seqA.length).fill(0), ...new Array<number>(lengthB).fill(1)],
          attentionMask: new Array<number>(seqA.length + lengthB).fill(1),
          specialTokensMask: new Array<number>(seqA.length + lengthB).fill(0),
          truncatedWords,
        };

    if (options.padding === "max_length" && maxLength !== undefined) {
      return this._pad(encoded, maxLength);
    }
    return encoded;
  }

  /**
   * Encode a batch of texts or text pairs. Truncated words are logged per
   * element. `padding: "longest"` pads every element to the longest one.
   */
  encodeBatch(items: readonly BatchItem[], options: EncodeOptions = {}): Effect.Effect<EncodedInput[]> {
    const perItem: EncodeOptions = options.padding === "longest" ? { ...options, padding: false } : options;

    return Effect.forEach(items, (item, index): Effect.Effect<EncodedInput> => {
      const [text, pair] = typeof item === "string" ? [item, undefined] : item;
      const encoded = this.encode(text, pair, perItem);
      if (encoded.truncatedWords.length === 0) {
        return Effect.succeed(encoded);
      }
      return Effect.logWarning(
        `Batch element ${index}: ${encoded.truncatedWords.length} word(s) longer than ` +
          `${this._codec.wordCapacity} bytes were truncated: ${encoded.truncatedWords.join(", ")}`,
      ).pipe(Effect.as(encoded));
    }).pipe(
      Effect.map((batch) => {
        if (options.padding !== "longest") return batch;
        const longest = Math.max(0, ...batch.map((encoded) => encoded.inputIds.length));
        return batch.map((encoded) => this._pad(encoded, longest));
      }),
      Effect.withSpan("CharacterTokenizer.encodeBatch"),
    );
  }

  /**
   * Decode a sequence of arrays back into text. The first array that does
   * not decode fails the whole sequence, with its position in the error.
   */
  decode(sequence: readonly ArrayLike<number>[], options: DecodeOptions = {}): Effect.Effect<string, BatchDecodeError> {
    return Effect.forEach(sequence, (ids, index) => this._decodeAt(ids, index)).pipe(
      Effect.map((tokens) =>
        this.convertTokensToString(
          tokens
            .filter((token) => !(options.skipSpecialTokens && token._tag === "Special"))
            .map((token) => this.tokenToString(token)),
        ),
      ),
    );
  }

  /** Decode every array independently; failures stay with their element. */
  decodeBatch(batch: readonly ArrayLike<number>[]): Effect.Effect<Either.Either<string, BatchDecodeError>[]> {
    return Effect.forEach(batch, (ids, index) =>
      this._decodeAt(ids, index).pipe(
        Effect.map((token) => this.tokenToString(token)),
        Effect.either,
      ),
    );
  }

  /** Like `decodeBatch`, but the first failing element fails the batch. */
  decodeBatchStrict(batch: readonly ArrayLike<number>[]): Effect.Effect<string[], BatchDecodeError> {
    return Effect.forEach(batch, (ids, index) =>
      this._decodeAt(ids, index).pipe(Effect.map((token) => this.tokenToString(token))),
    );
  }

  // ── MLM vocabulary ───────────────────────────────────────────────────────

  /** Index of `token`, falling back to the UNK token's index. */
  convertMlmTokenToId(token: string): number | undefined {
    return this._mlmVocab.tokenToId(token) ?? this._mlmVocab.tokenToId(this.config.unkToken);
  }

  convertMlmIdToToken(index: number): string {
    return this._mlmVocab.idToToken(index) ?? this.config.unkToken;
  }

  // ── Persistence ──────────────────────────────────────────────────────────

  /** There is no token vocabulary to write; logs a warning and writes nothing. */
  saveVocabulary(): Effect.Effect<readonly string[]> {
    return Effect.logWarning(
      "Character tokenizers do not have a token vocabulary. Skipping saving `vocab.txt`.",
    ).pipe(Effect.as([]));
  }

  saveMlmVocabulary(target: string, prefix?: string): Effect.Effect<string, VocabularyError> {
    return saveMlmVocab(target, this._mlmVocab, prefix);
  }

  /** Write `tokenizer_config.json` and the MLM vocabulary into `dir`. */
  savePretrained(dir: string, prefix?: string): Effect.Effect<string[], ConfigError | VocabularyError> {
    return saveTokenizerConfig(dir, this.config).pipe(
      Effect.flatMap((configPath) =>
        this.saveMlmVocabulary(dir, prefix).pipe(Effect.map((vocabPath) => [configPath, vocabPath])),
      ),
      Effect.withSpan("CharacterTokenizer.savePretrained"),
    );
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _tokenizePlain(text: string): string[] {
    if (!this._segmenter) {
      return whitespaceTokenize(text);
    }
    return this._segmenter.segment(text, this.allSpecialTokens);
  }

  private _specialText(kind: SpecialKind): string {
    switch (kind) {
      case "cls": return this.config.clsToken;
      case "sep": return this.config.sepToken;
      case "mask": return this.config.maskToken;
      case "pad": return this.config.padToken;
    }
  }

  private _decodeAt(ids: ArrayLike<number>, index: number): Effect.Effect<Token, BatchDecodeError> {
    return this._codec.decode(ids).pipe(
      Effect.mapError(
        (cause) => new BatchDecodeError({ message: `Element ${index}: ${cause.message}`, index, cause }),
      ),
    );
  }

  /** Right-pad with PAD arrays up to `length`. */
  private _pad(encoded: EncodedInput, length: number): EncodedInput {
    const missing = length - encoded.inputIds.length;
    if (missing <= 0) return encoded;
    const fill = (value: number) => new Array<number>(missing).fill(value);
    return {
      inputIds: [
        ...encoded.inputIds,
        ...Array.from({ length: missing }, () => this._codec.special("pad")),
      ],
      tokenTypeIds: [...encoded.tokenTypeIds, ...fill(0)],
      attentionMask: [...encoded.attentionMask, ...fill(0)],
      specialTokensMask: [...encoded.specialTokensMask, ...fill(1)],
      truncatedWords: encoded.truncatedWords,
    };
  }
}
