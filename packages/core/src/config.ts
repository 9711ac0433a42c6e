/**
 * TokenizerConfig type, defaults and validation.
 */
import { Effect, Either } from "effect";
import { ConfigError } from "./errors.js";

export interface TokenizerConfig {
  /** Character ids per word, BOW and EOW included. */
  readonly maxWordLength: number;

  // -- Segmentation --
  readonly doLowerCase: boolean;
  /** When false, text is only split on whitespace. */
  readonly doBasicTokenize: boolean;
  readonly neverSplit: readonly string[];
  readonly tokenizeChineseChars: boolean;
  /** Unset means: follow `doLowerCase`. */
  readonly stripAccents: boolean | undefined;
  readonly doSplitOnPunc: boolean;

  // -- Special tokens --
  readonly unkToken: string;
  readonly sepToken: string;
  readonly padToken: string;
  readonly clsToken: string;
  readonly maskToken: string;

  /** Longest input (in words) the consuming model accepts, if known. */
  readonly modelMaxLength: number | undefined;
}

export interface TokenizerOptions extends Partial<TokenizerConfig> {
  /** Plain-text MLM vocabulary, one token per line. */
  readonly mlmVocabFile?: string;
}

export const MIN_WORD_LENGTH = 3;

export const defaultTokenizerConfig: TokenizerConfig = {
  maxWordLength: 50,

  doLowerCase: true,
  doBasicTokenize: true,
  neverSplit: [],
  tokenizeChineseChars: true,
  stripAccents: undefined,
  doSplitOnPunc: true,

  unkToken: "[UNK]",
  sepToken: "[SEP]",
  padToken: "[PAD]",
  clsToken: "[CLS]",
  maskToken: "[MASK]",

  modelMaxLength: undefined,
};

/** Fill unset (or explicitly undefined) fields from the defaults. */
export function mergeConfig(
  options: Partial<TokenizerConfig> = {},
  base: TokenizerConfig = defaultTokenizerConfig,
): TokenizerConfig {
  return {
    maxWordLength: options.maxWordLength ?? base.maxWordLength,
    doLowerCase: options.doLowerCase ?? base.doLowerCase,
    doBasicTokenize: options.doBasicTokenize ?? base.doBasicTokenize,
    neverSplit: options.neverSplit ?? base.neverSplit,
    tokenizeChineseChars: options.tokenizeChineseChars ?? base.tokenizeChineseChars,
    stripAccents: options.stripAccents ?? base.stripAccents,
    doSplitOnPunc: options.doSplitOnPunc ?? base.doSplitOnPunc,
    unkToken: options.unkToken ?? base.unkToken,
    sepToken: options.sepToken ?? base.sepToken,
    padToken: options.padToken ?? base.padToken,
    clsToken: options.clsToken ?? base.clsToken,
    maskToken: options.maskToken ?? base.maskToken,
    modelMaxLength: options.modelMaxLength ?? base.modelMaxLength,
  };
}

export function checkMaxWordLength(value: number): ConfigError | undefined {
  if (!Number.isInteger(value) || value < MIN_WORD_LENGTH) {
    return new ConfigError({
      message: `maxWordLength must be an integer >= ${MIN_WORD_LENGTH}, got ${value}`,
    });
  }
  return undefined;
}

export function validateConfig(config: TokenizerConfig): Either.Either<TokenizerConfig, ConfigError> {
  const wordLengthError = checkMaxWordLength(config.maxWordLength);
  if (wordLengthError) return Either.left(wordLengthError);

  if (
    config.modelMaxLength !== undefined &&
    (!Number.isInteger(config.modelMaxLength) || config.modelMaxLength < 0)
  ) {
    return Either.left(
      new ConfigError({
        message: `modelMaxLength must be a non-negative integer, got ${config.modelMaxLength}`,
      }),
    );
  }
  return Either.right(config);
}

/** Merge options over `base` (the defaults unless given) and validate. */
export function resolveConfig(
  options: Partial<TokenizerConfig> = {},
  base: TokenizerConfig = defaultTokenizerConfig,
): Effect.Effect<TokenizerConfig, ConfigError> {
  return Effect.suspend((): Effect.Effect<TokenizerConfig, ConfigError> =>
    Either.match(validateConfig(mergeConfig(options, base)), {
      onLeft: (error) => Effect.fail(error),
      onRight: (config) => Effect.succeed(config),
    }),
  );
}

// ── JSON form ──────────────────────────────────────────────────────────────

const BOOLEAN_FIELDS = [
  "doLowerCase",
  "doBasicTokenize",
  "tokenizeChineseChars",
  "stripAccents",
  "doSplitOnPunc",
] as const;

const STRING_FIELDS = ["unkToken", "sepToken", "padToken", "clsToken", "maskToken"] as const;

const NUMBER_FIELDS = ["maxWordLength", "modelMaxLength"] as const;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Validate a parsed `tokenizer_config.json` payload field by field.
 *
 * Unknown keys are ignored; missing keys stay unset so the defaults apply.
 */
export function parseTokenizerConfig(data: unknown): Either.Either<Partial<TokenizerConfig>, ConfigError> {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return Either.left(new ConfigError({ message: "Tokenizer config must be a JSON object" }));
  }
  const record = new Map<string, unknown>(Object.entries(data));
  const out: Mutable<Partial<TokenizerConfig>> = {};

  for (const key of BOOLEAN_FIELDS) {
    const value = record.get(key);
    if (value === undefined || value === null) continue;
    if (typeof value !== "boolean") {
      return Either.left(new ConfigError({ message: `Invalid '${key}' field: expected a boolean` }));
    }
    out[key] = value;
  }

  for (const key of STRING_FIELDS) {
    const value = record.get(key);
    if (value === undefined) continue;
    if (typeof value !== "string") {
      return Either.left(new ConfigError({ message: `Invalid '${key}' field: expected a string` }));
    }
    out[key] = value;
  }

  for (const key of NUMBER_FIELDS) {
    const value = record.get(key);
    if (value === undefined || value === null) continue;
    if (typeof value !== "number") {
      return Either.left(new ConfigError({ message: `Invalid '${key}' field: expected a number` }));
    }
    out[key] = value;
  }

  const neverSplit = record.get("neverSplit");
  if (neverSplit !== undefined) {
    if (!Array.isArray(neverSplit) || !neverSplit.every((t): t is string => typeof t === "string")) {
      return Either.left(new ConfigError({ message: "Invalid 'neverSplit' field: expected a string array" }));
    }
    out.neverSplit = neverSplit;
  }

  return Either.right(out);
}
