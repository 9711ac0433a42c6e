/**
 * Persistence helpers for tokenizer files.
 *
 * Reads and writes the MLM vocabulary (`mlm_vocab.txt`) and the tokenizer
 * settings (`tokenizer_config.json`) using node:fs/promises, with every I/O
 * operation wrapped in `Effect.tryPromise` so callers get typed failures
 * instead of raw exceptions.
 */
import { readFile, writeFile, mkdir, stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { Effect, Either } from "effect";
import {
  ConfigError,
  MissingFileError,
  VocabularyError,
  parseTokenizerConfig,
  type TokenizerConfig,
} from "@charword/core";
import { MlmVocabulary } from "./mlm-vocab.js";

export const MLM_VOCAB_FILE = "mlm_vocab.txt";
export const TOKENIZER_CONFIG_FILE = "tokenizer_config.json";

function isMissing(cause: unknown): boolean {
  if (typeof cause !== "object" || cause === null || !("code" in cause)) return false;
  return cause.code === "ENOENT" || cause.code === "EISDIR" || cause.code === "ENOTDIR";
}

/** A path that does not exist is not a directory; other stat failures are errors. */
function isDirectory(path: string): Effect.Effect<boolean, VocabularyError> {
  return Effect.tryPromise({
    try: () => stat(path),
    catch: (cause) => cause,
  }).pipe(
    Effect.map((stats) => stats.isDirectory()),
    Effect.catchAll((cause): Effect.Effect<boolean, VocabularyError> =>
      isMissing(cause)
        ? Effect.succeed(false)
        : Effect.fail(new VocabularyError({ message: `Cannot inspect save target "${path}"`, cause })),
    ),
  );
}

function prefixed(name: string, prefix?: string): string {
  return prefix ? `${prefix}-${name}` : name;
}

// ── MLM vocabulary ─────────────────────────────────────────────────────────

/**
 * Load an MLM vocabulary file.
 *
 * A path that does not name a readable file fails with `MissingFileError`.
 */
export function loadMlmVocab(
  path: string,
): Effect.Effect<MlmVocabulary, MissingFileError | VocabularyError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      isMissing(cause)
        ? new MissingFileError({ message: `Can't find a vocabulary file at path "${path}"`, path, cause })
        : new VocabularyError({ message: `Failed to read vocabulary file "${path}"`, cause }),
  }).pipe(
    Effect.map((text) => MlmVocabulary.parse(text)),
    Effect.withSpan("loadMlmVocab"),
  );
}

/**
 * Write an MLM vocabulary ordered by index and return the written path.
 *
 * If `target` is a directory the file is `<target>/[prefix-]mlm_vocab.txt`,
 * otherwise `[prefix-]<target>` itself. Non-consecutive indices are logged
 * as warnings and do not stop the write.
 */
export function saveMlmVocab(
  target: string,
  vocab: MlmVocabulary,
  prefix?: string,
): Effect.Effect<string, VocabularyError> {
  return isDirectory(target).pipe(
    Effect.map((dir) =>
      dir
        ? join(target, prefixed(MLM_VOCAB_FILE, prefix))
        : join(dirname(target), prefixed(basename(target), prefix)),
    ),
    Effect.flatMap((path) => {
      const { text, gaps } = vocab.serialize();
      return Effect.forEach(gaps, (gap) =>
        Effect.logWarning(
          `Saving MLM vocabulary to ${path}: vocabulary indices are not consecutive ` +
            `(expected ${gap.expected}, found ${gap.found}). Please check that the vocabulary is not corrupted!`,
        ),
      ).pipe(
        Effect.zipRight(
          Effect.tryPromise({
            try: () => writeFile(path, text, "utf-8"),
            catch: (cause) =>
              new VocabularyError({ message: `Failed to save vocabulary to "${path}"`, cause }),
          }),
        ),
        Effect.as(path),
      );
    }),
    Effect.withSpan("saveMlmVocab"),
  );
}

// ── Tokenizer settings ─────────────────────────────────────────────────────

/**
 * Serialise tokenizer settings to `<dir>/tokenizer_config.json`.
 *
 * Creates the directory if needed and writes pretty-printed JSON. Unset
 * optional fields are left out.
 */
export function saveTokenizerConfig(
  dir: string,
  config: TokenizerConfig,
): Effect.Effect<string, ConfigError> {
  const path = join(dir, TOKENIZER_CONFIG_FILE);
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dir, { recursive: true });
      await writeFile(path, JSON.stringify(config, null, 2), "utf-8");
      return path;
    },
    catch: (cause) =>
      new ConfigError({ message: `Failed to save tokenizer config to "${path}"`, cause }),
  });
}

/** Load and validate a `tokenizer_config.json` file. */
export function loadTokenizerConfig(
  path: string,
): Effect.Effect<Partial<TokenizerConfig>, MissingFileError | ConfigError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      isMissing(cause)
        ? new MissingFileError({ message: `Can't find a tokenizer config at path "${path}"`, path, cause })
        : new ConfigError({ message: `Failed to read tokenizer config "${path}"`, cause }),
  }).pipe(
    Effect.flatMap((raw) =>
      Effect.try({
        try: (): unknown => JSON.parse(raw),
        catch: (cause) => new ConfigError({ message: `Tokenizer config "${path}" is not valid JSON`, cause }),
      }),
    ),
    Effect.flatMap((data) =>
      Either.match(parseTokenizerConfig(data), {
        onLeft: (error) => Effect.fail(error),
        onRight: (config) => Effect.succeed(config),
      }),
    ),
  );
}
