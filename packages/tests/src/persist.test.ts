import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Logger } from "effect";
import {
  CharacterTokenizer,
  MlmVocabulary,
  loadMlmVocab,
  loadTokenizerConfig,
  saveMlmVocab,
  saveTokenizerConfig,
} from "@charword/tokenizers";
import { defaultTokenizerConfig, mergeConfig } from "@charword/core";
import { formatMessage } from "@charword/effect-runtime";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "charword-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("MlmVocabulary", () => {
  it("parses one token per line", () => {
    const vocab = MlmVocabulary.parse("a\nb\n\nc\n");
    expect(vocab.size).toBe(4);
    expect(vocab.tokenToId("c")).toBe(3);
    expect(vocab.tokenToId("")).toBe(2);
    expect(vocab.idToToken(1)).toBe("b");
  });

  it("accepts CRLF line breaks and a missing final newline", () => {
    const vocab = MlmVocabulary.parse("x\r\ny");
    expect(vocab.entries()).toEqual([
      ["x", 0],
      ["y", 1],
    ]);
  });

  it("parses an empty file as an empty vocabulary", () => {
    expect(MlmVocabulary.parse("").size).toBe(0);
  });

  it("keeps the last index of a repeated token", () => {
    const vocab = MlmVocabulary.parse("a\nb\na\n");
    expect(vocab.tokenToId("a")).toBe(2);
    expect(vocab.idToToken(0)).toBeUndefined();
    expect(vocab.size).toBe(2);
  });

  it("reports index gaps when serialising", () => {
    const vocab = new MlmVocabulary([
      ["a", 0],
      ["c", 5],
      ["b", 1],
    ]);
    expect(vocab.serialize()).toEqual({ text: "a\nb\nc\n", gaps: [{ expected: 2, found: 5 }] });
  });
});

describe("MLM vocabulary files", () => {
  it("fails with MissingFileError for an absent file", async () => {
    const path = join(dir, "nope.txt");
    const error = await Effect.runPromise(Effect.flip(loadMlmVocab(path)));
    expect(error._tag).toBe("MissingFileError");
    if (error._tag === "MissingFileError") {
      expect(error.path).toBe(path);
    }
  });

  it("loads a vocabulary file", async () => {
    const path = join(dir, "vocab.txt");
    await writeFile(path, "[PAD]\n[UNK]\nhello\n", "utf-8");
    const vocab = await Effect.runPromise(loadMlmVocab(path));
    expect(vocab.entries()).toEqual([
      ["[PAD]", 0],
      ["[UNK]", 1],
      ["hello", 2],
    ]);
  });

  it("saves into a directory with an optional prefix", async () => {
    const vocab = MlmVocabulary.fromTokens(["a", "b"]);
    const plain = await Effect.runPromise(saveMlmVocab(dir, vocab));
    const prefixed = await Effect.runPromise(saveMlmVocab(dir, vocab, "run1"));
    expect(plain).toBe(join(dir, "mlm_vocab.txt"));
    expect(prefixed).toBe(join(dir, "run1-mlm_vocab.txt"));
    expect(await readFile(plain, "utf-8")).toBe("a\nb\n");
  });

  it("saves to a file path", async () => {
    const target = join(dir, "labels.txt");
    const path = await Effect.runPromise(saveMlmVocab(target, MlmVocabulary.fromTokens(["x"])));
    expect(path).toBe(target);
    expect(await readFile(target, "utf-8")).toBe("x\n");
  });

  it("fails when the save target cannot be inspected", async () => {
    const target = join(dir, "x".repeat(300));
    const error = await Effect.runPromise(Effect.flip(saveMlmVocab(target, MlmVocabulary.fromTokens(["a"]))));
    expect(error._tag).toBe("VocabularyError");
    expect(error.message).toBe(`Cannot inspect save target "${target}"`);
  });

  it("warns about index gaps and still writes", async () => {
    const lines: string[] = [];
    const recorder = Logger.make(({ logLevel, message }) => {
      lines.push(`${logLevel._tag}: ${formatMessage(message)}`);
    });
    const vocab = new MlmVocabulary([
      ["a", 0],
      ["b", 3],
    ]);
    const path = await Effect.runPromise(
      saveMlmVocab(dir, vocab).pipe(Effect.provide(Logger.replace(Logger.defaultLogger, recorder))),
    );
    expect(lines).toEqual([
      `Warning: Saving MLM vocabulary to ${path}: vocabulary indices are not consecutive ` +
        "(expected 1, found 3). Please check that the vocabulary is not corrupted!",
    ]);
    expect(await readFile(path, "utf-8")).toBe("a\nb\n");
  });
});

describe("tokenizer config files", () => {
  it("round-trips settings", async () => {
    const config = mergeConfig({ maxWordLength: 20, doLowerCase: false, neverSplit: ["C++"] });
    const path = await Effect.runPromise(saveTokenizerConfig(dir, config));
    expect(path).toBe(join(dir, "tokenizer_config.json"));
    const loaded = await Effect.runPromise(loadTokenizerConfig(path));
    expect(mergeConfig(loaded)).toEqual(config);
  });

  it("rejects fields of the wrong type", async () => {
    const path = join(dir, "tokenizer_config.json");
    await writeFile(path, JSON.stringify({ doLowerCase: "yes" }), "utf-8");
    const error = await Effect.runPromise(Effect.flip(loadTokenizerConfig(path)));
    expect(error._tag).toBe("ConfigError");
    expect(error.message).toBe("Invalid 'doLowerCase' field: expected a boolean");
  });

  it("rejects invalid JSON", async () => {
    const path = join(dir, "tokenizer_config.json");
    await writeFile(path, "{ nope", "utf-8");
    const error = await Effect.runPromise(Effect.flip(loadTokenizerConfig(path)));
    expect(error._tag).toBe("ConfigError");
  });
});

describe("CharacterTokenizer persistence", () => {
  it("fails construction when the vocabulary file is missing", async () => {
    const error = await Effect.runPromise(
      Effect.flip(CharacterTokenizer.make({ mlmVocabFile: join(dir, "missing.txt") })),
    );
    expect(error._tag).toBe("MissingFileError");
  });

  it("loads the vocabulary file at construction", async () => {
    const path = join(dir, "mlm.txt");
    await writeFile(path, "[UNK]\nthe\n", "utf-8");
    const tok = await Effect.runPromise(CharacterTokenizer.make({ mlmVocabFile: path }));
    expect(tok.mlmVocabSize).toBe(2);
    expect(tok.convertMlmTokenToId("the")).toBe(1);
  });

  it("saves and reloads a tokenizer", async () => {
    const original = new CharacterTokenizer(
      mergeConfig({ maxWordLength: 20, doLowerCase: false, neverSplit: ["C++"] }),
      MlmVocabulary.fromTokens(["[UNK]", "C++"]),
    );
    const paths = await Effect.runPromise(original.savePretrained(dir));
    expect(paths).toEqual([join(dir, "tokenizer_config.json"), join(dir, "mlm_vocab.txt")]);

    const restored = await Effect.runPromise(CharacterTokenizer.fromDirectory(dir));
    expect(restored.config).toEqual(original.config);
    expect(restored.getMlmVocab()).toEqual({ "[UNK]": 0, "C++": 1 });
    expect(restored.tokenize("C++ Rocks")).toEqual(["C++", "Rocks"]);
  });

  it("saves and reloads a prefixed MLM vocabulary", async () => {
    const tok = new CharacterTokenizer(defaultTokenizerConfig, MlmVocabulary.fromTokens(["[UNK]", "dog"]));
    const path = await Effect.runPromise(tok.saveMlmVocabulary(dir, "v2"));
    expect(path).toBe(join(dir, "v2-mlm_vocab.txt"));
    await Effect.runPromise(saveTokenizerConfig(dir, defaultTokenizerConfig));
    const restored = await Effect.runPromise(CharacterTokenizer.fromDirectory(dir, "v2"));
    expect(restored.convertMlmTokenToId("dog")).toBe(1);
    expect(restored.convertMlmTokenToId("cat")).toBe(0);
  });

  it("reloads without a vocabulary file", async () => {
    await Effect.runPromise(saveTokenizerConfig(dir, defaultTokenizerConfig));
    const restored = await Effect.runPromise(CharacterTokenizer.fromDirectory(dir));
    expect(restored.mlmVocabSize).toBe(0);
    expect(restored.maxWordLength).toBe(50);
  });

  it("fails to reload from a directory without settings", async () => {
    const error = await Effect.runPromise(Effect.flip(CharacterTokenizer.fromDirectory(dir)));
    expect(error._tag).toBe("MissingFileError");
  });
});
