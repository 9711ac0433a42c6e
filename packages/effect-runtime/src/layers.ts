/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that constructs it from config.
 */
import { Layer } from "effect";
import { TokenizerService, type Tokenizer, type TokenizerOptions } from "@charword/core";
import { CharacterTokenizer } from "@charword/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

/** Provide an already-built tokenizer. */
export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Build a character tokenizer from options, loading its MLM vocabulary. */
export const TokenizerLive = (options: TokenizerOptions = {}) =>
  Layer.effect(TokenizerService, CharacterTokenizer.make(options));

/** Build a character tokenizer from a named preset. */
export const TokenizerPreset = (name: string, overrides: TokenizerOptions = {}) =>
  Layer.effect(TokenizerService, CharacterTokenizer.fromPreset(name, overrides));
