/**
 * @charword/tokenizers -- character-level tokenization.
 *
 * Provides the basic segmenter, the character-id codec, sequence assembly,
 * the MLM vocabulary with its persistence helpers, and the tokenizer that
 * ties them together.
 */

// ── Re-exports ────────────────────────────────────────────────────────────
export {
  CharacterTokenizer,
  type BatchItem,
  type DecodeOptions,
  type SpecialTokensMaskOptions,
} from "./character.js";
export { BasicSegmenter, whitespaceTokenize, type SegmenterOptions } from "./segmenter.js";
export {
  CharacterIdCodec,
  BEGIN_OF_TEXT,
  END_OF_TEXT,
  BEGIN_OF_WORD,
  END_OF_WORD,
  PAD_CHARACTER,
  MASK_CHARACTER,
  ID_SHIFT,
  CHARACTER_VOCAB_SIZE,
  type EncodedWord,
} from "./codec.js";
export {
  buildInputs,
  specialTokensMask,
  tokenTypeIds,
  markSpecial,
  truncateLongestFirst,
  type SequenceDelimiters,
} from "./assembly.js";
export { MlmVocabulary, type IndexGap } from "./mlm-vocab.js";
export {
  loadMlmVocab,
  saveMlmVocab,
  loadTokenizerConfig,
  saveTokenizerConfig,
  MLM_VOCAB_FILE,
  TOKENIZER_CONFIG_FILE,
} from "./persist.js";
export { cleanText, isolateCjk, stripAccents, isCjkCodePoint, isControl, isPunctuation, isWhitespace } from "./unicode.js";
