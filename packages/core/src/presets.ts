/**
 * Pretrained tokenizer presets.
 *
 * A preset names a published character-level model and carries the
 * tokenizer settings it was trained with, plus the number of word positions
 * the model accepts. The table is plain data: callers pass it (or their own)
 * into the tokenizer factories, nothing in the codec reads it.
 */
import type { TokenizerConfig } from "./config.js";

export interface PresetConfig {
  readonly id: string;
  readonly displayName: string;
  readonly tokenizer: Partial<TokenizerConfig>;
  /** Word positions of the model's position embeddings. */
  readonly maxInputLength: number;
}

export const presets: ReadonlyMap<string, PresetConfig> = new Map<string, PresetConfig>([
  [
    "character-bert-base-uncased",
    {
      id: "character-bert-base-uncased",
      displayName: "CharacterBERT base (uncased)",
      tokenizer: {
        maxWordLength: 50,
        doLowerCase: true,
      },
      maxInputLength: 512,
    },
  ],
  [
    "character-bert-base-cased",
    {
      id: "character-bert-base-cased",
      displayName: "CharacterBERT base (cased)",
      tokenizer: {
        maxWordLength: 50,
        doLowerCase: false,
      },
      maxInputLength: 512,
    },
  ],
]);

/** Tokenizer options for a preset; `modelMaxLength` comes from the preset. */
export function presetOptions(preset: PresetConfig): Partial<TokenizerConfig> {
  return { modelMaxLength: preset.maxInputLength, ...preset.tokenizer };
}
