/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class MissingFileError extends Data.TaggedError("MissingFileError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

export class VocabularyError extends Data.TaggedError("VocabularyError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class LengthMismatchError extends Data.TaggedError("LengthMismatchError")<{
  readonly message: string;
  readonly expected: number;
  readonly actual: number;
}> {}

export class InvalidByteSequenceError extends Data.TaggedError("InvalidByteSequenceError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Failures of a single character-id array. */
export type DecodeError = LengthMismatchError | InvalidByteSequenceError;

/** A decode failure inside a sequence or batch, tagged with its position. */
export class BatchDecodeError extends Data.TaggedError("BatchDecodeError")<{
  readonly message: string;
  readonly index: number;
  readonly cause: DecodeError;
}> {}
