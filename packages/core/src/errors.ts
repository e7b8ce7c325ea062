/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Precondition violations raised by tokenizer operations. */
export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** The merge table cannot produce a consistent vocabulary. */
export class VocabularyError extends Data.TaggedError("VocabularyError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class PersistenceError extends Data.TaggedError("PersistenceError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
