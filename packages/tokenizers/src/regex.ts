/**
 * Byte-pair encoding over regex-split chunks.
 *
 * Text is first cut into chunks by a splitting pattern (GPT-4 style by
 * default) and each chunk is trained on and encoded independently, so a
 * merge can never join bytes from two chunks. Decoding and persistence are
 * inherited unchanged from the basic tokenizer.
 */
import { Effect } from "effect";
import { PersistenceError, type VocabularyError } from "@bytepair/core";
import { BasicTokenizer } from "./basic.js";
import type { ModelFile } from "./persist.js";

/**
 * Contractions, letter runs with an optional leading non-letter, 1-3 digit
 * runs, punctuation runs, and whitespace. JS has no inline `(?i:...)`, so
 * the contraction suffixes spell out both cases.
 */
export const GPT4_SPLIT_PATTERN = String.raw`'(?:[sdmtSDMT]|[lL][lL]|[vV][eE]|[rR][eE])|[^\r\n\p{L}\p{N}]?\p{L}+|\p{N}{1,3}| ?[^\s\p{L}\p{N}]+[\r\n]*|\s*[\r\n]|\s+`;

/** Compile a splitting pattern; matching always runs with `gu`. */
export function compilePattern(source: string): RegExp {
  return new RegExp(source, "gu");
}

export class RegexTokenizer extends BasicTokenizer {
  override readonly name: string = "regex";

  private _regex: RegExp;

  constructor(pattern: string = GPT4_SPLIT_PATTERN) {
    super(pattern);
    this._regex = compilePattern(pattern);
  }

  /** Every pattern match, in order. */
  splitChunks(text: string): string[] {
    return Array.from(text.matchAll(this._regex), (m) => m[0]);
  }

  /**
   * Restore merges and switch to the model's own splitting pattern. A model
   * without a pattern was trained in basic mode and is rejected.
   */
  override restore(model: ModelFile): Effect.Effect<void, PersistenceError | VocabularyError> {
    const restoreState = super.restore(model);
    return Effect.gen(this, function* () {
      if (model.pattern === "") {
        return yield* new PersistenceError({
          message: "Model has no splitting pattern; load it with the basic tokenizer",
        });
      }
      const regex = yield* Effect.try({
        try: () => compilePattern(model.pattern),
        catch: (cause) =>
          new PersistenceError({ message: `Invalid splitting pattern "${model.pattern}"`, cause }),
      });
      yield* restoreState;
      this._regex = regex;
      this._pattern = model.pattern;
    });
  }

  protected override _split(text: string): string[] {
    return this.splitChunks(text);
  }
}
