/**
 * Restore a tokenizer from a `.model` file, choosing the variant from the
 * pattern line: empty means basic, anything else regex.
 */
import { Effect } from "effect";
import type { PersistenceError, VocabularyError } from "@bytepair/core";
import { BasicTokenizer } from "./basic.js";
import { RegexTokenizer } from "./regex.js";
import { readModel } from "./persist.js";

export function loadTokenizer(
  modelFile: string,
): Effect.Effect<BasicTokenizer, PersistenceError | VocabularyError> {
  return Effect.gen(function* () {
    const model = yield* readModel(modelFile);
    const tokenizer = model.pattern === "" ? new BasicTokenizer() : new RegexTokenizer();
    yield* tokenizer.restore(model);
    yield* Effect.logDebug(`Loaded ${tokenizer.name} tokenizer (${tokenizer.mergeCount} merges) from ${modelFile}`);
    return tokenizer;
  });
}
