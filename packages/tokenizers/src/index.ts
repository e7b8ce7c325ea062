/**
 * @bytepair/tokenizers -- the byte-pair encoding engine.
 *
 * Provides the basic (whole-text) and regex (pre-split) tokenizers, the
 * pair statistics and merge primitives they share, model persistence, and
 * a pre-populated registry so the CLI can look tokenizers up by name.
 */
import { Registry, type Tokenizer } from "@bytepair/core";
import { BasicTokenizer } from "./basic.js";
import { RegexTokenizer } from "./regex.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { BasicTokenizer, textToIds } from "./basic.js";
export { RegexTokenizer, GPT4_SPLIT_PATTERN, compilePattern } from "./regex.js";
export { MergeTable, type Merge } from "./merges.js";
export {
  countPairs,
  countPairsAcross,
  mergePair,
  mostFrequentPair,
  pairKey,
  unpackPair,
  type PairCounts,
} from "./stats.js";
export { baseVocabulary, buildVocabulary, concatTokens, type Vocabulary } from "./vocab.js";
export {
  formatModel,
  formatVocab,
  parseModel,
  readModel,
  saveModel,
  type ModelFile,
} from "./persist.js";
export { loadTokenizer } from "./load.js";
export { renderToken, replaceControlCharacters } from "./render.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Global tokenizer registry.
 *
 * Pre-registered implementations:
 * - `"basic"` -- merges over the raw byte stream
 * - `"regex"` -- merges within GPT-4 style pre-split chunks
 *
 * Usage:
 * ```ts
 * const tok = tokenizerRegistry.get("regex");
 * ```
 */
export const tokenizerRegistry = new Registry<Tokenizer>("tokenizer");

tokenizerRegistry.register("basic", () => new BasicTokenizer(), "byte-level BPE over the whole text");
tokenizerRegistry.register("regex", () => new RegexTokenizer(), "BPE within regex-split chunks (default)");
