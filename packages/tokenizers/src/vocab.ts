/**
 * Vocabulary construction. The vocabulary (id -> bytes) is never stored on
 * its own; it is always derived from the merge table.
 */
import { Effect } from "effect";
import { BYTE_VOCAB_SIZE, VocabularyError } from "@bytepair/core";
import type { MergeTable } from "./merges.js";

/** id -> byte sequence, indexed by id. */
export type Vocabulary = Uint8Array[];

/** The 256 single-byte tokens. */
export function baseVocabulary(): Vocabulary {
  const vocab: Vocabulary = [];
  for (let b = 0; b < BYTE_VOCAB_SIZE; b++) vocab.push(Uint8Array.of(b));
  return vocab;
}

export function concatTokens(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

/**
 * Rebuild the full vocabulary by replaying merges in id order.
 *
 * Every operand must already be present when its merge is replayed. A
 * missing one means the table is out of order or corrupted.
 */
export function buildVocabulary(
  merges: MergeTable,
): Effect.Effect<Vocabulary, VocabularyError> {
  return Effect.gen(function* () {
    const vocab = baseVocabulary();
    for (const { left, right, newId } of merges.entries()) {
      const a = vocab[left];
      const b = vocab[right];
      if (a === undefined || b === undefined) {
        const missing = a === undefined ? left : right;
        return yield* new VocabularyError({
          message: `Merge (${left}, ${right}) -> ${newId} references unknown token ${missing}`,
        });
      }
      vocab[newId] = concatTokens(a, b);
    }
    return vocab;
  });
}
