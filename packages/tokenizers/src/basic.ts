/**
 * Byte-level byte-pair encoding tokenizer.
 *
 * Starts from the 256 byte values and repeatedly merges the most frequent
 * adjacent pair into a new token until the target vocab size is reached.
 * At encode time the learned merges are applied in priority order: among
 * the pairs present, the one learned earliest always goes first.
 *
 * The regex variant extends this class and only changes how text is split
 * into chunks; merges never cross a chunk boundary.
 */
import { Effect } from "effect";
import {
  BYTE_VOCAB_SIZE,
  MAX_VOCAB_SIZE,
  TokenizerError,
  type PersistenceError,
  type VocabularyError,
  type Pair,
  type Tokenizer,
  type TrainResult,
} from "@bytepair/core";
import { MergeTable } from "./merges.js";
import { readModel, saveModel, type ModelFile } from "./persist.js";
import { renderToken } from "./render.js";
import { countPairs, countPairsAcross, mergePair, mostFrequentPair, unpackPair } from "./stats.js";
import { baseVocabulary, buildVocabulary, concatTokens, type Vocabulary } from "./vocab.js";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** UTF-8 bytes of `text` as symbol ids. */
export function textToIds(text: string): number[] {
  return Array.from(utf8Encoder.encode(text));
}

export class BasicTokenizer implements Tokenizer {
  readonly name: string = "basic";

  protected _merges = new MergeTable();

  /** id -> bytes; always derivable from `_merges`. */
  protected _vocab: Vocabulary = baseVocabulary();

  protected _pattern: string;

  constructor(pattern = "") {
    this._pattern = pattern;
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get pattern(): string {
    return this._pattern;
  }

  get vocabSize(): number {
    return this._vocab.length;
  }

  get mergeCount(): number {
    return this._merges.size;
  }

  /**
   * Learn merges from `text` until the vocabulary reaches `vocabSize`.
   *
   * Each step recounts pairs over every chunk, takes the most frequent one
   * (ties go to the smallest pair), gives it the next id and rewrites the
   * chunks. Stops early once no pair is left. If merges already exist the
   * text is first encoded with them, so new merges never repeat old ones.
   */
  train(
    text: string,
    vocabSize: number,
    verbose = false,
  ): Effect.Effect<TrainResult, TokenizerError | VocabularyError> {
    return Effect.gen(this, function* () {
      if (!Number.isInteger(vocabSize) || vocabSize < BYTE_VOCAB_SIZE || vocabSize > MAX_VOCAB_SIZE) {
        return yield* new TokenizerError({
          message: `vocabSize must be an integer in [${BYTE_VOCAB_SIZE}, ${MAX_VOCAB_SIZE}], got ${vocabSize}`,
        });
      }

      let chunks = this._split(text).map((c) => this._encodeSequence(textToIds(c)));
      const numMerges = Math.max(0, vocabSize - this._vocab.length);
      let learned = 0;

      for (let step = 0; step < numMerges; step++) {
        const best = mostFrequentPair(countPairsAcross(chunks));
        if (!best) break;

        const merge = yield* this._merges.add(best.pair);
        const token = concatTokens(this._vocab[merge.left], this._vocab[merge.right]);
        this._vocab[merge.newId] = token;
        chunks = chunks.map((ids) => (ids.length < 2 ? ids : mergePair(ids, best.pair, merge.newId)));
        learned++;

        if (verbose) {
          yield* Effect.logInfo(
            `merge ${step + 1}/${numMerges}: (${merge.left}, ${merge.right}) -> ${merge.newId} ` +
              `[${renderToken(token)}] had ${best.count} occurrences`,
          );
        }
      }

      yield* Effect.logDebug(
        `${this.name}: learned ${learned}/${numMerges} merges, vocab size ${this._vocab.length}`,
      );
      return { mergesLearned: learned, vocabSize: this._vocab.length } satisfies TrainResult;
    });
  }

  /** Encode text chunk by chunk and concatenate the ids. */
  encode(text: string): Int32Array {
    const out: number[] = [];
    for (const chunk of this._split(text)) {
      for (const id of this._encodeSequence(textToIds(chunk))) out.push(id);
    }
    return Int32Array.from(out);
  }

  /**
   * Decode ids back into text.
   *
   * Unknown ids contribute nothing. Bytes that are not valid UTF-8 produce
   * an `Error decoding: ...` string instead of throwing.
   */
  decode(ids: ArrayLike<number>): string {
    const parts: Uint8Array[] = [];
    let total = 0;
    for (let i = 0; i < ids.length; i++) {
      const tok: Uint8Array | undefined = this._vocab[ids[i]];
      if (tok !== undefined) {
        parts.push(tok);
        total += tok.length;
      }
    }

    const bytes = new Uint8Array(total);
    let offset = 0;
    for (const p of parts) {
      bytes.set(p, offset);
      offset += p.length;
    }

    try {
      return utf8Decoder.decode(bytes);
    } catch (err) {
      return `Error decoding: ${err instanceof Error ? err.message : String(err)}`;
    }
  }

  save(prefix: string): Effect.Effect<void, PersistenceError> {
    return saveModel(prefix, { pattern: this._pattern, merges: this.merges() }, this._vocab);
  }

  load(modelFile: string): Effect.Effect<void, PersistenceError | VocabularyError> {
    return readModel(modelFile).pipe(
      Effect.flatMap((model) => this.restore(model)),
      Effect.tap(() => Effect.logDebug(`Loaded ${this._merges.size} merges from ${modelFile}`)),
    );
  }

  /**
   * Replace the state with a parsed model. The vocabulary is rebuilt from
   * the merges; nothing changes if the merges are inconsistent. Basic mode
   * never splits, so the model's pattern line is not kept.
   */
  restore(model: ModelFile): Effect.Effect<void, PersistenceError | VocabularyError> {
    return Effect.gen(this, function* () {
      const merges = yield* MergeTable.fromPairs(model.merges);
      const vocab = yield* buildVocabulary(merges);
      this._merges = merges;
      this._vocab = vocab;
    });
  }

  merges(): Pair[] {
    return this._merges.pairs();
  }

  token(id: number): Uint8Array | undefined {
    const tok: Uint8Array | undefined = this._vocab[id];
    return tok === undefined ? undefined : tok.slice();
  }

  // ── Internal helpers ─────────────────────────────────────────────────────

  /** Basic mode treats the whole text as one chunk. */
  protected _split(text: string): string[] {
    return [text];
  }

  /**
   * Repeatedly apply the present pair with the lowest merge id until none
   * of the present pairs is in the merge table.
   */
  protected _encodeSequence(ids: number[]): number[] {
    let current = ids;
    while (current.length >= 2) {
      let bestKey = -1;
      let bestId = Number.POSITIVE_INFINITY;
      for (const key of countPairs(current).keys()) {
        const id = this._merges.get(key);
        if (id !== undefined && id < bestId) {
          bestId = id;
          bestKey = key;
        }
      }
      if (bestKey < 0) break;
      current = mergePair(current, unpackPair(bestKey), bestId);
    }
    return current;
  }
}
