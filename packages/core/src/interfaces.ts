/**
 * Subsystem interfaces (ports). Both tokenizer variants implement these.
 */
import type { Effect } from "effect";
import type {
  TokenizerError,
  VocabularyError,
  PersistenceError,
} from "./errors.js";

// ── Symbols ────────────────────────────────────────────────────────────────

/** An ordered pair of symbol ids: (left, right). */
export type Pair = readonly [number, number];

/** Summary of one training run. */
export interface TrainResult {
  /** Merges learned by this run (may be fewer than requested). */
  readonly mergesLearned: number;
  /** Vocabulary size after the run. */
  readonly vocabSize: number;
}

// ── Tokenizer ──────────────────────────────────────────────────────────────

export interface Tokenizer {
  readonly name: string;
  /** Splitting pattern source; empty in basic mode. */
  readonly pattern: string;
  readonly vocabSize: number;
  readonly mergeCount: number;

  train(
    text: string,
    vocabSize: number,
    verbose?: boolean,
  ): Effect.Effect<TrainResult, TokenizerError | VocabularyError>;
  encode(text: string): Int32Array;
  decode(ids: ArrayLike<number>): string;

  /** Writes `<prefix>.model` and `<prefix>.vocab`. */
  save(prefix: string): Effect.Effect<void, PersistenceError>;
  /** Replaces the merge table with the one stored in a `.model` file. */
  load(modelFile: string): Effect.Effect<void, PersistenceError | VocabularyError>;

  /** Learned merges in priority order. */
  merges(): Pair[];
  /** Byte sequence of one token, or undefined for an unknown id. */
  token(id: number): Uint8Array | undefined;
}
