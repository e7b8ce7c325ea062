/**
 * Ordered merge table: pair -> new id, with insertion order kept explicitly.
 *
 * Insertion order is merge priority. The i-th merge always gets id 256 + i,
 * whether it was learned or replayed from a model file.
 */
import { Effect } from "effect";
import { BYTE_VOCAB_SIZE, VocabularyError, type Pair } from "@bytepair/core";
import { pairKey } from "./stats.js";

/** A single merge: (left id, right id) -> new id. */
export interface Merge {
  readonly left: number;
  readonly right: number;
  readonly newId: number;
}

export class MergeTable {
  private readonly _byKey = new Map<number, number>();
  private readonly _order: Merge[] = [];

  /** Replay pairs in order; fails on a duplicate pair. */
  static fromPairs(pairs: ReadonlyArray<Pair>): Effect.Effect<MergeTable, VocabularyError> {
    return Effect.gen(function* () {
      const table = new MergeTable();
      for (const pair of pairs) {
        yield* table.add(pair);
      }
      return table;
    });
  }

  get size(): number {
    return this._order.length;
  }

  /** Id the next merge will receive. */
  get nextId(): number {
    return BYTE_VOCAB_SIZE + this._order.length;
  }

  /** Append a merge, assigning the next sequential id. */
  add(pair: Pair): Effect.Effect<Merge, VocabularyError> {
    const [left, right] = pair;
    const key = pairKey(left, right);
    const existing = this._byKey.get(key);
    if (existing !== undefined) {
      return Effect.fail(
        new VocabularyError({
          message: `Duplicate merge (${left}, ${right}); already assigned id ${existing}`,
        }),
      );
    }
    const merge: Merge = { left, right, newId: this.nextId };
    this._byKey.set(key, merge.newId);
    this._order.push(merge);
    return Effect.succeed(merge);
  }

  /** Merge id for a packed pair key. */
  get(key: number): number | undefined {
    return this._byKey.get(key);
  }

  has(pair: Pair): boolean {
    return this._byKey.has(pairKey(pair[0], pair[1]));
  }

  /** Merges in priority (learned) order. */
  entries(): readonly Merge[] {
    return this._order;
  }

  pairs(): Pair[] {
    return this._order.map((m) => [m.left, m.right] as const);
  }
}
