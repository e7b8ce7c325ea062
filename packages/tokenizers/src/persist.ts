/**
 * Persistence for trained tokenizers.
 *
 * Two plain-text files are written for a prefix `P`:
 *
 *   P.model  first line: splitting pattern (empty in basic mode)
 *            then one merge per line, "<left> <right>", in learned order
 *   P.vocab  "<id> [<rendered token>]" per vocabulary entry; diagnostic only
 *
 * Only `.model` is ever read back. Ids are not stored: the k-th merge line
 * becomes id 256 + k on load, and the vocabulary is rebuilt from the merges.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { PersistenceError, type Pair } from "@bytepair/core";
import { renderToken } from "./render.js";

/** Contents of a `.model` file. */
export interface ModelFile {
  readonly pattern: string;
  readonly merges: readonly Pair[];
}

const U32_MAX = 0xffffffff;
const UINT = /^\+?\d+$/;

// ── Formatting ────────────────────────────────────────────────────────────

export function formatModel(model: ModelFile): string {
  let out = `${model.pattern}\n`;
  for (const [left, right] of model.merges) out += `${left} ${right}\n`;
  return out;
}

export function formatVocab(vocab: ArrayLike<Uint8Array>): string {
  const lines: string[] = [];
  for (let id = 0; id < vocab.length; id++) {
    lines.push(`${id} [${renderToken(vocab[id])}]\n`);
  }
  return lines.join("");
}

/**
 * Parse `.model` text. Lines that are not exactly two unsigned integers are
 * skipped rather than rejected.
 */
export function parseModel(text: string): ModelFile {
  const lines = text.split("\n");
  const pattern = (lines[0] ?? "").trim();
  const merges: Pair[] = [];

  for (let i = 1; i < lines.length; i++) {
    const parts = lines[i].trim().split(/\s+/);
    if (parts.length !== 2 || !UINT.test(parts[0]) || !UINT.test(parts[1])) continue;
    const left = Number(parts[0]);
    const right = Number(parts[1]);
    if (left > U32_MAX || right > U32_MAX) continue;
    merges.push([left, right]);
  }

  return { pattern, merges };
}

// ── File I/O ──────────────────────────────────────────────────────────────

/**
 * Write `<prefix>.model` and `<prefix>.vocab`, creating the parent
 * directory if needed.
 */
export function saveModel(
  prefix: string,
  model: ModelFile,
  vocab: ArrayLike<Uint8Array>,
): Effect.Effect<void, PersistenceError> {
  const modelPath = `${prefix}.model`;
  const vocabPath = `${prefix}.vocab`;
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(prefix), { recursive: true });
      await writeFile(modelPath, formatModel(model), "utf-8");
      await writeFile(vocabPath, formatVocab(vocab), "utf-8");
    },
    catch: (cause) =>
      new PersistenceError({
        message: `Failed to save tokenizer to "${modelPath}"`,
        cause,
      }),
  }).pipe(
    Effect.tap(() =>
      Effect.logDebug(`Saved ${model.merges.length} merges to ${modelPath}, vocab to ${vocabPath}`),
    ),
  );
}

/** Read and parse a `.model` file. The path must end in `.model`. */
export function readModel(path: string): Effect.Effect<ModelFile, PersistenceError> {
  if (!path.endsWith(".model")) {
    return Effect.fail(
      new PersistenceError({ message: `Expected a .model file, got "${path}"` }),
    );
  }
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      new PersistenceError({
        message: `Failed to load tokenizer model from "${path}"`,
        cause,
      }),
  }).pipe(Effect.map(parseModel));
}
