/**
 * Command: bpe train
 *
 * Usage:
 *   bpe train --type=regex --input=data/corpus.txt --vocabSize=512 --out=models/regex
 *   bpe train --config=tokenizer.json --verbose=false
 *
 * Flags override values from --config; unset values fall back to
 * defaultTokenizerConfig. Writes <out>.model and <out>.vocab.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { resolveTokenizerConfig } from "@bytepair/core";
import { parseLogLevel, prettyLoggerLayer, withSpan } from "@bytepair/effect-runtime";
import { parseKV, loadConfig } from "../parse.js";
import { resolveTokenizer } from "../resolve.js";

export async function trainCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const overrides = await loadConfig(kv);
  const envLevel = process.env["BPE_LOG_LEVEL"];
  const config = await Effect.runPromise(
    resolveTokenizerConfig(
      overrides["logLevel"] === undefined && envLevel ? { ...overrides, logLevel: envLevel } : overrides,
    ),
  );

  console.log(`Training ${config.type} tokenizer on ${config.input} (vocabSize=${config.vocabSize})`);

  const text = await readFile(config.input, "utf-8");
  const tokenizer = resolveTokenizer(config.type);

  const start = performance.now();
  const program = Effect.gen(function* () {
    const result = yield* withSpan(
      "tokenizer.train",
      tokenizer.train(text, config.vocabSize, config.verbose),
    );
    yield* tokenizer.save(config.out);
    return result;
  }).pipe(Effect.provide(prettyLoggerLayer(parseLogLevel(config.logLevel))));

  const result = await Effect.runPromise(program);
  const seconds = (performance.now() - start) / 1000;

  console.log(`Learned ${result.mergesLearned} merges (vocab_size=${result.vocabSize})`);
  console.log(`Saved ${config.out}.model and ${config.out}.vocab`);
  console.log(`Took ${seconds.toFixed(2)}s`);
}
