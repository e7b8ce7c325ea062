/**
 * Resolve pluggable implementations from CLI args.
 */
import { tokenizerRegistry } from "@bytepair/tokenizers";
import type { Tokenizer } from "@bytepair/core";

export function resolveTokenizer(name: string): Tokenizer {
  return tokenizerRegistry.get(name);
}

export function listImplementations(): string {
  return tokenizerRegistry
    .describe()
    .map((line) => `  ${line}`)
    .join("\n");
}
