/**
 * Command: bpe encode
 *
 * Usage:
 *   bpe encode --model=models/regex.model --text="hello world"
 *   bpe encode --model=models/regex.model --input=notes.txt --show
 *
 * Prints the token ids, comma separated. With --show, prints one line per
 * token with its rendered bytes instead.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { loadTokenizer, renderToken } from "@bytepair/tokenizers";
import { parseKV, requireArg, boolArg } from "../parse.js";

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const modelPath = requireArg(kv, "model", "path to a .model file");
  const text = kv["input"] !== undefined
    ? await readFile(kv["input"], "utf-8")
    : requireArg(kv, "text", "text to encode (or --input=<file>)");
  const show = boolArg(kv, "show", false);

  const tokenizer = await Effect.runPromise(loadTokenizer(modelPath));
  const ids = tokenizer.encode(text);

  if (!show) {
    console.log(Array.from(ids).join(","));
    return;
  }
  for (const id of ids) {
    const bytes = tokenizer.token(id) ?? new Uint8Array(0);
    console.log(`${String(id).padStart(6)}  [${renderToken(bytes)}]`);
  }
  console.log(`${ids.length} tokens, ${Buffer.byteLength(text, "utf-8")} bytes`);
}
