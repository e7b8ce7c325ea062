/**
 * Command: bpe decode
 *
 * Usage:
 *   bpe decode --model=models/regex.model --ids=104,256,111
 */
import { Effect } from "effect";
import { loadTokenizer, replaceControlCharacters } from "@bytepair/tokenizers";
import { parseKV, requireArg, idsArg, boolArg } from "../parse.js";

export async function decodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const modelPath = requireArg(kv, "model", "path to a .model file");
  const ids = idsArg(kv, "ids");
  const escape = boolArg(kv, "escape", false);

  const tokenizer = await Effect.runPromise(loadTokenizer(modelPath));
  const text = tokenizer.decode(ids);
  console.log(escape ? replaceControlCharacters(text) : text);
}
