#!/usr/bin/env node
/**
 * bpe CLI: the main entry point.
 *
 * Commands: train, encode, decode
 */
import { readFileSync } from "node:fs";
import { trainCmd } from "./commands/train.js";
import { encodeCmd } from "./commands/encode.js";
import { decodeCmd } from "./commands/decode.js";
import { listImplementations } from "./resolve.js";

// Load .env.local (BPE_LOG_LEVEL etc.) without overriding the real environment
function loadEnvFile(path: string): void {
  let envContent: string;
  try {
    envContent = readFileSync(path, "utf8");
  } catch {
    return; // optional file
  }
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}

const USAGE = `
bpe: byte-pair encoding tokenizer

Commands:
  train            Learn merges from a text file and save the model
  encode           Encode text with a saved model
  decode           Decode token ids with a saved model

Tokenizers (--type):
${listImplementations()}

Options:
  --help, -h       Show this help

Examples:
  bpe train --type=regex --input=data/corpus.txt --vocabSize=512 --out=models/regex
  bpe train --config=tokenizer.json --logLevel=debug
  bpe encode --model=models/regex.model --text="hello world" --show
  bpe decode --model=models/regex.model --ids=104,101,256
`.trim();

async function main() {
  loadEnvFile(".env.local");
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "encode") {
    await encodeCmd(args.slice(1));
  } else if (command === "decode") {
    await decodeCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
