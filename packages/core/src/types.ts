/**
 * Core types for the bytepair system.
 */

// ── Symbol ids ─────────────────────────────────────────────────────────────

/** Number of raw byte symbols; merged tokens start at this id. */
export const BYTE_VOCAB_SIZE = 256;

/**
 * Exclusive upper bound on symbol ids. Pairs are packed into a single
 * number as `left * MAX_VOCAB_SIZE + right`, which must stay a safe integer.
 */
export const MAX_VOCAB_SIZE = 1 << 21;

// ── Tokenizer config ───────────────────────────────────────────────────────

export type TokenizerKind = "basic" | "regex";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface TokenizerConfig {
  readonly type: TokenizerKind;
  /** Training corpus path. */
  readonly input: string;
  readonly vocabSize: number;
  /** Output prefix; `<prefix>.model` and `<prefix>.vocab` are written. */
  readonly out: string;
  readonly verbose: boolean;
  readonly logLevel: LogLevelName;
}

export const defaultTokenizerConfig: TokenizerConfig = {
  type: "regex",
  input: "data/corpus.txt",
  vocabSize: 512,
  out: "models",
  verbose: true,
  logLevel: "info",
};
