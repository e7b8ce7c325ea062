/**
 * Config resolution: defaults, then a JSON config file, then CLI flags.
 */
import { Effect } from "effect";
import { ConfigError } from "./errors.js";
import {
  BYTE_VOCAB_SIZE,
  MAX_VOCAB_SIZE,
  defaultTokenizerConfig,
  type LogLevelName,
  type TokenizerConfig,
  type TokenizerKind,
} from "./types.js";

const KINDS: readonly TokenizerKind[] = ["basic", "regex"];
const LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

function isKind(v: string): v is TokenizerKind {
  return (KINDS as readonly string[]).includes(v);
}

function isLevel(v: string): v is LogLevelName {
  return (LEVELS as readonly string[]).includes(v);
}

function str(v: unknown): string | undefined {
  if (v === undefined || v === null) return undefined;
  return String(v);
}

/**
 * Validate raw overrides and merge them over `defaultTokenizerConfig`.
 *
 * Values may be strings (CLI) or JSON scalars (config file). When no `out`
 * is given the prefix becomes `models/<type>`.
 */
export function resolveTokenizerConfig(
  overrides: Readonly<Record<string, unknown>>,
): Effect.Effect<TokenizerConfig, ConfigError> {
  return Effect.gen(function* () {
    const d = defaultTokenizerConfig;

    const type = str(overrides["type"]) ?? d.type;
    if (!isKind(type)) {
      return yield* new ConfigError({
        message: `Unknown tokenizer type "${type}". Expected one of: ${KINDS.join(", ")}`,
      });
    }

    const rawVocab = str(overrides["vocabSize"]);
    const vocabSize = rawVocab === undefined ? d.vocabSize : Number(rawVocab);
    if (!Number.isInteger(vocabSize) || vocabSize < BYTE_VOCAB_SIZE || vocabSize > MAX_VOCAB_SIZE) {
      return yield* new ConfigError({
        message: `vocabSize must be an integer in [${BYTE_VOCAB_SIZE}, ${MAX_VOCAB_SIZE}], got "${rawVocab}"`,
      });
    }

    const rawVerbose = str(overrides["verbose"]);
    let verbose = d.verbose;
    if (rawVerbose !== undefined) {
      if (rawVerbose === "true" || rawVerbose === "1") verbose = true;
      else if (rawVerbose === "false" || rawVerbose === "0") verbose = false;
      else {
        return yield* new ConfigError({ message: `verbose must be a boolean, got "${rawVerbose}"` });
      }
    }

    const logLevel = (str(overrides["logLevel"]) ?? d.logLevel).toLowerCase();
    if (!isLevel(logLevel)) {
      return yield* new ConfigError({
        message: `Unknown log level "${logLevel}". Expected one of: ${LEVELS.join(", ")}`,
      });
    }

    return {
      type,
      input: str(overrides["input"]) ?? d.input,
      vocabSize,
      out: str(overrides["out"]) ?? `${d.out}/${type}`,
      verbose,
      logLevel,
    } satisfies TokenizerConfig;
  });
}
