/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new Error(`Missing required argument: --${key}${label ? ` (${label})` : ""}`);
  }
  return val;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Comma separated integers, e.g. `--ids=256,97,98`. */
export function idsArg(kv: Record<string, string>, key: string): number[] {
  const raw = requireArg(kv, key, "comma separated token ids");
  return raw.split(",").map((part) => {
    const n = Number(part.trim());
    if (!Number.isInteger(n) || n < 0) {
      throw new Error(`Invalid token id "${part}" in --${key}`);
    }
    return n;
  });
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, unknown>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const raw = await readFile(configPath, "utf-8");
  const config: unknown = JSON.parse(raw);
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
