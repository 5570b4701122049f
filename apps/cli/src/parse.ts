/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { AllowAll, AllowNone, allowSet, type DecodeMode, type SpecialPolicy } from "@ranktok/core";

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

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** `all`, `none`, or a comma-separated list of literals. */
export function parsePolicy(value: string | undefined): SpecialPolicy {
  if (value === undefined || value === "none") return AllowNone;
  if (value === "all") return AllowAll;
  return allowSet(value.split(",").filter((literal) => literal.length > 0));
}

export function parseDecodeMode(kv: Record<string, string>): DecodeMode {
  return boolArg(kv, "lossy", false) ? "lossy" : "strict";
}

/** Token ids separated by commas and/or whitespace. */
export function parseTokens(value: string): number[] {
  const parts = value.split(/[\s,]+/).filter((p) => p.length > 0);
  return parts.map((p) => {
    if (!/^\d+$/.test(p)) throw new Error(`Not a token id: "${p}"`);
    return parseInt(p, 10);
  });
}
