// src/core/decode.ts
import { parse as parseYaml } from "yaml";

export type DecodedOutput =
  | { kind: "structured"; value: unknown }
  | { kind: "raw"; text: string };

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Integers come out of the parser as bigint. Those that fit a double become
 * numbers; larger ones (64-bit counters, MAC-derived ids) become their exact
 * decimal string, since JSON.stringify cannot carry a bigint.
 */
function toJsonSafe(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();
  }
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) out[key] = toJsonSafe(item);
    return out;
  }
  return value;
}

/**
 * Decode tool output as YAML (which also accepts JSON), falling back to the
 * raw text when it does not parse.
 *
 * YAML 1.1 rules apply, with duplicate keys allowed (last one wins), to match
 * what the device tool emits. Empty text decodes to `null`.
 */
export function decodeOutput(text: string): DecodedOutput {
  let parsed: unknown;
  try {
    parsed = parseYaml(text, {
      version: "1.1",
      uniqueKeys: false,
      intAsBigInt: true,
      logLevel: "error",
    });
  } catch {
    return { kind: "raw", text };
  }
  return { kind: "structured", value: toJsonSafe(parsed) };
}
