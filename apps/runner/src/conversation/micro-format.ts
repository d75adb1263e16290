/**
 * Line-oriented `KEY: value` extraction for the constrained formats the LLMs
 * are asked to answer in (MESSAGE/CONTINUE/SATISFACTION/REASON and
 * REASONING/SCORE). Missing fields are simply absent; callers coerce with
 * the typed helpers below and supply their own defaults.
 */

import { clamp, clampUnit } from "@convosim/shared";

export type ExtractedFields<K extends string> = Partial<Record<K, string>>;

export interface ExtractOptions {
  /** Which occurrence of a repeated key is kept; defaults to the last */
  keep?: "first" | "last";
}

/**
 * A key matches at the start of a (trimmed) line. Lines that follow a key and
 * do not start another key continue its value.
 */
export function extractFields<K extends string>(
  text: string,
  keys: readonly K[],
  options: ExtractOptions = {},
): ExtractedFields<K> {
  const keepFirst = options.keep === "first";
  const collected = new Map<K, string[]>();
  let current: K | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const key = keys.find((k) => line.startsWith(`${k}:`));

    if (key !== undefined) {
      if (keepFirst && collected.has(key)) {
        current = null;
        continue;
      }
      collected.set(key, [line.slice(key.length + 1)]);
      current = key;
    } else if (current !== null) {
      collected.get(current)?.push(line);
    }
  }

  const fields: ExtractedFields<K> = {};
  for (const [key, lines] of collected) {
    fields[key] = lines.join("\n").trim();
  }
  return fields;
}

/** Any mention of "true" counts as true. */
export function parseBooleanField(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return raw.toLowerCase().includes("true");
}

/** First decimal number in the value, clamped to [0,1]. */
export function parseUnitField(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const match = raw.match(/\d+(?:\.\d+)?|\.\d+/);
  if (!match) return fallback;
  const value = parseFloat(match[0]);
  return isNaN(value) ? fallback : clampUnit(value);
}

/**
 * Leading integer of a 0-3 rubric score (`2`, `[3]`, `1 - Fair`), clamped to
 * [0,3]. Returns null for anything else, including decimals.
 */
export function parseRubricScore(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const match = raw.trim().match(/^\[?\s*(-?\d+)(?![\d.])/);
  if (!match?.[1]) return null;
  return clamp(parseInt(match[1], 10), 0, 3);
}
