/**
 * Streaming response decoder: turns the lines of a chunked chat response
 * into the assistant's reply text.
 *
 * Each wire format is a pure line matcher. Matchers run in priority order and
 * the first one that recognises a line decides what happens to it:
 * 1. numeric-prefix frames   `0:"text"`
 * 2. server-sent events      `data: {...}` / `data: [DONE]`
 * 3. anything else that is not an SSE comment (`:`)
 */

import { NO_RESPONSE_PLACEHOLDER } from "@convosim/shared";

export type DecodeOutcome =
  | { kind: "append"; text: string }
  | { kind: "error"; text: string }
  | { kind: "skip" }
  | { kind: "no-match" };

export type LineMatcher = (line: string) => DecodeOutcome;

export type DecodeResult =
  | { ok: true; text: string }
  | { ok: false; error: string };

const SKIP: DecodeOutcome = { kind: "skip" };
const NO_MATCH: DecodeOutcome = { kind: "no-match" };

function append(text: string): DecodeOutcome {
  return { kind: "append", text };
}

type JsonParse = { ok: true; value: unknown } | { ok: false };

function tryParseJson(text: string): JsonParse {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/** Strings as-is, other scalars via String(), objects and arrays as JSON. */
function stringifyJsonValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function stripOuterQuotes(text: string): string {
  let result = text;
  if (result.startsWith('"')) result = result.slice(1);
  if (result.endsWith('"')) result = result.slice(0, -1);
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const numericPrefixMatcher: LineMatcher = (line) => {
  if (!line.startsWith("0:")) return NO_MATCH;

  const payload = line.slice(2).trim();
  if (payload === "" || payload === '"' || payload === '""') return SKIP;

  const parsed = tryParseJson(payload);
  if (parsed.ok) return append(stringifyJsonValue(parsed.value));
  return append(stripOuterQuotes(payload));
};

/** OpenAI-style `choices[0].delta.content` */
function extractChoiceDelta(event: Record<string, unknown>): string | null {
  const choices = event["choices"];
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (!isRecord(first)) return null;
  const delta = first["delta"];
  if (!isRecord(delta) || !("content" in delta)) return null;
  const content = delta["content"];
  return typeof content === "string" ? content : null;
}

function textField(event: Record<string, unknown>, key: string): string {
  const value = event[key];
  return typeof value === "string" ? value : "";
}

export const eventStreamMatcher: LineMatcher = (line) => {
  if (!line.startsWith("data: ")) return NO_MATCH;

  const payload = line.slice(6).trim();
  if (payload === "" || payload === "[DONE]") return SKIP;

  const parsed = tryParseJson(payload);
  if (!parsed.ok) {
    // Plain-text event streams; a truncated JSON object is dropped instead
    return payload.startsWith("{") ? SKIP : append(payload);
  }

  const event = parsed.value;
  if (typeof event === "string") return append(event);
  if (!isRecord(event)) return SKIP;

  switch (event["type"]) {
    case "error": {
      const errorText = event["errorText"];
      return {
        kind: "error",
        text: typeof errorText === "string" && errorText !== "" ? errorText : "Unknown error",
      };
    }
    case "text-delta":
      return append(textField(event, "delta"));
    case "text":
      return append(textField(event, "text"));
  }

  const delta = extractChoiceDelta(event);
  return delta === null ? SKIP : append(delta);
};

export const plainLineMatcher: LineMatcher = (line) => {
  if (line.trim() === "" || line.startsWith(":")) return SKIP;

  const parsed = tryParseJson(line);
  return append(parsed.ok ? stringifyJsonValue(parsed.value) : line);
};

export const DEFAULT_MATCHERS: readonly LineMatcher[] = [
  numericPrefixMatcher,
  eventStreamMatcher,
  plainLineMatcher,
];

/** Splits a body on LF, CRLF or CR line endings. */
export function splitLines(body: string): string[] {
  return body.split(/\r\n|\n|\r/);
}

export class StreamingResponseDecoder {
  private readonly matchers: readonly LineMatcher[];

  constructor(matchers: readonly LineMatcher[] = DEFAULT_MATCHERS) {
    this.matchers = matchers;
  }

  decodeLine(line: string): DecodeOutcome {
    if (line === "") return SKIP;
    for (const matcher of this.matchers) {
      const outcome = matcher(line);
      if (outcome.kind !== "no-match") return outcome;
    }
    return SKIP;
  }

  /**
   * Decodes lines in order. An in-band error event stops decoding and discards
   * any text gathered so far. `rawBody` is the last resort when no line
   * produced text or a matcher throws.
   */
  decode(lines: Iterable<string>, rawBody?: string | null): DecodeResult {
    let text = "";

    try {
      for (const line of lines) {
        const outcome = this.decodeLine(line);
        if (outcome.kind === "error") {
          return { ok: false, error: outcome.text };
        }
        if (outcome.kind === "append") {
          text += outcome.text;
        }
      }

      if (text.trim() === "" && rawBody) {
        text = rawBody;
      }
    } catch (err) {
      if (rawBody === undefined || rawBody === null) {
        const msg = err instanceof Error ? err.message : String(err);
        return { ok: false, error: `Response parsing error: ${msg}` };
      }
      text = rawBody;
    }

    return { ok: true, text: text.trim() || NO_RESPONSE_PLACEHOLDER };
  }

  decodeBody(body: string): DecodeResult {
    return this.decode(splitLines(body), body);
  }
}
