/**
 * Frustration incidents: deterministic phrase scan over user utterances.
 */

import type { Utterance } from "@convosim/shared";

/** Matched case-insensitively as substrings. */
export const FRUSTRATION_PHRASES: readonly string[] = [
  "not what i asked",
  "that's not helpful",
  "you're not understanding",
  "this is frustrating",
  "can you just",
  "i already said",
  "please listen",
  "wrong answer",
  "that doesn't help",
  "this isn't working",
];

export function isFrustrated(text: string, phrases: readonly string[] = FRUSTRATION_PHRASES): boolean {
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase));
}

/** At most one incident per utterance. */
export function countFrustrationIncidents(
  messages: readonly Utterance[],
  phrases: readonly string[] = FRUSTRATION_PHRASES,
): number {
  return messages.filter((m) => m.role === "user" && isFrustrated(m.content, phrases)).length;
}
