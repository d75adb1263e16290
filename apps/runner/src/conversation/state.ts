/**
 * Conversation state rules: progress, frustration and stop heuristics as pure
 * functions over ConversationState.
 */

import { FALLBACK_EXPECTED_TURNS, clampUnit } from "@convosim/shared";
import type { ConversationState, Goal, Persona } from "@convosim/shared";

export const INITIAL_SATISFACTION = 0.5;
export const FRUSTRATION_STOP_THRESHOLD = 0.9;
/** Turn ratio past which impatience starts to build frustration */
export const OVERRUN_RATIO = 1.5;
export const LOW_SATISFACTION_THRESHOLD = 0.3;

export function createInitialState(): ConversationState {
  return {
    messages: [],
    current_turn: 0,
    goal_progress: 0,
    user_satisfaction: INITIAL_SATISFACTION,
    frustration_level: 0,
    context: {},
  };
}

export function expectedTurnsOf(goal: Goal): number {
  return goal.expected_turns && goal.expected_turns > 0
    ? goal.expected_turns
    : FALLBACK_EXPECTED_TURNS;
}

/** Linear heuristic: one step of 1/expected_turns per assistant turn. */
export function nextGoalProgress(state: ConversationState, goal: Goal): number {
  return Math.min(1, state.goal_progress + 1 / expectedTurnsOf(goal));
}

/**
 * Expects `current_turn` to already count the assistant turn being ingested.
 * Both rules can fire on the same turn. Never lower than the current level.
 */
export function nextFrustrationLevel(
  state: ConversationState,
  persona: Persona,
  goal: Goal,
): number {
  let level = state.frustration_level;

  if (state.current_turn / expectedTurnsOf(goal) > OVERRUN_RATIO) {
    level = Math.min(1, level + (1 - persona.patience) * 0.1);
  }

  if (state.user_satisfaction < LOW_SATISFACTION_THRESHOLD) {
    level = Math.min(1, level + (1 - persona.frustration_tolerance) * 0.15);
  }

  return Math.max(state.frustration_level, clampUnit(level));
}

export function shouldStopConversation(state: ConversationState, goal: Goal): boolean {
  return (
    state.current_turn >= expectedTurnsOf(goal) * 2 ||
    state.frustration_level > FRUSTRATION_STOP_THRESHOLD ||
    state.goal_progress >= 1
  );
}

export function cloneState(state: ConversationState): ConversationState {
  return structuredClone(state);
}
