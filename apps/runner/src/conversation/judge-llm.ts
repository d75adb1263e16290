/**
 * Judge LLM: scores a finished conversation.
 *
 * One TRUE/FALSE call for goal achievement, then one call per quality axis on
 * a 0-3 rubric (REASONING/SCORE), normalized to [0,1]. Frustration, error
 * rate and latency are computed without the LLM.
 *
 * Calls run one after another. A failed or unparseable call falls back to a
 * default instead of failing the evaluation.
 */

import { mean } from "@convosim/shared";
import type {
  ConversationState,
  EvaluationMetrics,
  Goal,
  Persona,
  ScoredAxis,
  Utterance,
} from "@convosim/shared";
import type { TextCompletion } from "../llm.js";
import { countFrustrationIncidents } from "../metrics/frustration.js";
import { extractFields, parseRubricScore } from "./micro-format.js";

const VERDICT_MAX_TOKENS = 10;
const RUBRIC_MAX_TOKENS = 300;

export const FALLBACK_RUBRIC_SCORE = 1;
export const PARSE_FAILURE_REASON = "Parsing error; defaulting to fair.";
export const NO_ASSISTANT_REASON = "No assistant messages; defaulting to fair.";

export interface JudgeInput {
  conversation: ConversationState;
  goal: Goal;
  persona: Persona;
  responseTimes: readonly number[];
  errors: readonly string[];
}

export interface RubricVerdict {
  /** 0-3 */
  score: number;
  reason: string;
}

interface RubricDefinition {
  /** Judged on the assistant's messages alone rather than the full transcript */
  assistantOnly: boolean;
  instruction: string;
  context(goal: Goal): string;
  levels: readonly [string, string, string, string];
  criteria: readonly string[];
}

const RUBRICS: Record<ScoredAxis, RubricDefinition> = {
  clarity: {
    assistantOnly: true,
    instruction: "Evaluate the clarity of these assistant responses.",
    context: () => "",
    levels: [
      "Poor: Responses are confusing, unclear, or incomprehensible. Structure is illogical, instructions are vague.",
      "Fair: Responses are somewhat clear but have notable issues. Some parts are confusing or poorly structured.",
      "Good: Responses are mostly clear and well-structured. Minor clarity issues that don't impede understanding.",
      "Excellent: Responses are clear, well-organized, and easy to follow. Instructions are specific and actionable.",
    ],
    criteria: [
      "Are explanations clear and easy to understand?",
      "Is technical jargon explained when necessary?",
      "Are instructions specific and actionable?",
      "Is the structure logical and easy to follow?",
    ],
  },
  relevance: {
    assistantOnly: false,
    instruction: "Evaluate the relevance of the assistant's responses to the user's goal.",
    context: (goal) => `User's Goal: ${goal.description}\nDomain: ${goal.domain}`,
    levels: [
      "Irrelevant: Responses mostly miss the point, contain off-topic content, or fail to address the goal.",
      "Partially Relevant: Some responses address the goal but with significant tangents or missing key aspects.",
      "Mostly Relevant: Responses generally stay on topic and address the goal with minor irrelevant content.",
      "Highly Relevant: All responses directly address the user's questions and goal without unnecessary tangents.",
    ],
    criteria: [
      "Do responses directly address the user's questions?",
      "Is information provided relevant to the goal?",
      "Are there unnecessary tangents or off-topic content?",
      "Does the assistant stay focused on helping achieve the goal?",
    ],
  },
  completeness: {
    assistantOnly: false,
    instruction: "Evaluate the completeness of the assistant's responses.",
    context: (goal) =>
      `Goal: ${goal.description}\nExpected Complexity: ${goal.complexity}\n\nSuccess Criteria:\n${bulletList(goal.success_criteria)}`,
    levels: [
      "Incomplete: Major aspects missing, provides only surface-level information, fails to meet success criteria.",
      "Partially Complete: Addresses some aspects but omits important details or steps, meets few success criteria.",
      "Mostly Complete: Covers most important aspects with adequate depth, meets most success criteria.",
      "Fully Complete: Thoroughly addresses all aspects with appropriate depth, meets all success criteria.",
    ],
    criteria: [
      "Were all aspects of the question addressed?",
      "Are responses thorough given the complexity level?",
      "Were important details or steps omitted?",
      "Did the assistant provide sufficient depth?",
    ],
  },
  politeness: {
    assistantOnly: true,
    instruction: "Evaluate the politeness and courtesy of these assistant responses.",
    context: () => "",
    levels: [
      "Impolite: Responses are rude, dismissive, or disrespectful. Uses harsh language or shows impatience.",
      "Somewhat Polite: Responses are generally polite but may lack warmth or could be more courteous.",
      "Polite: Responses are consistently polite and respectful with appropriate courtesy.",
      "Very Polite: Responses are exceptionally courteous, warm, and respectful with excellent tone.",
    ],
    criteria: [
      "Does the assistant use polite language and appropriate greetings?",
      "Is the tone respectful and considerate?",
      "Does the assistant show empathy and understanding?",
      "Are responses courteous even when correcting or clarifying?",
    ],
  },
};

function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

export function formatTranscript(messages: readonly Utterance[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n\n");
}

function assistantText(messages: readonly Utterance[]): string {
  return messages
    .filter((m) => m.role === "assistant")
    .map((m) => m.content)
    .join("\n\n");
}

/** Only a bare TRUE (any case, surrounding whitespace ignored) counts. */
export function parseVerdict(text: string): boolean {
  return text.trim().toUpperCase() === "TRUE";
}

export function parseRubricVerdict(text: string): RubricVerdict {
  const fields = extractFields(text, ["REASONING", "SCORE"] as const, { keep: "first" });
  const score = parseRubricScore(fields.SCORE);
  if (score === null) {
    return { score: FALLBACK_RUBRIC_SCORE, reason: PARSE_FAILURE_REASON };
  }
  return { score, reason: fields.REASONING ?? "" };
}

export function buildRubricPrompt(axis: ScoredAxis, goal: Goal, subject: string): string {
  const rubric = RUBRICS[axis];
  const context = rubric.context(goal);
  const subjectLabel = rubric.assistantOnly ? "Assistant Messages" : "Conversation";

  return `${rubric.instruction}
${context ? `\n${context}\n` : ""}
${subjectLabel}:
${subject}

Scoring Rubric (0-3):
${rubric.levels.map((level, score) => `${score} - ${level}`).join("\n")}

Evaluation Criteria:
${bulletList(rubric.criteria)}

First provide your reasoning, then give your score.
Format your response as:
REASONING: [Your analysis]
SCORE: [0, 1, 2, or 3]`;
}

export class JudgeEvaluator {
  constructor(private readonly llm: TextCompletion) {}

  async evaluate(input: JudgeInput): Promise<EvaluationMetrics> {
    const { conversation, goal, persona, responseTimes, errors } = input;

    const goalAchieved = await this.evaluateGoalAchievement(conversation, goal, persona);
    const clarity = await this.evaluateAxis("clarity", conversation, goal);
    const relevance = await this.evaluateAxis("relevance", conversation, goal);
    const completeness = await this.evaluateAxis("completeness", conversation, goal);
    const politeness = await this.evaluateAxis("politeness", conversation, goal);

    return {
      goal_achieved: goalAchieved,
      total_turns: conversation.current_turn,
      average_response_time: mean(responseTimes),
      user_satisfaction_score: conversation.user_satisfaction,
      clarity_score: clarity.score / 3,
      clarity_reason: clarity.reason,
      relevance_score: relevance.score / 3,
      relevance_reason: relevance.reason,
      completeness_score: completeness.score / 3,
      completeness_reason: completeness.reason,
      politeness_score: politeness.score / 3,
      politeness_reason: politeness.reason,
      frustration_incidents: countFrustrationIncidents(conversation.messages),
      error_rate: errors.length / Math.max(conversation.messages.length, 1),
    };
  }

  async evaluateGoalAchievement(
    conversation: ConversationState,
    goal: Goal,
    persona: Persona,
  ): Promise<boolean> {
    const prompt = `Evaluate if the following conversation achieved its goal.

User: ${persona.name} (${persona.description})
Goal: ${goal.description}

Success Criteria:
${bulletList(goal.success_criteria)}

Conversation:
${formatTranscript(conversation.messages)}

Based on the success criteria, was the goal achieved? Consider:
1. Were all success criteria met?
2. Did the user ultimately get their answer or understand why not?
3. Was the assistant's behavior appropriate for the kind of request?

Respond with only "TRUE" if the goal was achieved, or "FALSE" if not.`;

    try {
      const text = await this.llm.complete({ prompt, maxTokens: VERDICT_MAX_TOKENS, temperature: 0 });
      return parseVerdict(text);
    } catch (err) {
      console.warn(`Goal achievement judge failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async evaluateAxis(axis: ScoredAxis, conversation: ConversationState, goal: Goal): Promise<RubricVerdict> {
    const subject = RUBRICS[axis].assistantOnly
      ? assistantText(conversation.messages)
      : formatTranscript(conversation.messages);

    if (RUBRICS[axis].assistantOnly && !subject) {
      return { score: FALLBACK_RUBRIC_SCORE, reason: NO_ASSISTANT_REASON };
    }

    try {
      const text = await this.llm.complete({
        prompt: buildRubricPrompt(axis, goal, subject),
        maxTokens: RUBRIC_MAX_TOKENS,
        temperature: 0,
      });
      return parseRubricVerdict(text);
    } catch (err) {
      console.warn(`Failed to score ${axis} from judge: ${errorMessage(err)}`);
      return { score: FALLBACK_RUBRIC_SCORE, reason: PARSE_FAILURE_REASON };
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
