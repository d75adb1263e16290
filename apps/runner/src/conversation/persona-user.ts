/**
 * Persona user: plays the simulated user. Generates each user turn with an
 * LLM from the persona's traits, the goal and the recent conversation, and
 * owns the conversation state that drives progress, frustration and stopping.
 */

import { clampUnit } from "@convosim/shared";
import type { ConversationState, Goal, Persona, Utterance, UtteranceRole } from "@convosim/shared";
import type { TextCompletion } from "../llm.js";
import { extractFields, parseBooleanField, parseUnitField } from "./micro-format.js";
import {
  cloneState,
  createInitialState,
  expectedTurnsOf,
  nextFrustrationLevel,
  nextGoalProgress,
  shouldStopConversation,
} from "./state.js";

const INITIAL_MAX_TOKENS = 300;
const RESPONSE_MAX_TOKENS = 500;
export const CONTEXT_WINDOW = 6;

const DECISION_KEYS = ["MESSAGE", "CONTINUE", "SATISFACTION", "REASON"] as const;

export interface UserTurnDecision {
  /** Empty when the LLM gave no MESSAGE field */
  message: string;
  should_continue: boolean;
  satisfaction: number;
  reason: string;
}

type DescribedTrait = "patience" | "expertise" | "verbosity";

const TRAIT_DESCRIPTIONS: Record<DescribedTrait, { low: string; high: string }> = {
  patience: {
    low: "very impatient, wants quick answers",
    high: "very patient, willing to explore topics deeply",
  },
  expertise: {
    low: "novice, needs simple explanations",
    high: "expert, understands complex concepts",
  },
  verbosity: {
    low: "concise, uses few words",
    high: "verbose, provides detailed context",
  },
};

export function describeTrait(trait: DescribedTrait, value: number): string {
  const desc = TRAIT_DESCRIPTIONS[trait];
  if (value < 0.3) return desc.low;
  if (value > 0.7) return desc.high;
  return "moderate";
}

export function parseUserTurnDecision(content: string): UserTurnDecision {
  const fields = extractFields(content, DECISION_KEYS);
  return {
    message: fields.MESSAGE ?? "",
    should_continue: parseBooleanField(fields.CONTINUE, true),
    satisfaction: parseUnitField(fields.SATISFACTION, 0.5),
    reason: fields.REASON ?? "",
  };
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export class PersonaUserAgent {
  private readonly state: ConversationState = createInitialState();

  constructor(
    private readonly llm: TextCompletion,
    readonly persona: Persona,
    readonly goal: Goal,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Opening line. Does not touch state; the caller appends it. */
  async generateInitialMessage(): Promise<string> {
    const { persona, goal } = this;
    const text = await this.llm.complete({
      system: this.buildSystemPrompt(),
      prompt: `Generate the first message to start a conversation about: "${goal.description}".

Remember your persona traits:
- Patience level: ${persona.patience}
- Expertise: ${persona.expertise}
- Communication clarity: ${persona.clarity_of_communication}

Reply with ONLY the message itself, natural and consistent with these traits.`,
      maxTokens: INITIAL_MAX_TOKENS,
      temperature: 0.7,
    });
    return text.trim();
  }

  /**
   * Ingests the assistant's reply, then asks the LLM for the next user turn.
   * Satisfaction is returned, not applied; see updateSatisfaction.
   */
  async generateResponse(assistantText: string): Promise<UserTurnDecision> {
    this.ingest(assistantText);

    const { persona, goal, state } = this;
    const criteria = goal.success_criteria.map((c) => `- ${c}`).join("\n");

    const content = await this.llm.complete({
      system: this.buildSystemPrompt(),
      prompt: `Based on the assistant's last response, generate your next message.

Current conversation state:
- Turn number: ${state.current_turn}
- Goal progress: ${percent(state.goal_progress)}
- Your frustration level: ${percent(state.frustration_level)}
- Your satisfaction: ${percent(state.user_satisfaction)}

Success criteria for your goal:
${criteria}

Recent conversation:
${this.buildConversationContext()}

Generate your response based on:
1. Your persona traits (patience: ${persona.patience}, expertise: ${persona.expertise})
2. Whether the assistant is helping you achieve your goal
3. Your current frustration and satisfaction levels

Format your response EXACTLY like this:
MESSAGE: [your message]
CONTINUE: [true/false]
SATISFACTION: [0-1]
REASON: [brief reason]

Example:
MESSAGE: Could you try explaining it in a different way?
CONTINUE: true
SATISFACTION: 0.3
REASON: Assistant didn't provide helpful information

Always include all four fields.`,
      maxTokens: RESPONSE_MAX_TOKENS,
      temperature: 0.7,
    });

    return parseUserTurnDecision(content);
  }

  /**
   * Records an assistant turn: appends it, advances the turn counter and
   * re-derives progress and frustration.
   */
  ingest(assistantText: string): void {
    this.append("assistant", assistantText);
    this.state.current_turn += 1;
    this.state.goal_progress = nextGoalProgress(this.state, this.goal);
    this.state.frustration_level = nextFrustrationLevel(this.state, this.persona, this.goal);
  }

  addUserMessage(content: string): void {
    this.append("user", content);
  }

  updateSatisfaction(value: number): void {
    this.state.user_satisfaction = clampUnit(value);
  }

  /** Deep copy; mutating it has no effect on the agent. */
  getState(): ConversationState {
    return cloneState(this.state);
  }

  shouldStop(): boolean {
    return shouldStopConversation(this.state, this.goal);
  }

  private append(role: UtteranceRole, content: string): void {
    const utterance: Utterance = {
      role,
      content,
      timestamp: this.clock().toISOString(),
      turn_number: this.state.current_turn,
    };
    this.state.messages.push(utterance);
  }

  private buildSystemPrompt(): string {
    const { persona, goal } = this;
    return `You are simulating a user with the following characteristics:

Persona: ${persona.name}
Description: ${persona.description}

Personality Traits (0-1 scale):
- Patience: ${persona.patience} (${describeTrait("patience", persona.patience)})
- Expertise: ${persona.expertise} (${describeTrait("expertise", persona.expertise)})
- Verbosity: ${persona.verbosity} (${describeTrait("verbosity", persona.verbosity)})
- Frustration Tolerance: ${persona.frustration_tolerance}
- Communication Clarity: ${persona.clarity_of_communication}
- Technical Level: ${persona.technical_level}

Your Goal: ${goal.description}
Expected conversation length: ${expectedTurnsOf(goal)} turns
Domain: ${goal.domain}
Complexity: ${goal.complexity}

Behave consistently with these traits throughout the conversation.
Express frustration or satisfaction naturally based on your persona.
Use language and terminology appropriate to your technical level.`;
  }

  private buildConversationContext(): string {
    return this.state.messages
      .slice(-CONTEXT_WINDOW)
      .map((m) => `${m.role.toUpperCase()}: ${m.content}`)
      .join("\n\n");
  }
}
