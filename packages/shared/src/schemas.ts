import { z } from "zod";
import { GOAL_COMPLEXITIES, GOAL_DOMAINS } from "./types.js";

// ============================================================
// Scenario schemas
// ============================================================

const TraitSchema = z.number().min(0).max(1);

export const PersonaSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  patience: TraitSchema,
  expertise: TraitSchema,
  verbosity: TraitSchema,
  frustration_tolerance: TraitSchema,
  clarity_of_communication: TraitSchema,
  technical_level: TraitSchema,
});

export const GoalSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  success_criteria: z.array(z.string().min(1)),
  expected_turns: z.number().int().min(1).optional(),
  domain: z.enum(GOAL_DOMAINS),
  complexity: z.enum(GOAL_COMPLEXITIES),
});

/** Catalog files map a lookup key (e.g. "average_user") to a descriptor. */
export const PersonaCatalogSchema = z.record(PersonaSchema);
export const GoalCatalogSchema = z.record(GoalSchema);

// ============================================================
// Conversation + result schemas
// ============================================================

export const UtteranceSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  turn_number: z.number().int().min(0),
});

export const ConversationStateSchema = z.object({
  messages: z.array(UtteranceSchema),
  current_turn: z.number().int().min(0),
  goal_progress: z.number().min(0).max(1),
  user_satisfaction: z.number().min(0).max(1),
  frustration_level: z.number().min(0).max(1),
  context: z.record(z.unknown()),
});

const UnitScoreSchema = z.number().min(0).max(1);

export const EvaluationMetricsSchema = z.object({
  goal_achieved: z.boolean(),
  total_turns: z.number().int().min(0),
  average_response_time: z.number().min(0),
  user_satisfaction_score: UnitScoreSchema,
  clarity_score: UnitScoreSchema,
  clarity_reason: z.string().optional(),
  relevance_score: UnitScoreSchema,
  relevance_reason: z.string().optional(),
  completeness_score: UnitScoreSchema,
  completeness_reason: z.string().optional(),
  politeness_score: UnitScoreSchema,
  politeness_reason: z.string().optional(),
  frustration_incidents: z.number().int().min(0),
  error_rate: UnitScoreSchema,
});

export const SimulationConfigSchema = z.object({
  simulation_id: z.string().min(1),
  persona: PersonaSchema,
  goal: GoalSchema,
  max_turns: z.number().int().min(1).max(200).default(20),
  api_endpoint: z.string().url(),
  user_model: z.string().min(1),
  judge_model: z.string().min(1),
});

export const SimulationResultSchema = z.object({
  config: SimulationConfigSchema,
  conversation: ConversationStateSchema,
  metrics: EvaluationMetricsSchema,
  start_time: z.string(),
  end_time: z.string(),
  duration_ms: z.number().min(0),
  errors: z.array(z.string()).optional(),
});

// ============================================================
// Project config
// ============================================================

export const ConvoSimConfigSchema = z.object({
  assistant_endpoint: z.string().url(),
  headers: z.record(z.string()),
  timeout_ms: z.number().int().min(1000).max(600_000),
  max_turns: z.number().int().min(1).max(200),
  results_dir: z.string().min(1),
  user_model: z.string().min(1),
  judge_model: z.string().min(1),
});
