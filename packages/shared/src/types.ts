// ============================================================
// Scenario descriptors
// ============================================================

export const GOAL_DOMAINS = [
  "technical",
  "general",
  "business",
  "creative",
  "educational",
] as const;

export const GOAL_COMPLEXITIES = ["simple", "moderate", "complex"] as const;

export type GoalDomain = (typeof GOAL_DOMAINS)[number];
export type GoalComplexity = (typeof GOAL_COMPLEXITIES)[number];

/** Trait values are on a 0-1 scale. */
export interface Persona {
  id: string;
  name: string;
  description: string;
  patience: number;
  expertise: number;
  verbosity: number;
  frustration_tolerance: number;
  clarity_of_communication: number;
  technical_level: number;
}

export interface Goal {
  id: string;
  description: string;
  success_criteria: string[];
  expected_turns?: number;
  domain: GoalDomain;
  complexity: GoalComplexity;
}

// ============================================================
// Conversation
// ============================================================

export type UtteranceRole = "user" | "assistant";

export interface Utterance {
  role: UtteranceRole;
  content: string;
  /** ISO-8601 creation time */
  timestamp: string;
  turn_number: number;
}

export interface ConversationState {
  messages: Utterance[];
  current_turn: number;
  goal_progress: number;
  user_satisfaction: number;
  frustration_level: number;
  context: Record<string, unknown>;
}

export type StopReason = "max_turns" | "user_ended" | "transport_error";

// ============================================================
// Evaluation
// ============================================================

export interface EvaluationMetrics {
  goal_achieved: boolean;
  total_turns: number;
  /** Mean assistant latency in milliseconds */
  average_response_time: number;
  user_satisfaction_score: number;
  clarity_score: number;
  clarity_reason?: string;
  relevance_score: number;
  relevance_reason?: string;
  completeness_score: number;
  completeness_reason?: string;
  politeness_score: number;
  politeness_reason?: string;
  frustration_incidents: number;
  error_rate: number;
}

export const SCORED_AXES = ["clarity", "relevance", "completeness", "politeness"] as const;

export type ScoredAxis = (typeof SCORED_AXES)[number];

export type Grade =
  | "Excellent"
  | "Good"
  | "Satisfactory"
  | "Needs Improvement"
  | "Poor";

// ============================================================
// Simulation
// ============================================================

export interface SimulationConfig {
  simulation_id: string;
  persona: Persona;
  goal: Goal;
  max_turns: number;
  api_endpoint: string;
  user_model: string;
  judge_model: string;
}

export interface SimulationResult {
  config: SimulationConfig;
  conversation: ConversationState;
  metrics: EvaluationMetrics;
  start_time: string;
  end_time: string;
  duration_ms: number;
  errors?: string[];
}

/** Project-level settings read from convo-sim.json */
export interface ConvoSimConfig {
  assistant_endpoint: string;
  headers: Record<string, string>;
  timeout_ms: number;
  max_turns: number;
  results_dir: string;
  user_model: string;
  judge_model: string;
}
