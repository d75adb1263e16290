export { AnthropicCompletion, isRetryableApiError } from "./llm.js";
export type { AnthropicCompletionOptions, CompletionRequest, TextCompletion } from "./llm.js";
export { PersonaUserAgent, parseUserTurnDecision, describeTrait, CONTEXT_WINDOW } from "./conversation/persona-user.js";
export type { UserTurnDecision } from "./conversation/persona-user.js";
export {
  createInitialState,
  expectedTurnsOf,
  nextFrustrationLevel,
  nextGoalProgress,
  shouldStopConversation,
} from "./conversation/state.js";
export { extractFields, parseBooleanField, parseRubricScore, parseUnitField } from "./conversation/micro-format.js";
export type { ExtractOptions, ExtractedFields } from "./conversation/micro-format.js";
export { ConversationOrchestrator } from "./conversation/executor.js";
export type { ConversationObserver, ConversationOutcome } from "./conversation/executor.js";
export { JudgeEvaluator, parseRubricVerdict, parseVerdict } from "./conversation/judge-llm.js";
export type { JudgeInput, RubricVerdict } from "./conversation/judge-llm.js";
export * from "./metrics/index.js";
export { formatAggregatedReport, formatReport, resultFileName, saveResult } from "./reporter.js";
export { SimulationRunner, createSimulation } from "./simulation.js";
export type {
  CreateSimulationOptions,
  SimulationComponents,
  SimulationObserver,
  SimulationRunnerOptions,
} from "./simulation.js";
