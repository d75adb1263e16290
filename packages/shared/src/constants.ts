export const DEFAULT_ASSISTANT_ENDPOINT = "http://localhost:3000/api/chat";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_TURNS = 20;
export const DEFAULT_RESULTS_DIR = "simulation/results";

export const DEFAULT_USER_MODEL = "claude-haiku-4-5-20251001";
export const DEFAULT_JUDGE_MODEL = "claude-sonnet-4-5";

export const DEFAULT_PERSONA_ID = "average_user";
export const DEFAULT_GOAL_ID = "learn_basic_concept";

/** Used when a goal has no expected_turns */
export const FALLBACK_EXPECTED_TURNS = 10;

export const CLIENT_USER_AGENT = "convo-sim-client/1.0";
export const NO_RESPONSE_PLACEHOLDER = "No response received";
export const REQUEST_TIMEOUT_ERROR = "Request timeout";
