import { resolve } from "node:path";
import { InvalidArgumentError } from "commander";
import { getEnv, getEnvInt, loadConfig } from "@convosim/config";
import { getGoal, getPersona } from "@convosim/scenarios";
import { DEFAULT_GOAL_ID, DEFAULT_PERSONA_ID, SimulationConfigSchema } from "@convosim/shared";
import type { SimulationConfig } from "@convosim/shared";

export interface SetupOptions {
  persona?: string;
  goal?: string;
  endpoint?: string;
  maxTurns?: number;
  resultsDir?: string;
  config?: string;
}

export interface Setup {
  simulation: SimulationConfig;
  apiKey: string;
  headers: Record<string, string>;
  timeoutMs: number;
  resultsDir: string;
}

/**
 * Everything a run needs, resolved before any simulation work starts.
 * Flags win over environment, environment over convo-sim.json.
 * Throws on a missing API key, an unknown persona or goal, or bad settings.
 */
export function resolveSetup(
  options: SetupOptions,
  cwd: string = process.cwd(),
  now: () => number = Date.now,
): Setup {
  const fileConfig = loadConfig(cwd, options.config);
  const apiKey = getEnv("ANTHROPIC_API_KEY");

  const personaId = options.persona ?? DEFAULT_PERSONA_ID;
  const goalId = options.goal ?? DEFAULT_GOAL_ID;
  const persona = getPersona(personaId);
  const goal = getGoal(goalId);

  const parsed = SimulationConfigSchema.safeParse({
    simulation_id: `${personaId}-${goalId}-${now()}`,
    persona,
    goal,
    max_turns: options.maxTurns ?? getEnvInt("SIM_MAX_TURNS", fileConfig.max_turns),
    api_endpoint: options.endpoint ?? getEnv("ASSISTANT_API_URL", fileConfig.assistant_endpoint),
    user_model: fileConfig.user_model,
    judge_model: fileConfig.judge_model,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid simulation settings: ${issues}`);
  }

  return {
    simulation: parsed.data,
    apiKey,
    headers: fileConfig.headers,
    timeoutMs: fileConfig.timeout_ms,
    resultsDir: resolve(cwd, options.resultsDir ?? fileConfig.results_dir),
  };
}

/** commander argument parser for counts and turn limits. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}
