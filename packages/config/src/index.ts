import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import {
  ConvoSimConfigSchema,
  DEFAULT_ASSISTANT_ENDPOINT,
  DEFAULT_JUDGE_MODEL,
  DEFAULT_MAX_TURNS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RESULTS_DIR,
  DEFAULT_USER_MODEL,
} from "@convosim/shared";
import type { ConvoSimConfig } from "@convosim/shared";

export const CONFIG_FILE_NAME = "convo-sim.json";

const DEFAULT_CONFIG: ConvoSimConfig = {
  assistant_endpoint: DEFAULT_ASSISTANT_ENDPOINT,
  headers: {},
  timeout_ms: DEFAULT_REQUEST_TIMEOUT_MS,
  max_turns: DEFAULT_MAX_TURNS,
  results_dir: DEFAULT_RESULTS_DIR,
  user_model: DEFAULT_USER_MODEL,
  judge_model: DEFAULT_JUDGE_MODEL,
};

/**
 * Reads convo-sim.json (or `configPath`) from the project root and merges it
 * over the defaults. A missing file yields the defaults; an invalid one throws.
 */
export function loadConfig(projectRoot: string, configPath?: string): ConvoSimConfig {
  const fullPath = resolve(projectRoot, configPath ?? CONFIG_FILE_NAME);

  if (!existsSync(fullPath)) {
    if (configPath) {
      throw new Error(`Config file not found: ${fullPath}`);
    }
    return { ...DEFAULT_CONFIG, headers: { ...DEFAULT_CONFIG.headers } };
  }

  const raw = readFileSync(fullPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${fullPath}: ${msg}`);
  }

  const result = ConvoSimConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config in ${fullPath}: ${issues}`);
  }

  return {
    ...DEFAULT_CONFIG,
    ...result.data,
    headers: { ...DEFAULT_CONFIG.headers, ...result.data.headers },
  };
}

export function getEnv(key: string, fallback?: string): string {
  const value = process.env[key] || fallback;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvInt(key: string, fallback?: number): number {
  const raw = process.env[key];
  if (raw !== undefined && raw !== "") {
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed)) throw new Error(`Invalid integer for ${key}: ${raw}`);
    return parsed;
  }
  if (fallback !== undefined) return fallback;
  throw new Error(`Missing required environment variable: ${key}`);
}
