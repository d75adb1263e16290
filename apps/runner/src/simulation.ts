/**
 * Simulation runner: one conversation from opening message to persisted,
 * scored result.
 *
 * Each simulation owns its components. Batches call createSimulation once
 * per run so nothing mutable is shared between runs.
 */

import { HttpAssistantGateway } from "@convosim/adapters";
import type { AssistantGateway } from "@convosim/adapters";
import type { EvaluationMetrics, SimulationConfig, SimulationResult } from "@convosim/shared";
import { ConversationOrchestrator } from "./conversation/executor.js";
import type { ConversationObserver } from "./conversation/executor.js";
import { JudgeEvaluator } from "./conversation/judge-llm.js";
import { PersonaUserAgent } from "./conversation/persona-user.js";
import { AnthropicCompletion } from "./llm.js";
import { saveResult } from "./reporter.js";

export interface SimulationObserver extends ConversationObserver {
  onStart?(config: SimulationConfig): void;
  onRunError?(error: string): void;
  onEvaluating?(): void;
  onEvaluated?(metrics: EvaluationMetrics): void;
  onSaved?(filePath: string): void;
}

export interface SimulationComponents {
  user: PersonaUserAgent;
  gateway: AssistantGateway;
  judge: JudgeEvaluator;
}

export interface SimulationRunnerOptions {
  /** Results are persisted only when set */
  resultsDir?: string;
  observer?: SimulationObserver;
  clock?: () => Date;
}

export class SimulationRunner {
  private readonly observer: SimulationObserver;
  private readonly clock: () => Date;

  constructor(
    readonly config: SimulationConfig,
    private readonly components: SimulationComponents,
    private readonly options: SimulationRunnerOptions = {},
  ) {
    this.observer = options.observer ?? {};
    this.clock = options.clock ?? (() => new Date());
  }

  async run(): Promise<SimulationResult> {
    const { config, components, observer } = this;
    observer.onStart?.(config);

    const orchestrator = new ConversationOrchestrator(
      components.user,
      components.gateway,
      config.max_turns,
      observer,
    );

    const start = this.clock();
    // orchestrator.errors is the live list, so transport errors recorded
    // before a throw are kept
    const errors = orchestrator.errors;

    try {
      await orchestrator.run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      errors.push(message);
      observer.onRunError?.(message);
    }

    const end = this.clock();
    const conversation = components.user.getState();

    observer.onEvaluating?.();
    const metrics = await components.judge.evaluate({
      conversation,
      goal: config.goal,
      persona: config.persona,
      responseTimes: orchestrator.responseTimes,
      errors,
    });
    observer.onEvaluated?.(metrics);

    const result: SimulationResult = {
      config,
      conversation,
      metrics,
      start_time: start.toISOString(),
      end_time: end.toISOString(),
      duration_ms: end.getTime() - start.getTime(),
      ...(errors.length > 0 ? { errors: [...errors] } : {}),
    };

    if (this.options.resultsDir) {
      const filePath = await saveResult(result, this.options.resultsDir);
      observer.onSaved?.(filePath);
    }

    return result;
  }
}

export interface CreateSimulationOptions extends SimulationRunnerOptions {
  apiKey: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/** Fresh LLM clients, gateway and decoder for every call. */
export function createSimulation(
  config: SimulationConfig,
  options: CreateSimulationOptions,
): SimulationRunner {
  const { apiKey, headers, timeoutMs, ...runnerOptions } = options;

  const user = new PersonaUserAgent(
    new AnthropicCompletion({ apiKey, model: config.user_model }),
    config.persona,
    config.goal,
    runnerOptions.clock,
  );
  const gateway = new HttpAssistantGateway({
    endpoint: config.api_endpoint,
    headers,
    timeoutMs,
  });
  const judge = new JudgeEvaluator(new AnthropicCompletion({ apiKey, model: config.judge_model }));

  return new SimulationRunner(config, { user, gateway, judge }, runnerOptions);
}
