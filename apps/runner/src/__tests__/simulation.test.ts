import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { SimulationConfig } from "@convosim/shared";
import { JudgeEvaluator } from "../conversation/judge-llm.js";
import { PersonaUserAgent } from "../conversation/persona-user.js";
import { SimulationRunner, createSimulation } from "../simulation.js";
import type { SimulationObserver } from "../simulation.js";
import { ScriptedCompletion, ScriptedGateway, decision, failed, goal, ok, persona } from "./fakes.js";

const config: SimulationConfig = {
  simulation_id: "sim-1",
  persona,
  goal,
  max_turns: 5,
  api_endpoint: "http://assistant.test/api/chat",
  user_model: "user-model",
  judge_model: "judge-model",
};

function steppingClock(...isoTimes: string[]): () => Date {
  const times = isoTimes.map((t) => new Date(t));
  return () => times.shift() ?? new Date(0);
}

function judgeReplying(...replies: string[]) {
  return new JudgeEvaluator(new ScriptedCompletion(replies, "REASONING: fine\nSCORE: 2"));
}

describe("SimulationRunner", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("evaluates the partial transcript after a transport error", async () => {
    const runner = new SimulationRunner(
      config,
      {
        user: new PersonaUserAgent(new ScriptedCompletion(["Hello?"]), persona, goal),
        gateway: new ScriptedGateway([failed("API responded with status 500")]),
        judge: judgeReplying("FALSE"),
      },
      { clock: steppingClock("2026-04-01T09:00:00.000Z", "2026-04-01T09:00:02.500Z") },
    );

    const result = await runner.run();

    expect(result.errors).toEqual(["API responded with status 500"]);
    expect(result.conversation.messages).toHaveLength(1);
    expect(result.metrics.goal_achieved).toBe(false);
    expect(result.metrics.error_rate).toBe(1);
    expect(result.start_time).toBe("2026-04-01T09:00:00.000Z");
    expect(result.end_time).toBe("2026-04-01T09:00:02.500Z");
    expect(result.duration_ms).toBe(2500);
  });

  it("keeps going to evaluation when the conversation throws", async () => {
    const onRunError = vi.fn<(error: string) => void>();
    const runner = new SimulationRunner(
      config,
      {
        user: new PersonaUserAgent(new ScriptedCompletion(["Hi", new Error("llm down")]), persona, goal),
        gateway: new ScriptedGateway([ok("Hello", 50)]),
        judge: judgeReplying("TRUE"),
      },
      { observer: { onRunError } },
    );

    const result = await runner.run();

    expect(onRunError).toHaveBeenCalledWith("llm down");
    expect(result.errors).toEqual(["llm down"]);
    expect(result.conversation.current_turn).toBe(1);
    expect(result.metrics.average_response_time).toBe(50);
    expect(result.metrics.goal_achieved).toBe(true);
  });

  it("saves the result when a results directory is set", async () => {
    dir = mkdtempSync(path.join(tmpdir(), "convo-sim-"));
    const events: string[] = [];
    const observer: SimulationObserver = {
      onStart: (c) => events.push(`start:${c.simulation_id}`),
      onEvaluating: () => events.push("evaluating"),
      onEvaluated: (m) => events.push(`evaluated:${m.goal_achieved}`),
      onSaved: () => events.push("saved"),
    };
    const runner = new SimulationRunner(
      config,
      {
        user: new PersonaUserAgent(new ScriptedCompletion(["Hi", decision("Thanks", false)]), persona, goal),
        gateway: new ScriptedGateway([ok("Hello")]),
        judge: judgeReplying("TRUE"),
      },
      { resultsDir: dir, observer, clock: steppingClock("2026-04-01T09:00:00.000Z", "2026-04-01T09:00:01.000Z") },
    );

    const result = await runner.run();

    expect("errors" in result).toBe(false);
    expect(events).toEqual(["start:sim-1", "evaluating", "evaluated:true", "saved"]);
    expect(existsSync(path.join(dir, "simulation-sim-1-2026-04-01T09-00-00.000Z.json"))).toBe(true);
  });
});

describe("createSimulation", () => {
  it("builds an independent runner per call", () => {
    const first = createSimulation(config, { apiKey: "test-secret" });
    const second = createSimulation(config, { apiKey: "test-secret" });

    expect(first).toBeInstanceOf(SimulationRunner);
    expect(first).not.toBe(second);
    expect(first.config).toBe(config);
  });
});
