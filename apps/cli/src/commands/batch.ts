import { createSimulation, formatAggregatedReport } from "@convosim/runner";
import type { EvaluationMetrics } from "@convosim/shared";
import { createConsoleObserver, printFatal } from "../output.js";
import { resolveSetup } from "../setup.js";
import type { Setup } from "../setup.js";
import type { RunOptions } from "./run.js";

export interface BatchOptions extends RunOptions {
  count: number;
}

/** Runs `count` independent simulations one after another and aggregates them. */
export async function batchCommand(persona: string | undefined, goal: string | undefined, options: BatchOptions) {
  const { default: chalk } = await import("chalk");

  let setup: Setup;
  try {
    setup = resolveSetup({ ...options, persona, goal });
  } catch (err) {
    await printFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  console.log(chalk.bold(`\n  Batch of ${options.count} simulations\n`));

  const observer = await createConsoleObserver({ quiet: true });
  const metrics: EvaluationMetrics[] = [];

  for (let i = 1; i <= options.count; i++) {
    const simulation = createSimulation(
      { ...setup.simulation, simulation_id: `${setup.simulation.simulation_id}-${i}` },
      {
        apiKey: setup.apiKey,
        headers: setup.headers,
        timeoutMs: setup.timeoutMs,
        resultsDir: setup.resultsDir,
        observer,
      },
    );

    try {
      const result = await simulation.run();
      metrics.push(result.metrics);
    } catch (err) {
      console.log(chalk.red(`Simulation ${i} failed: ${err instanceof Error ? err.message : String(err)}`));
    }
  }

  if (metrics.length === 0) {
    await printFatal("No simulation produced an evaluation");
    process.exit(1);
  }

  console.log(`\n${formatAggregatedReport(metrics, options.count)}`);
}
