import { createSimulation } from "@convosim/runner";
import { createConsoleObserver, printFatal, printResult } from "../output.js";
import { resolveSetup } from "../setup.js";
import type { Setup } from "../setup.js";

export interface RunOptions {
  endpoint?: string;
  maxTurns?: number;
  resultsDir?: string;
  config?: string;
}

export async function runCommand(persona: string | undefined, goal: string | undefined, options: RunOptions) {
  const { default: chalk } = await import("chalk");

  let setup: Setup;
  try {
    setup = resolveSetup({ ...options, persona, goal });
  } catch (err) {
    await printFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  console.log(chalk.bold("\n  Conversation simulation\n"));
  console.log(chalk.dim(`  endpoint: ${setup.simulation.api_endpoint}`));

  const observer = await createConsoleObserver();
  const simulation = createSimulation(setup.simulation, {
    apiKey: setup.apiKey,
    headers: setup.headers,
    timeoutMs: setup.timeoutMs,
    resultsDir: setup.resultsDir,
    observer,
  });

  try {
    const result = await simulation.run();
    await printResult(result);
    console.log(chalk.green("\nSimulation completed"));
  } catch (err) {
    await printFatal(`Simulation failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
