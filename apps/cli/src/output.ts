import { formatReport } from "@convosim/runner";
import type { SimulationObserver } from "@convosim/runner";
import type { SimulationResult, StopReason } from "@convosim/shared";

const STOP_MESSAGES: Record<StopReason, string> = {
  max_turns: "Maximum turns reached",
  user_ended: "User ended conversation",
  transport_error: "Conversation stopped on a transport error",
};

export interface ObserverOptions {
  /** Hide the transcript, keep progress and errors */
  quiet?: boolean;
}

export async function createConsoleObserver(options: ObserverOptions = {}): Promise<SimulationObserver> {
  const { default: chalk } = await import("chalk");
  const { default: ora } = await import("ora");
  const spinner = ora();
  const transcript = (line: string) => {
    if (!options.quiet) console.log(line);
  };

  return {
    onStart(config) {
      console.log(chalk.cyan(`\nStarting simulation ${config.simulation_id}`));
      console.log(`  ${chalk.dim("Persona:")}   ${config.persona.name}`);
      console.log(`  ${chalk.dim("Goal:")}      ${config.goal.description}`);
      console.log(`  ${chalk.dim("Max turns:")} ${config.max_turns}\n`);
    },
    onUserMessage(text) {
      transcript(chalk.blue(`USER: ${text}`));
    },
    onAssistantMessage(text, elapsedMs) {
      transcript(`${chalk.green(`ASSISTANT: ${text}`)} ${chalk.dim(`(${elapsedMs}ms)`)}`);
    },
    onTransportError(error) {
      console.log(chalk.red(`ERROR: ${error}`));
    },
    onRunError(error) {
      console.log(chalk.red(`Simulation error: ${error}`));
    },
    onStop(reason, turns) {
      console.log(chalk.yellow(`\n${STOP_MESSAGES[reason]} (${turns} turns)`));
    },
    onEvaluating() {
      spinner.start("Evaluating conversation...");
    },
    onEvaluated(metrics) {
      spinner.succeed(`Evaluation complete (goal ${metrics.goal_achieved ? "achieved" : "not achieved"})`);
    },
    onSaved(filePath) {
      console.log(chalk.dim(`Results saved to: ${filePath}`));
    },
  };
}

export async function printResult(result: SimulationResult) {
  const { default: chalk } = await import("chalk");

  console.log(`\n${formatReport(result.metrics)}`);

  if (result.errors) {
    console.log(chalk.red("\nErrors encountered:"));
    for (const error of result.errors) {
      console.log(chalk.red(`  - ${error}`));
    }
  }
}

export async function printFatal(message: string) {
  const { default: chalk } = await import("chalk");
  console.error(chalk.red(`✗ ${message}`));
}
