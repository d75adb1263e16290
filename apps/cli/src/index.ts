import { Command } from "commander";
import { batchCommand } from "./commands/batch.js";
import { listCommand } from "./commands/list.js";
import { runCommand } from "./commands/run.js";
import { parsePositiveInt } from "./setup.js";

const program = new Command();

program
  .name("convo-sim")
  .description("Simulated multi-turn conversations against a chat assistant, scored by an LLM judge")
  .version("0.1.0");

program
  .command("run")
  .description("Run one simulation")
  .argument("[persona]", "persona id (see `list`)")
  .argument("[goal]", "goal id (see `list`)")
  .option("--endpoint <url>", "assistant chat endpoint")
  .option("--max-turns <n>", "turn limit", parsePositiveInt)
  .option("--results-dir <dir>", "where result JSON files are written")
  .option("-c, --config <path>", "config file (default: convo-sim.json)")
  .action(runCommand);

program
  .command("batch")
  .description("Run several independent simulations and aggregate their scores")
  .argument("[persona]", "persona id")
  .argument("[goal]", "goal id")
  .option("-n, --count <n>", "number of simulations", parsePositiveInt, 5)
  .option("--endpoint <url>", "assistant chat endpoint")
  .option("--max-turns <n>", "turn limit", parsePositiveInt)
  .option("--results-dir <dir>", "where result JSON files are written")
  .option("-c, --config <path>", "config file (default: convo-sim.json)")
  .action(batchCommand);

program
  .command("list")
  .description("List available personas and goals")
  .action(listCommand);

await program.parseAsync();
