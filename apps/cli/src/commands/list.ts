import { loadGoals, loadPersonas } from "@convosim/scenarios";

export async function listCommand() {
  const { default: chalk } = await import("chalk");

  console.log(chalk.bold("\nPersonas"));
  for (const [id, persona] of Object.entries(loadPersonas())) {
    console.log(`  ${chalk.cyan(id.padEnd(22))} ${persona.name}: ${chalk.dim(persona.description)}`);
  }

  console.log(chalk.bold("\nGoals"));
  for (const [id, goal] of Object.entries(loadGoals())) {
    const turns = goal.expected_turns !== undefined ? `, ~${goal.expected_turns} turns` : "";
    console.log(`  ${chalk.cyan(id.padEnd(22))} ${goal.description} ${chalk.dim(`(${goal.domain}, ${goal.complexity}${turns})`)}`);
  }
  console.log("");
}
