import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { SCORED_AXES } from "@convosim/shared";
import type { EvaluationMetrics, ScoredAxis, SimulationResult } from "@convosim/shared";
import {
  aggregateMetrics,
  axisReason,
  axisScore,
  calculateOverallScore,
  gradeFor,
  recommendationsFor,
  scoreDistribution,
  toRubric,
} from "./metrics/scoring.js";

const AXIS_LABELS: Record<ScoredAxis, string> = {
  clarity: "Clarity",
  relevance: "Relevance",
  completeness: "Completeness",
  politeness: "Politeness",
};

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function ratingLine(label: string, score: number): string {
  return `- ${label}: ${toRubric(score)}/3 (${pct(score)})`;
}

export function formatReport(metrics: EvaluationMetrics): string {
  const overall = calculateOverallScore(metrics);

  const lines = [
    "=== EVALUATION REPORT ===",
    "",
    `Overall Score: ${pct(overall)} (${gradeFor(overall)})`,
    "",
    `Goal Achievement: ${metrics.goal_achieved ? "✓ Achieved" : "✗ Not Achieved"}`,
    "",
    "Performance Metrics:",
    `- Total Turns: ${metrics.total_turns}`,
    `- Avg Response Time: ${(metrics.average_response_time / 1000).toFixed(2)}s`,
    `- Error Rate: ${pct(metrics.error_rate)}`,
    "",
    "Quality Scores (0-3 scale | percentage):",
    ratingLine("User Satisfaction", metrics.user_satisfaction_score),
  ];

  for (const axis of SCORED_AXES) {
    lines.push(ratingLine(AXIS_LABELS[axis], axisScore(metrics, axis)));
    const reason = axisReason(metrics, axis);
    if (reason) lines.push(`  Reason: ${reason}`);
  }

  lines.push(
    "",
    "Score Interpretation:",
    "  0 = Poor | 1 = Fair | 2 = Good | 3 = Excellent",
    "",
    "Issues:",
    `- Frustration Incidents: ${metrics.frustration_incidents}`,
    "",
    "Recommendations:",
    ...recommendationsFor(metrics).map((r) => `- ${r}`),
  );

  return lines.join("\n");
}

export function formatDistribution(metricsList: readonly EvaluationMetrics[], axis: ScoredAxis): string {
  const total = metricsList.length;
  return scoreDistribution(metricsList, axis)
    .map((count, score) => `${score}: ${count} (${total > 0 ? Math.round((count / total) * 100) : 0}%)`)
    .join(" | ");
}

/** `simulationsRun` may exceed the list length when some runs produced no metrics. */
export function formatAggregatedReport(
  metricsList: readonly EvaluationMetrics[],
  simulationsRun: number,
): string {
  const aggregated = aggregateMetrics(metricsList);
  const achieved = metricsList.filter((m) => m.goal_achieved).length;

  return [
    "=== AGGREGATED EVALUATION REPORT ===",
    `Simulations Run: ${simulationsRun}`,
    `Successful Evaluations: ${metricsList.length}`,
    "",
    formatReport(aggregated),
    "",
    `Goal Achievement Rate: ${pct(achieved / metricsList.length)}`,
    "",
    "Individual Score Distribution (0-3 scale):",
    ...SCORED_AXES.map((axis) => `- ${AXIS_LABELS[axis]}: ${formatDistribution(metricsList, axis)}`),
  ].join("\n");
}

export function resultFileName(result: SimulationResult): string {
  const stamp = result.start_time.replace(/:/g, "-");
  return `simulation-${result.config.simulation_id}-${stamp}.json`;
}

/** Writes the result as pretty-printed JSON and returns the file path. */
export async function saveResult(result: SimulationResult, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, resultFileName(result));
  await writeFile(filePath, JSON.stringify(result, null, 2) + "\n", "utf-8");
  return filePath;
}
