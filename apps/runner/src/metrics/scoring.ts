/**
 * Scoring: composite score, grade bands, cross-run aggregation and
 * recommendations. Pure functions over EvaluationMetrics.
 */

import { SCORED_AXES, clamp, clampUnit, mean, roundHalfEven } from "@convosim/shared";
import type { EvaluationMetrics, Grade, ScoredAxis } from "@convosim/shared";

export const SCORE_WEIGHTS = {
  goal_achieved: 0.2,
  user_satisfaction: 0.15,
  clarity: 0.15,
  relevance: 0.15,
  completeness: 0.15,
  politeness: 0.15,
  error_penalty: 0.05,
  frustration_penalty: 0.02,
} as const;

/** Axis scores below this (2 on the 0-3 rubric) get a recommendation */
export const RECOMMENDATION_THRESHOLD = 0.67;

const GRADE_BANDS: ReadonlyArray<[number, Grade]> = [
  [0.83, "Excellent"],
  [0.67, "Good"],
  [0.5, "Satisfactory"],
  [0.33, "Needs Improvement"],
];

const AXIS_RECOMMENDATIONS: Record<ScoredAxis, string> = {
  clarity: "Improve response clarity and structure",
  relevance: "Stay more focused on user questions",
  completeness: "Provide more comprehensive responses",
  politeness: "Improve politeness and courtesy in responses",
};

export function axisScore(metrics: EvaluationMetrics, axis: ScoredAxis): number {
  switch (axis) {
    case "clarity":
      return metrics.clarity_score;
    case "relevance":
      return metrics.relevance_score;
    case "completeness":
      return metrics.completeness_score;
    case "politeness":
      return metrics.politeness_score;
  }
}

export function axisReason(metrics: EvaluationMetrics, axis: ScoredAxis): string | undefined {
  switch (axis) {
    case "clarity":
      return metrics.clarity_reason;
    case "relevance":
      return metrics.relevance_reason;
    case "completeness":
      return metrics.completeness_reason;
    case "politeness":
      return metrics.politeness_reason;
  }
}

/** Weighted blend minus error and frustration penalties, clamped to [0,1]. */
export function calculateOverallScore(metrics: EvaluationMetrics): number {
  const w = SCORE_WEIGHTS;
  let score = metrics.goal_achieved ? w.goal_achieved : 0;
  score += metrics.user_satisfaction_score * w.user_satisfaction;
  score += metrics.clarity_score * w.clarity;
  score += metrics.relevance_score * w.relevance;
  score += metrics.completeness_score * w.completeness;
  score += metrics.politeness_score * w.politeness;
  score -= metrics.error_rate * w.error_penalty;
  score -= metrics.frustration_incidents * w.frustration_penalty;
  return clampUnit(score);
}

export function gradeFor(score: number): Grade {
  for (const [threshold, grade] of GRADE_BANDS) {
    if (score >= threshold) return grade;
  }
  return "Poor";
}

/**
 * Means of every continuous metric. Goal achievement is the majority vote,
 * turns and frustration incidents the mean rounded half to even. Reasons
 * are dropped.
 */
export function aggregateMetrics(metricsList: readonly EvaluationMetrics[]): EvaluationMetrics {
  if (metricsList.length === 0) {
    throw new Error("Cannot aggregate empty metrics list");
  }

  const avg = (pick: (m: EvaluationMetrics) => number) => mean(metricsList.map(pick));

  return {
    goal_achieved: avg((m) => (m.goal_achieved ? 1 : 0)) >= 0.5,
    total_turns: roundHalfEven(avg((m) => m.total_turns)),
    average_response_time: avg((m) => m.average_response_time),
    user_satisfaction_score: avg((m) => m.user_satisfaction_score),
    clarity_score: avg((m) => m.clarity_score),
    relevance_score: avg((m) => m.relevance_score),
    completeness_score: avg((m) => m.completeness_score),
    politeness_score: avg((m) => m.politeness_score),
    frustration_incidents: roundHalfEven(avg((m) => m.frustration_incidents)),
    error_rate: avg((m) => m.error_rate),
  };
}

/** Unit score back on the 0-3 rubric scale, halves to even. */
export function toRubric(score: number): number {
  return clamp(roundHalfEven(score * 3), 0, 3);
}

/** Count of results per 0-3 rubric bucket; index is the bucket. */
export function scoreDistribution(
  metricsList: readonly EvaluationMetrics[],
  axis: ScoredAxis,
): [number, number, number, number] {
  const buckets: [number, number, number, number] = [0, 0, 0, 0];
  for (const metrics of metricsList) {
    const bucket = toRubric(axisScore(metrics, axis));
    if (bucket === 0 || bucket === 1 || bucket === 2 || bucket === 3) {
      buckets[bucket] += 1;
    }
  }
  return buckets;
}

export function recommendationsFor(metrics: EvaluationMetrics): string[] {
  const recommendations: string[] = [];

  if (!metrics.goal_achieved) {
    recommendations.push("Focus on achieving user goals more effectively");
  }
  for (const axis of SCORED_AXES) {
    if (axisScore(metrics, axis) < RECOMMENDATION_THRESHOLD) {
      recommendations.push(AXIS_RECOMMENDATIONS[axis]);
    }
  }
  if (metrics.frustration_incidents > 2) {
    recommendations.push("Better understand user intent to reduce frustration");
  }
  if (metrics.error_rate > 0.1) {
    recommendations.push("Improve error handling and recovery");
  }

  return recommendations.length > 0 ? recommendations : ["Continue maintaining high performance"];
}
