import { describe, expect, it } from "vitest";
import { countFrustrationIncidents } from "../metrics/frustration.js";
import {
  aggregateMetrics,
  calculateOverallScore,
  gradeFor,
  recommendationsFor,
  scoreDistribution,
  toRubric,
} from "../metrics/scoring.js";
import { metricsWith, utterance } from "./fakes.js";

describe("calculateOverallScore", () => {
  it("weights goal achievement and the five scores", () => {
    expect(calculateOverallScore(metricsWith())).toBeCloseTo(0.95, 10);
    expect(calculateOverallScore(metricsWith({ goal_achieved: false }))).toBeCloseTo(0.75, 10);
  });

  it("subtracts error and frustration penalties", () => {
    expect(calculateOverallScore(metricsWith({ error_rate: 0.4, frustration_incidents: 2 }))).toBeCloseTo(
      0.95 - 0.02 - 0.04,
      10,
    );
  });

  it("clamps adversarial inputs to [0,1]", () => {
    const worst = metricsWith({
      goal_achieved: false,
      user_satisfaction_score: 0,
      clarity_score: 0,
      relevance_score: 0,
      completeness_score: 0,
      politeness_score: 0,
      error_rate: 1,
      frustration_incidents: 100,
    });
    expect(calculateOverallScore(worst)).toBe(0);

    const inflated = metricsWith({ clarity_score: 5, relevance_score: 5, completeness_score: 5, politeness_score: 5 });
    expect(calculateOverallScore(inflated)).toBe(1);
  });
});

describe("gradeFor", () => {
  it("maps the grade bands", () => {
    expect(gradeFor(0.83)).toBe("Excellent");
    expect(gradeFor(0.829)).toBe("Good");
    expect(gradeFor(0.67)).toBe("Good");
    expect(gradeFor(0.5)).toBe("Satisfactory");
    expect(gradeFor(0.33)).toBe("Needs Improvement");
    expect(gradeFor(0.32)).toBe("Poor");
  });
});

describe("aggregateMetrics", () => {
  it("returns a single achieved result unchanged", () => {
    const single = metricsWith({ total_turns: 3, frustration_incidents: 2, clarity_score: 2 / 3, error_rate: 0.25 });
    expect(aggregateMetrics([single])).toEqual(single);
  });

  it("returns a single failed result unchanged", () => {
    const single = metricsWith({ goal_achieved: false, user_satisfaction_score: 0.35 });
    expect(aggregateMetrics([single])).toEqual(single);
  });

  it("averages continuous metrics and rounds counts", () => {
    const aggregated = aggregateMetrics([
      metricsWith({ total_turns: 2, frustration_incidents: 1, clarity_score: 1, average_response_time: 1000 }),
      metricsWith({ total_turns: 3, frustration_incidents: 2, clarity_score: 0.5, average_response_time: 2000 }),
      metricsWith({ goal_achieved: false, total_turns: 4, frustration_incidents: 2, clarity_score: 0, average_response_time: 3000 }),
    ]);

    expect(aggregated.goal_achieved).toBe(true);
    expect(aggregated.total_turns).toBe(3);
    expect(aggregated.frustration_incidents).toBe(2);
    expect(aggregated.clarity_score).toBe(0.5);
    expect(aggregated.average_response_time).toBe(2000);
  });

  it("rounds half-way counts to the even neighbour", () => {
    const aggregated = aggregateMetrics([
      metricsWith({ total_turns: 2, frustration_incidents: 0 }),
      metricsWith({ total_turns: 3, frustration_incidents: 1 }),
    ]);
    expect(aggregated.total_turns).toBe(2);
    expect(aggregated.frustration_incidents).toBe(0);

    const upper = aggregateMetrics([
      metricsWith({ total_turns: 3, frustration_incidents: 1 }),
      metricsWith({ total_turns: 4, frustration_incidents: 2 }),
    ]);
    expect(upper.total_turns).toBe(4);
    expect(upper.frustration_incidents).toBe(2);
  });

  it("counts an even split as achieved", () => {
    const aggregated = aggregateMetrics([metricsWith(), metricsWith({ goal_achieved: false })]);
    expect(aggregated.goal_achieved).toBe(true);
  });

  it("drops per-run reasons", () => {
    const aggregated = aggregateMetrics([metricsWith({ clarity_reason: "Tidy" })]);
    expect(aggregated.clarity_reason).toBeUndefined();
  });

  it("rejects an empty list", () => {
    expect(() => aggregateMetrics([])).toThrow("Cannot aggregate empty metrics list");
  });
});

describe("toRubric", () => {
  it("maps unit scores onto 0-3 with halves to even", () => {
    expect(toRubric(1)).toBe(3);
    expect(toRubric(2 / 3)).toBe(2);
    expect(toRubric(0.5)).toBe(2);
    expect(toRubric(5 / 6)).toBe(2);
    expect(toRubric(0.9)).toBe(3);
    expect(toRubric(1.4)).toBe(3);
  });
});

describe("scoreDistribution", () => {
  it("buckets scores on the 0-3 scale", () => {
    const list = [1, 2 / 3, 2 / 3, 0].map((clarity_score) => metricsWith({ clarity_score }));
    expect(scoreDistribution(list, "clarity")).toEqual([1, 0, 2, 1]);
  });
});

describe("recommendationsFor", () => {
  it("keeps going when everything is good", () => {
    expect(recommendationsFor(metricsWith())).toEqual(["Continue maintaining high performance"]);
  });

  it("lists each weak area", () => {
    const weak = metricsWith({ goal_achieved: false, clarity_score: 0.5, frustration_incidents: 3, error_rate: 0.2 });
    expect(recommendationsFor(weak)).toEqual([
      "Focus on achieving user goals more effectively",
      "Improve response clarity and structure",
      "Better understand user intent to reduce frustration",
      "Improve error handling and recovery",
    ]);
  });
});

describe("countFrustrationIncidents", () => {
  it("counts one incident per user message", () => {
    expect(countFrustrationIncidents([utterance("user", "this isn't working and I already said that")])).toBe(1);
  });

  it("matches case-insensitively and ignores assistant messages", () => {
    expect(
      countFrustrationIncidents([
        utterance("user", "THIS IS FRUSTRATING"),
        utterance("assistant", "Sorry, that's not helpful of me"),
        utterance("user", "Wrong answer."),
        utterance("user", "Thanks, that works"),
      ]),
    ).toBe(2);
  });
});
