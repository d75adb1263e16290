export { FRUSTRATION_PHRASES, countFrustrationIncidents, isFrustrated } from "./frustration.js";
export {
  RECOMMENDATION_THRESHOLD,
  SCORE_WEIGHTS,
  aggregateMetrics,
  axisReason,
  axisScore,
  calculateOverallScore,
  gradeFor,
  recommendationsFor,
  scoreDistribution,
  toRubric,
} from "./scoring.js";
