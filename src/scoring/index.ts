export { GRADES, type Adjustment, type CompositeResult, type DimensionScore, type Grade, type GradeBand, type TriggeredSignal } from './types.js';
export { GRADE_TABLE, gradeLabel, mapGrade } from './grade.js';
export { MAX_SCORE, MIN_SCORE, clampScore, round1, round2 } from './math.js';
export {
  NO_HISTORY_JUSTIFICATION,
  NO_HISTORY_SCORE,
  SCORERS,
  TRANSCRIPT_DIMENSIONS,
  scoreConsistency,
  scoreDimensions,
} from './dimension-scorer.js';
export {
  BONUS_AWARD,
  CRITICAL_THRESHOLD,
  MAX_BONUSES,
  MAX_RED_FLAGS,
  RED_FLAG_PENALTY,
  computeComposite,
  criticalIssues,
  detectTriggers,
  rawComposite,
  type Triggers,
} from './composite.js';
export {
  BASELINE_RECOMMENDATION,
  MAX_RECOMMENDATIONS,
  buildOneLiner,
  buildRecommendations,
  buildSummary,
  displayName,
} from './recommendations.js';
