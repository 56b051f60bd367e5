export {
  CriteriaEvaluator,
  COMPOSITE_ELIGIBILITY_THRESHOLD,
  DEFAULT_CRITERIA_CONFIG,
  DEFAULT_CRITERIA_DEFAULTS,
} from './criteria-evaluator'
export type { CriteriaAssessment } from './criteria-evaluator'
