export type { PatientId, StayId, DocumentId, Stay } from './stay'
export type { ClinicalDocument } from './document'
export type {
  StayClassification,
  CriteriaFlags,
  CandidatePair,
  ProvisionalMatch,
  MatchResult,
} from './match'
export { STAY_CLASSIFICATIONS } from './match'
export type {
  CriteriaDefaults,
  CriteriaConfig,
  KeyNormalizerOptions,
  ReconciliationConfig,
  ReconcileOptions,
} from './config'
export type { ReportingPeriod } from './period'
