// Main entry point
export { DischargeMatch, ReconcilerBuilder } from './builder/reconciler-builder'
export { CriteriaBuilder } from './builder/criteria-builder'

// Core classes
export { Reconciler } from './core/reconciler'
export type {
  ReconciliationRun,
  ReconcilerDependencies,
  ReconcilerRunOptions,
  SpecialtyTableStatus,
} from './core/reconciler'
export { ReconciliationEngine, DEFAULT_RECONCILIATION_CONFIG } from './core/engine'
export type { ReconciliationOutcome } from './core/engine'
export { validateStays, validateDocuments } from './core/validation'

// Types
export type {
  PatientId,
  StayId,
  DocumentId,
  Stay,
  ClinicalDocument,
  StayClassification,
  CriteriaFlags,
  CandidatePair,
  ProvisionalMatch,
  MatchResult,
  CriteriaDefaults,
  CriteriaConfig,
  KeyNormalizerOptions,
  ReconciliationConfig,
  ReconcileOptions,
  ReportingPeriod,
} from './types'
export { STAY_CLASSIFICATIONS } from './types'

// Normalizers
export {
  registerNormalizer,
  getNormalizer,
  listNormalizers,
  applyNormalizer,
  composeNormalizers,
} from './core/normalizers/registry'
export type { NormalizerFunction } from './core/normalizers/types'
export {
  trim,
  uppercase,
  stripAccents,
  normalizeWhitespace,
} from './core/normalizers/basic'
export {
  normalizeDocumentKey,
  createDocumentKeyNormalizer,
  normalizeUnitCode,
  normalizePatientId,
  DEFAULT_BOILERPLATE,
  DEFAULT_PATIENT_ID_PATTERN,
  UNIDENTIFIED_PATIENT_ID,
} from './core/normalizers/document-key'
export type { PatientIdOptions } from './core/normalizers/document-key'

// Specialty resolution
export {
  SpecialtyTable,
  InMemorySpecialtyMappingLoader,
  CsvSpecialtyMappingLoader,
  parseSpecialtyMapping,
  SPECIALTY_MAPPING_COLUMNS,
} from './core/specialty'
export type {
  SpecialtyMappingRow,
  SpecialtyMappingLoader,
  CsvSpecialtyMappingLoaderOptions,
} from './core/specialty'

// Pipeline stages
export { CandidateJoin, PatientBlockingStrategy } from './core/blocking'
export type {
  BlockKey,
  BlockSet,
  BlockingStrategy,
  JoinStats,
  JoinedPair,
} from './core/blocking'
export {
  CriteriaEvaluator,
  COMPOSITE_ELIGIBILITY_THRESHOLD,
  DEFAULT_CRITERIA_CONFIG,
  DEFAULT_CRITERIA_DEFAULTS,
} from './core/criteria'
export type { CriteriaAssessment } from './core/criteria'
export {
  CandidateRanker,
  closenessOrder,
  selectionOrder,
  compareBy,
  trueFirst,
  ascendingNullsLast,
  ascending,
} from './core/ranking'
export type { UnrankedCandidate, Comparator } from './core/ranking'
export { ConflictResolver, claimantOrder } from './core/conflict'
export type { ConflictSummary } from './core/conflict'
export { OutcomeClassifier, ReconciliationExplainer } from './core/scoring'

// Reporting
export { StatsAggregator } from './reporting'
export type {
  AggregateOptions,
  ClassificationFigures,
  ReconciliationStats,
  SpecialtyFigures,
} from './reporting'

// Sources
export {
  AdapterError,
  ConnectionError,
  QueryError,
  ValidationError,
  BaseSource,
  isPeriodScope,
  InMemoryStaySource,
  InMemoryDocumentSource,
} from './adapters'
export type { SourceScope, StaySource, DocumentSource } from './adapters'

// Configuration
export { loadEnvironmentConfig, environmentSchema } from './config'
export type { EnvironmentConfig } from './config'

// Utilities
export {
  calendarDayDifference,
  previousMonthPeriod,
  isValidInstant,
  subtractDays,
  utcDayNumber,
  MS_PER_DAY,
} from './utils/dates'

// Errors
export {
  DischargeMatchError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  MissingColumnError,
  InvalidRecordError,
  NotConfiguredError,
  isDischargeMatchError,
} from './utils/errors'
