/**
 * Value a criterion takes when the document lacks the columns it reads.
 */
export interface CriteriaDefaults {
  /** Used when the document carries no venue number (default: false) */
  venueMatchWhenAbsent: boolean
  /** Used when no parent timestamp is known (default: true) */
  parentTimingWhenAbsent: boolean
  /** Used when no parent timestamp is known (default: true) */
  parentFreshnessWhenAbsent: boolean
}

/**
 * Temporal windows and thresholds of the eligibility criteria.
 */
export interface CriteriaConfig {
  /** Days before discharge a validation may precede it (default: 3) */
  validationLookbackDays: number
  /** Days before admission a document may be created (default: 5) */
  creationLookbackDays: number
  /**
   * The composite holds when the number of satisfied core criteria
   * is strictly greater than this value (default: 2, i.e. all three)
   */
  compositeThreshold: number
  /** Column-absent behaviour per criterion */
  defaults: CriteriaDefaults
}

/**
 * Options of the document key normalizer.
 */
export interface KeyNormalizerOptions {
  /** Phrases removed in addition to the built-in boilerplate (e.g. the institution name) */
  extraBoilerplate?: string[]
}

/**
 * Complete configuration of a reconciliation engine.
 */
export interface ReconciliationConfig {
  criteria: CriteriaConfig
  keyNormalizer: KeyNormalizerOptions
  /** Log a summary line per run (default: false) */
  verbose: boolean
}

/**
 * Runtime options for a single run.
 */
export interface ReconcileOptions {
  /** Attach ranked candidate pairs to the run for diagnostics (default: false) */
  includeCandidates?: boolean
}
