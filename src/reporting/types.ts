/**
 * Counts and rates over a set of stay results.
 * Percentages are in [0, 100]; every figure is 0 for an empty set.
 */
export interface ClassificationFigures {
  total: number
  onTime: number
  late: number
  unmatched: number
  /** Stays classified on-time or late */
  matched: number
  onTimePct: number
  latePct: number
  unmatchedPct: number
  matchedPct: number
  /** Mean final delay in days over matched stays */
  meanDelay: number
  /** Matched stays whose letter has a dispatch delay */
  dispatched: number
  /** Dispatched stays over matched stays */
  dispatchedPct: number
  /** Matched stays whose letter went out the day it was validated */
  dispatchedSameDay: number
  /** Mean dispatch delay in days over dispatched stays */
  meanDispatchDelay: number
}

export interface SpecialtyFigures extends ClassificationFigures {
  specialty: string
}

/**
 * Aggregate of a reconciliation run.
 */
export interface ReconciliationStats {
  global: ClassificationFigures
  /** Stays with a resolved specialty, largest groups first */
  bySpecialty: SpecialtyFigures[]
}

export interface AggregateOptions {
  /** Decimals kept on percentages and means (default: 1) */
  precision?: number
}
