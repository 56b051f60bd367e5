import type { DocumentId, PatientId, StayId } from './stay'

/**
 * Three-state outcome assigned to every stay.
 *
 * - `on-time`: a letter was validated no later than the discharge day
 * - `late`: a letter was validated one or more days after discharge
 * - `unmatched`: no free eligible letter, or no specialty could be resolved
 */
export type StayClassification = 'on-time' | 'late' | 'unmatched'

export const STAY_CLASSIFICATIONS: readonly StayClassification[] = [
  'on-time',
  'late',
  'unmatched',
] as const

/**
 * The six eligibility signals computed for a candidate pair.
 */
export interface CriteriaFlags {
  /** The document quotes the stay's id as its venue number */
  venueMatch: boolean
  /** Validated on/after admission and on/after the discharge lookback */
  validationWindow: boolean
  /** Parent document created or modified on/before the discharge day */
  parentTiming: boolean
  /** Created on/after the admission lookback */
  creationLowerBound: boolean
  /** Created from admission through the end of the discharge day */
  creationDuringStay: boolean
  /** Parent document created or modified on/after the admission lookback */
  parentFreshness: boolean
}

/**
 * A stay paired with one document of the same patient, decorated with
 * everything the ranking needs. Created and discarded within a run.
 */
export interface CandidatePair extends CriteriaFlags {
  stayId: StayId
  patientId: PatientId
  documentId: DocumentId
  /** Normalized document label used for the specialty lookup */
  documentKey: string
  /** Specialty resolved from (unit code, document key), or null */
  specialty: string | null
  /** Composite eligibility over validationWindow, parentTiming and creationLowerBound */
  eligible: boolean
  /** Validation day minus discharge day, only for eligible pairs */
  rawDelay: number | null
  /** Position after the closeness pass (1-based) */
  closenessRank: number
  /** Position after the selection pass (1-based) */
  selectionRank: number
}

/**
 * A stay's provisional match before conflict resolution, or its final
 * match state after it.
 */
export interface ProvisionalMatch {
  stayId: StayId
  patientId: PatientId
  specialty: string | null
  selectedDocumentId: DocumentId | null
  rawDelay: number | null
  /** False when another stay kept the document during conflict resolution */
  documentFree: boolean
}

/**
 * Final per-stay output of a reconciliation run.
 */
export interface MatchResult {
  stayId: StayId
  patientId: PatientId
  specialty: string | null
  selectedDocumentId: DocumentId | null
  documentFree: boolean
  /** Raw delay after conflict resolution (null for demoted claimants) */
  rawDelay: number | null
  /** Clamped delay in days, null when unmatched */
  delay: number | null
  /** Days between validation and dispatch of the selected letter */
  dispatchDelay: number | null
  classification: StayClassification
}
