import type { ClinicalDocument } from '../../types/document'
import type { MatchResult, ProvisionalMatch, StayClassification } from '../../types/match'
import { calendarDayDifference, isValidInstant } from '../../utils/dates'

/**
 * Turns settled matches into per-stay outcomes.
 *
 * A stay is `'on-time'` when its letter was validated no later than the
 * discharge day and `'late'` otherwise. Stays without an eligible letter or
 * a specialty are `'unmatched'`.
 *
 * @example
 * ```typescript
 * const classifier = new OutcomeClassifier()
 * classifier.classify(classifier.finalDelay(-2, 'Cardiologie')) // 'on-time'
 * classifier.classify(classifier.finalDelay(3, null)) // 'unmatched'
 * ```
 */
export class OutcomeClassifier {
  /**
   * Clamped delay of a stay.
   *
   * A stay only gets a delay when it holds an eligible document and a
   * specialty; letters validated before discharge count as 0.
   */
  finalDelay(rawDelay: number | null, specialty: string | null): number | null {
    if (rawDelay === null || !Number.isFinite(rawDelay) || specialty === null) {
      return null
    }
    return Math.max(0, rawDelay)
  }

  /**
   * Three-state classification of a final delay.
   *
   * - `'unmatched'`: no delay
   * - `'on-time'`: validated no later than the discharge day
   * - `'late'`: validated one or more days after discharge
   */
  classify(delay: number | null): StayClassification {
    if (delay === null) {
      return 'unmatched'
    }
    return delay === 0 ? 'on-time' : 'late'
  }

  /**
   * Whole days between validation and dispatch of a letter, clamped at 0.
   * Null when either timestamp is unknown.
   */
  dispatchDelay(document: ClinicalDocument | undefined): number | null {
    if (!document) return null
    const { validatedTs, dispatchTs } = document
    if (!isValidInstant(validatedTs) || !isValidInstant(dispatchTs)) {
      return null
    }
    return Math.max(0, calendarDayDifference(dispatchTs, validatedTs))
  }

  /**
   * Turns a settled provisional match into the frozen per-stay result.
   *
   * @param document - The selected document, used for the dispatch delay
   */
  finalize(match: ProvisionalMatch, document?: ClinicalDocument): MatchResult {
    const delay = this.finalDelay(match.rawDelay, match.specialty)
    const classification = this.classify(delay)

    return Object.freeze({
      stayId: match.stayId,
      patientId: match.patientId,
      specialty: match.specialty,
      selectedDocumentId: match.selectedDocumentId,
      documentFree: match.documentFree,
      rawDelay: match.rawDelay,
      delay,
      dispatchDelay: classification === 'unmatched' ? null : this.dispatchDelay(document),
      classification,
    })
  }
}
