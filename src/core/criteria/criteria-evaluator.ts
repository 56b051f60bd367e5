import type { Stay } from '../../types/stay'
import type { ClinicalDocument } from '../../types/document'
import type { CriteriaConfig, CriteriaDefaults } from '../../types/config'
import type { CriteriaFlags } from '../../types/match'
import {
  calendarDayDifference,
  isValidInstant,
  subtractDays,
  utcDayNumber,
} from '../../utils/dates'
import {
  requireNonNegativeInteger,
  requireNonNull,
} from '../../utils/errors'

/**
 * A pair is eligible when strictly more than this many of the three core
 * criteria hold.
 */
export const COMPOSITE_ELIGIBILITY_THRESHOLD = 2

export const DEFAULT_CRITERIA_DEFAULTS: Readonly<CriteriaDefaults> = Object.freeze({
  venueMatchWhenAbsent: false,
  parentTimingWhenAbsent: true,
  parentFreshnessWhenAbsent: true,
})

export const DEFAULT_CRITERIA_CONFIG: Readonly<CriteriaConfig> = Object.freeze({
  validationLookbackDays: 3,
  creationLookbackDays: 5,
  compositeThreshold: COMPOSITE_ELIGIBILITY_THRESHOLD,
  defaults: DEFAULT_CRITERIA_DEFAULTS,
})

/**
 * Outcome of evaluating one stay against one document.
 */
export interface CriteriaAssessment {
  flags: CriteriaFlags
  eligible: boolean
  rawDelay: number | null
}

function presentInstants(...values: Array<Date | null | undefined>): Date[] {
  return values.filter(isValidInstant)
}

/**
 * Evaluates the temporal and identity criteria of a stay/document pair.
 *
 * With A the admission, D the discharge, C the document creation, V its
 * validation and P/M the parent creation/modification:
 *
 * - venueMatch: the venue number is the stay id
 * - validationWindow: V ≥ A and V ≥ D − validationLookbackDays
 * - parentTiming: P ≤ D or M ≤ D
 * - creationLowerBound: C ≥ A − creationLookbackDays
 * - creationDuringStay: A ≤ C ≤ D
 * - parentFreshness: P ≥ A − creationLookbackDays or M ≥ A − creationLookbackDays
 *
 * The upper bounds against D compare UTC calendar days, so anything written
 * later on the discharge day still counts. The other bounds compare instants.
 *
 * Criteria reading optional columns fall back to {@link CriteriaDefaults}
 * when those columns are absent.
 *
 * @example
 * ```typescript
 * const evaluator = new CriteriaEvaluator()
 * const { eligible, rawDelay } = evaluator.assess(stay, document)
 * ```
 */
export class CriteriaEvaluator {
  private readonly config: CriteriaConfig

  constructor(config: CriteriaConfig = DEFAULT_CRITERIA_CONFIG) {
    requireNonNull(config, 'config')
    requireNonNegativeInteger(config.validationLookbackDays, 'validationLookbackDays')
    requireNonNegativeInteger(config.creationLookbackDays, 'creationLookbackDays')
    requireNonNegativeInteger(config.compositeThreshold, 'compositeThreshold')
    this.config = config
  }

  evaluate(stay: Stay, document: ClinicalDocument): CriteriaFlags {
    const { defaults } = this.config
    const admission = stay.admissionTs
    const discharge = stay.dischargeTs
    const created = document.createdTs
    const validated = isValidInstant(document.validatedTs) ? document.validatedTs : null
    const admissionLookback = subtractDays(admission, this.config.creationLookbackDays)
    const dischargeLookback = subtractDays(discharge, this.config.validationLookbackDays)
    const parents = presentInstants(document.parentCreatedTs, document.parentModifiedTs)
    const dischargeDay = utcDayNumber(discharge)

    const venueNumber = document.venueNumber
    const venueMatch =
      venueNumber == null
        ? defaults.venueMatchWhenAbsent
        : String(stay.stayId) === venueNumber.trim()

    return {
      venueMatch,
      validationWindow:
        validated !== null &&
        validated.getTime() >= admission.getTime() &&
        validated.getTime() >= dischargeLookback.getTime(),
      parentTiming:
        parents.length === 0
          ? defaults.parentTimingWhenAbsent
          : parents.some((ts) => utcDayNumber(ts) <= dischargeDay),
      creationLowerBound: created.getTime() >= admissionLookback.getTime(),
      creationDuringStay:
        created.getTime() >= admission.getTime() &&
        utcDayNumber(created) <= dischargeDay,
      parentFreshness:
        parents.length === 0
          ? defaults.parentFreshnessWhenAbsent
          : parents.some((ts) => ts.getTime() >= admissionLookback.getTime()),
    }
  }

  /**
   * Composite over validationWindow, parentTiming and creationLowerBound.
   */
  isEligible(flags: CriteriaFlags): boolean {
    const satisfied = [
      flags.validationWindow,
      flags.parentTiming,
      flags.creationLowerBound,
    ].filter(Boolean).length
    return satisfied > this.config.compositeThreshold
  }

  /**
   * Validation day minus discharge day (UTC calendar days), or null when
   * the pair is ineligible or the difference is not a finite number.
   */
  rawDelay(stay: Stay, document: ClinicalDocument, eligible: boolean): number | null {
    if (!eligible || !isValidInstant(document.validatedTs)) {
      return null
    }
    const delay = calendarDayDifference(document.validatedTs, stay.dischargeTs)
    return Number.isFinite(delay) ? delay : null
  }

  assess(stay: Stay, document: ClinicalDocument): CriteriaAssessment {
    const flags = this.evaluate(stay, document)
    const eligible = this.isEligible(flags)
    return { flags, eligible, rawDelay: this.rawDelay(stay, document, eligible) }
  }
}
