import type { CriteriaConfig, CriteriaDefaults } from '../types'
import { DEFAULT_CRITERIA_CONFIG } from '../core/criteria/criteria-evaluator'
import { ConfigurationError } from '../utils/errors'

/**
 * Builder for the eligibility criteria.
 * Used within the `.criteria()` method of the reconciler builder.
 *
 * @example
 * ```typescript
 * .criteria(criteria => criteria
 *   .validationLookbackDays(3)
 *   .creationLookbackDays(5)
 *   .compositeThreshold(2)
 *   .whenAbsent({ venueMatch: false })
 * )
 * ```
 */
export class CriteriaBuilder {
  private config: CriteriaConfig = {
    ...DEFAULT_CRITERIA_CONFIG,
    defaults: { ...DEFAULT_CRITERIA_CONFIG.defaults },
  }

  /**
   * Days before discharge a validation may still count.
   */
  validationLookbackDays(days: number): this {
    this.config.validationLookbackDays = this.requireDays(days, 'validationLookbackDays')
    return this
  }

  /**
   * Days before admission a document (or its parent) may have been created.
   */
  creationLookbackDays(days: number): this {
    this.config.creationLookbackDays = this.requireDays(days, 'creationLookbackDays')
    return this
  }

  /**
   * The composite holds when more than `threshold` of its three criteria are true.
   */
  compositeThreshold(threshold: number): this {
    if (!Number.isInteger(threshold) || threshold < 0 || threshold > 2) {
      throw new ConfigurationError(
        'compositeThreshold must be an integer between 0 and 2',
        'compositeThreshold',
        { value: threshold }
      )
    }
    this.config.compositeThreshold = threshold
    return this
  }

  /**
   * Values taken by the criteria whose columns a document does not carry.
   */
  whenAbsent(defaults: {
    venueMatch?: boolean
    parentTiming?: boolean
    parentFreshness?: boolean
  }): this {
    const next: CriteriaDefaults = { ...this.config.defaults }
    if (defaults.venueMatch !== undefined) next.venueMatchWhenAbsent = defaults.venueMatch
    if (defaults.parentTiming !== undefined) next.parentTimingWhenAbsent = defaults.parentTiming
    if (defaults.parentFreshness !== undefined) {
      next.parentFreshnessWhenAbsent = defaults.parentFreshness
    }
    this.config.defaults = next
    return this
  }

  build(): CriteriaConfig {
    return { ...this.config, defaults: { ...this.config.defaults } }
  }

  private requireDays(days: number, field: string): number {
    if (!Number.isInteger(days) || days < 0) {
      throw new ConfigurationError(`${field} must be a non-negative integer`, field, {
        value: days,
      })
    }
    return days
  }
}
