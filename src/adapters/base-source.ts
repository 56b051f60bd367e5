import type { SourceScope } from './types'
import type { ReportingPeriod } from '../types/period'
import { isValidInstant } from '../utils/dates'
import { ValidationError } from './adapter-error'

export function isPeriodScope(
  scope: SourceScope
): scope is { period: ReportingPeriod } {
  return 'period' in scope
}

/**
 * Abstract base class providing scope checks shared by the stay and
 * document sources.
 */
export abstract class BaseSource {
  /**
   * Validates a scope before it reaches the backing store.
   *
   * @throws {ValidationError} If the period is malformed or a stay id is blank
   */
  protected validateScope(scope: SourceScope): void {
    if (isPeriodScope(scope)) {
      const { start, end } = scope.period
      if (!isValidInstant(start) || !isValidInstant(end)) {
        throw new ValidationError('Period bounds must be valid dates', {
          start: String(start),
          end: String(end),
        })
      }
      if (start.getTime() > end.getTime()) {
        throw new ValidationError('Period start must not be after its end', {
          start: start.toISOString(),
          end: end.toISOString(),
        })
      }
      return
    }

    if (!Array.isArray(scope.stayIds)) {
      throw new ValidationError('stayIds must be an array')
    }
    const blank = scope.stayIds.findIndex(
      (id) => typeof id !== 'string' || id.trim().length === 0
    )
    if (blank !== -1) {
      throw new ValidationError('stayIds must not contain blank ids', { index: blank })
    }
  }

  protected withinPeriod(value: Date | null | undefined, period: ReportingPeriod): boolean {
    return (
      isValidInstant(value) &&
      value.getTime() >= period.start.getTime() &&
      value.getTime() <= period.end.getTime()
    )
  }
}
