/**
 * Day arithmetic on instants.
 * Calendar days are taken in UTC so results do not depend on the host time zone.
 * @module utils/dates
 */

import type { ReportingPeriod } from '../types/period'

export const MS_PER_DAY = 24 * 60 * 60 * 1000

/**
 * Type guard for a Date holding a real instant.
 */
export function isValidInstant(value: unknown): value is Date {
  return value instanceof Date && !isNaN(value.getTime())
}

/**
 * Returns the instant `days` whole days before `date`.
 */
export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY)
}

/**
 * Number of the UTC calendar day holding the instant (days since epoch).
 */
export function utcDayNumber(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_DAY)
}

/**
 * Whole calendar days from `from` to `to`, negative when `to` is earlier.
 *
 * @example
 * ```typescript
 * calendarDayDifference(
 *   new Date('2025-03-12T08:00:00Z'),
 *   new Date('2025-03-10T17:30:00Z')
 * ) // 2
 * ```
 */
export function calendarDayDifference(to: Date, from: Date): number {
  return utcDayNumber(to) - utcDayNumber(from)
}

/**
 * The calendar month before the one holding `today`, from its first
 * instant to its last millisecond (UTC).
 *
 * @example
 * ```typescript
 * previousMonthPeriod(new Date('2025-01-15T00:00:00Z'))
 * // { start: 2024-12-01T00:00:00.000Z, end: 2024-12-31T23:59:59.999Z }
 * ```
 */
export function previousMonthPeriod(today: Date): ReportingPeriod {
  const start = new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth() - 1, 1))
  const end = new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), 1) - 1)
  return { start, end }
}
