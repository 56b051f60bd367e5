/**
 * Quality-indicator aggregation over per-stay results
 * @module reporting/aggregator
 */

import type { MatchResult } from '../types/match'
import type {
  AggregateOptions,
  ClassificationFigures,
  ReconciliationStats,
  SpecialtyFigures,
} from './types'
import { requireNonNegativeInteger } from '../utils/errors'

/**
 * StatsAggregator class for calculating reporting figures
 */
export class StatsAggregator {
  /**
   * Global figures plus one row per resolved specialty.
   * Specialty rows are ordered by total descending, then by name.
   */
  static aggregate(
    results: ReadonlyArray<MatchResult>,
    options: AggregateOptions = {}
  ): ReconciliationStats {
    const precision = requireNonNegativeInteger(options.precision ?? 1, 'precision')

    const bySpecialty: SpecialtyFigures[] = []
    for (const [specialty, group] of this.groupBySpecialty(results)) {
      bySpecialty.push({ specialty, ...this.summarize(group, precision) })
    }
    bySpecialty.sort((a, b) => {
      if (a.total !== b.total) return b.total - a.total
      if (a.specialty < b.specialty) return -1
      if (a.specialty > b.specialty) return 1
      return 0
    })

    return {
      global: this.summarize(results, precision),
      bySpecialty,
    }
  }

  /**
   * Figures over one set of results
   */
  static summarize(
    results: ReadonlyArray<MatchResult>,
    precision = 1
  ): ClassificationFigures {
    const total = results.length
    let onTime = 0
    let late = 0
    let unmatched = 0
    let delaySum = 0
    let dispatched = 0
    let dispatchedSameDay = 0
    let dispatchSum = 0

    for (const result of results) {
      switch (result.classification) {
        case 'on-time':
          onTime++
          break
        case 'late':
          late++
          break
        case 'unmatched':
          unmatched++
          continue
      }

      delaySum += result.delay ?? 0
      if (result.dispatchDelay !== null) {
        dispatched++
        dispatchSum += result.dispatchDelay
        if (result.dispatchDelay === 0) dispatchedSameDay++
      }
    }

    const matched = onTime + late

    return {
      total,
      onTime,
      late,
      unmatched,
      matched,
      onTimePct: this.percentage(onTime, total, precision),
      latePct: this.percentage(late, total, precision),
      unmatchedPct: this.percentage(unmatched, total, precision),
      matchedPct: this.percentage(matched, total, precision),
      meanDelay: this.mean(delaySum, matched, precision),
      dispatched,
      dispatchedPct: this.percentage(dispatched, matched, precision),
      dispatchedSameDay,
      meanDispatchDelay: this.mean(dispatchSum, dispatched, precision),
    }
  }

  /**
   * Group results by resolved specialty, in first-seen order
   */
  static groupBySpecialty(
    results: ReadonlyArray<MatchResult>
  ): Map<string, MatchResult[]> {
    const groups = new Map<string, MatchResult[]>()
    for (const result of results) {
      if (result.specialty === null) continue
      const group = groups.get(result.specialty)
      if (group) {
        group.push(result)
      } else {
        groups.set(result.specialty, [result])
      }
    }
    return groups
  }

  static round(value: number, precision: number): number {
    const factor = 10 ** precision
    return Math.round(value * factor) / factor
  }

  private static percentage(count: number, total: number, precision: number): number {
    return total > 0 ? this.round((count / total) * 100, precision) : 0
  }

  private static mean(sum: number, count: number, precision: number): number {
    return count > 0 ? this.round(sum / count, precision) : 0
  }
}
