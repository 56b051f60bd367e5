import type { Stay } from '../types/stay'
import type { ClinicalDocument } from '../types/document'
import type { ReportingPeriod } from '../types/period'

/**
 * What a run covers: every stay discharged in a period, or an explicit
 * list of stays.
 */
export type SourceScope = { period: ReportingPeriod } | { stayIds: string[] }

/**
 * Provides the stays of a scope.
 *
 * @example
 * ```typescript
 * const stays = await staySource.fetchStays({
 *   period: { start: new Date('2025-03-01'), end: new Date('2025-03-31') },
 * })
 * ```
 */
export interface StaySource {
  /**
   * Stays discharged within the period (bounds inclusive), or the listed
   * stays. Unknown stay ids are ignored.
   */
  fetchStays(scope: SourceScope): Promise<Stay[]>
}

/**
 * Provides the candidate documents of a scope.
 */
export interface DocumentSource {
  /**
   * Documents validated within the period (bounds inclusive), or the
   * documents of the patients of the listed stays.
   */
  fetchDocuments(scope: SourceScope): Promise<ClinicalDocument[]>
}
