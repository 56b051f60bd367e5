import type { CandidatePair, ProvisionalMatch } from '../../types/match'
import type { Stay, StayId } from '../../types/stay'
import { ascending, ascendingNullsLast, compareBy, trueFirst } from './sort-keys'
import type { Comparator } from './sort-keys'

/**
 * A candidate pair before the ranking passes assign its positions.
 */
export type UnrankedCandidate = Omit<CandidatePair, 'closenessRank' | 'selectionRank'>

type RankedFields = Pick<
  CandidatePair,
  | 'specialty'
  | 'rawDelay'
  | 'documentId'
  | 'venueMatch'
  | 'parentFreshness'
  | 'eligible'
  | 'creationDuringStay'
>

const hasSpecialty = (candidate: RankedFields): boolean => candidate.specialty !== null

/**
 * Pass 1: specialty resolved, then closest validation, then document id.
 */
export const closenessOrder: Comparator<RankedFields> = compareBy<RankedFields>(
  trueFirst(hasSpecialty),
  ascendingNullsLast((candidate) => candidate.rawDelay),
  ascending((candidate) => candidate.documentId)
)

/**
 * Pass 2: specialty resolved, then the identity and timing signals, then
 * closest validation, then document id.
 */
export const selectionOrder: Comparator<RankedFields> = compareBy<RankedFields>(
  trueFirst(hasSpecialty),
  trueFirst((candidate) => candidate.venueMatch),
  trueFirst((candidate) => candidate.parentFreshness),
  trueFirst((candidate) => candidate.eligible),
  trueFirst((candidate) => candidate.creationDuringStay),
  ascendingNullsLast((candidate) => candidate.rawDelay),
  ascending((candidate) => candidate.documentId)
)

/**
 * Ranks each stay's candidates and picks the one it will claim.
 *
 * Both passes are stable sorts over fully keyed comparators, so the ranks
 * do not depend on the order candidates arrive in.
 */
export class CandidateRanker {
  /**
   * Assigns `closenessRank` and `selectionRank` (1-based, per stay).
   *
   * @returns New candidate objects grouped by stay in first-seen order,
   * each group in selection order
   */
  rank(candidates: ReadonlyArray<UnrankedCandidate>): CandidatePair[] {
    const byStay = new Map<StayId, UnrankedCandidate[]>()
    for (const candidate of candidates) {
      const group = byStay.get(candidate.stayId)
      if (group) {
        group.push(candidate)
      } else {
        byStay.set(candidate.stayId, [candidate])
      }
    }

    const ranked: CandidatePair[] = []
    for (const group of byStay.values()) {
      const closeness = new Map<UnrankedCandidate, number>()
      const byCloseness = [...group].sort(closenessOrder)
      byCloseness.forEach((candidate, index) => {
        closeness.set(candidate, index + 1)
      })

      const bySelection = [...group].sort(selectionOrder)
      bySelection.forEach((candidate, index) => {
        ranked.push({
          ...candidate,
          closenessRank: closeness.get(candidate) ?? index + 1,
          selectionRank: index + 1,
        })
      })
    }
    return ranked
  }

  /**
   * One provisional match per stay, in stay order. Stays without a
   * candidate carry null match fields.
   */
  select(
    stays: ReadonlyArray<Stay>,
    ranked: ReadonlyArray<CandidatePair>
  ): ProvisionalMatch[] {
    const winners = new Map<StayId, CandidatePair>()
    for (const candidate of ranked) {
      if (candidate.selectionRank === 1) {
        winners.set(candidate.stayId, candidate)
      }
    }

    return stays.map((stay) => {
      const winner = winners.get(stay.stayId)
      return {
        stayId: stay.stayId,
        patientId: stay.patientId,
        specialty: winner?.specialty ?? null,
        selectedDocumentId: winner?.documentId ?? null,
        rawDelay: winner?.rawDelay ?? null,
        documentFree: true,
      }
    })
  }
}
