import type { ProvisionalMatch } from '../../types/match'
import type { DocumentId } from '../../types/stay'
import { ascending, ascendingNullsLast, compareBy } from '../ranking/sort-keys'
import type { Comparator } from '../ranking/sort-keys'

/**
 * Order in which claimants of one document are served: smallest raw delay
 * first (null last), then lowest stay id.
 */
export const claimantOrder: Comparator<ProvisionalMatch> = compareBy<ProvisionalMatch>(
  ascendingNullsLast((match) => match.rawDelay),
  ascending((match) => match.stayId)
)

/**
 * Summary of the claims settled by a resolution pass.
 */
export interface ConflictSummary {
  /** Documents claimed by more than one stay */
  contestedDocuments: number
  /** Stays that lost their document to another claimant */
  demotedStays: number
}

/**
 * Ensures a document is held as free by at most one stay.
 *
 * Provisional matches are grouped by selected document. In a contested
 * group the first claimant in {@link claimantOrder} keeps the document;
 * every other claimant comes back as a new object that still names the
 * document but has `documentFree: false` and `rawDelay: null`. Inputs are
 * never mutated and the output keeps the input order.
 *
 * @example
 * ```typescript
 * const resolver = new ConflictResolver()
 * const settled = resolver.resolve(provisionalMatches)
 * ```
 */
export class ConflictResolver {
  resolve(matches: ReadonlyArray<ProvisionalMatch>): ProvisionalMatch[] {
    const demoted = new Set<ProvisionalMatch>()

    for (const claimants of this.groupByDocument(matches).values()) {
      if (claimants.length < 2) continue
      const [, ...losers] = [...claimants].sort(claimantOrder)
      for (const loser of losers) {
        demoted.add(loser)
      }
    }

    return matches.map((match) =>
      demoted.has(match)
        ? { ...match, rawDelay: null, documentFree: false }
        : match
    )
  }

  /**
   * Counts the contested documents and the stays that would be demoted.
   */
  summarize(matches: ReadonlyArray<ProvisionalMatch>): ConflictSummary {
    let contestedDocuments = 0
    let demotedStays = 0
    for (const claimants of this.groupByDocument(matches).values()) {
      if (claimants.length > 1) {
        contestedDocuments++
        demotedStays += claimants.length - 1
      }
    }
    return { contestedDocuments, demotedStays }
  }

  private groupByDocument(
    matches: ReadonlyArray<ProvisionalMatch>
  ): Map<DocumentId, ProvisionalMatch[]> {
    const groups = new Map<DocumentId, ProvisionalMatch[]>()
    for (const match of matches) {
      if (match.selectedDocumentId === null) continue
      const group = groups.get(match.selectedDocumentId)
      if (group) {
        group.push(match)
      } else {
        groups.set(match.selectedDocumentId, [match])
      }
    }
    return groups
  }
}
