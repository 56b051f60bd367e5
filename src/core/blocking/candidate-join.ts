import type { Stay } from '../../types/stay'
import type { ClinicalDocument } from '../../types/document'
import type { BlockingStrategy, JoinStats } from './types'
import { PatientBlockingStrategy } from './strategies/patient-blocking'

/**
 * A stay and one document that share its block key.
 */
export interface JoinedPair {
  stay: Stay
  document: ClinicalDocument
}

/**
 * Pairs every stay with the documents of its patient.
 *
 * Documents are blocked once and each stay looks up its own block. Pairs
 * come out in stay order, then document input order. Stays without a
 * matching block produce no pairs.
 */
export class CandidateJoin {
  private readonly stayStrategy: BlockingStrategy<Stay>
  private readonly documentStrategy: BlockingStrategy<ClinicalDocument>

  constructor(
    stayStrategy: BlockingStrategy<Stay> = new PatientBlockingStrategy<Stay>(),
    documentStrategy: BlockingStrategy<ClinicalDocument> = new PatientBlockingStrategy<ClinicalDocument>()
  ) {
    this.stayStrategy = stayStrategy
    this.documentStrategy = documentStrategy
  }

  join(
    stays: ReadonlyArray<Stay>,
    documents: ReadonlyArray<ClinicalDocument>
  ): JoinedPair[] {
    if (stays.length === 0 || documents.length === 0) {
      return []
    }

    const blocks = this.documentStrategy.generateBlocks(documents)
    const pairs: JoinedPair[] = []

    for (const stay of stays) {
      const key = this.stayStrategy.blockKey(stay)
      if (key === null) continue
      for (const document of blocks.get(key) ?? []) {
        pairs.push({ stay, document })
      }
    }

    return pairs
  }

  /**
   * Summarizes a join without materializing the pairs.
   */
  calculateStats(
    stays: ReadonlyArray<Stay>,
    documents: ReadonlyArray<ClinicalDocument>
  ): JoinStats {
    const blocks = this.documentStrategy.generateBlocks(documents)
    let staysWithCandidates = 0
    let totalPairs = 0
    let maxCandidatesPerStay = 0

    for (const stay of stays) {
      const key = this.stayStrategy.blockKey(stay)
      const count = key === null ? 0 : blocks.get(key)?.length ?? 0
      if (count > 0) staysWithCandidates++
      totalPairs += count
      maxCandidatesPerStay = Math.max(maxCandidatesPerStay, count)
    }

    return {
      totalStays: stays.length,
      totalDocuments: documents.length,
      totalBlocks: blocks.size,
      staysWithCandidates,
      totalPairs,
      maxCandidatesPerStay,
    }
  }
}
