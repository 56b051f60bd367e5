import type {
  CandidatePair,
  CriteriaFlags,
  MatchResult,
  StayClassification,
} from '../../types/match'

const CRITERIA_LABELS: ReadonlyArray<[keyof CriteriaFlags, string]> = [
  ['venueMatch', 'venue'],
  ['validationWindow', 'validation window'],
  ['parentTiming', 'parent timing'],
  ['creationLowerBound', 'creation bound'],
  ['creationDuringStay', 'created during stay'],
  ['parentFreshness', 'parent freshness'],
]

export class ReconciliationExplainer {
  /**
   * Generates a human-readable account of how a stay was classified.
   *
   * The explanation includes:
   * - Classification, delay and specialty
   * - The selected document and whether the stay kept it
   * - One line per candidate, in selection order, with the criteria and ranks
   *
   * @param candidates - Ranked candidates of the run; only those of the
   * result's stay are shown
   */
  explain(result: MatchResult, candidates: ReadonlyArray<CandidatePair> = []): string {
    const lines: string[] = []

    lines.push(this.formatOutcome(result))
    lines.push(this.formatSelection(result))

    const own = candidates
      .filter((candidate) => candidate.stayId === result.stayId)
      .sort((a, b) => a.selectionRank - b.selectionRank)

    if (own.length > 0) {
      lines.push('')
      lines.push('Candidates:')
      for (const candidate of own) {
        lines.push(this.formatCandidate(candidate, result))
      }
    }

    return lines.join('\n')
  }

  private formatOutcome(result: MatchResult): string {
    const label = this.getClassificationLabel(result.classification)
    const delay = result.delay === null ? 'no delay' : `delay ${result.delay}d`
    const specialty = result.specialty ?? 'no specialty'
    return `Stay ${result.stayId}: ${label} (${delay}, ${specialty})`
  }

  private formatSelection(result: MatchResult): string {
    if (result.selectedDocumentId === null) {
      return 'Selected document: none'
    }
    const status = result.documentFree ? 'kept' : 'held by another stay'
    const dispatch =
      result.dispatchDelay === null ? '' : `, dispatched after ${result.dispatchDelay}d`
    return `Selected document: ${result.selectedDocumentId} (${status}${dispatch})`
  }

  private getClassificationLabel(classification: StayClassification): string {
    switch (classification) {
      case 'on-time':
        return 'On Time'
      case 'late':
        return 'Late'
      case 'unmatched':
        return 'Unmatched'
    }
  }

  private formatCandidate(candidate: CandidatePair, result: MatchResult): string {
    const marker = candidate.documentId === result.selectedDocumentId ? '→' : ' '
    const criteria = CRITERIA_LABELS.map(
      ([field, label]) => `${candidate[field] ? '✓' : '✗'} ${label}`
    ).join(', ')
    const delay = candidate.rawDelay === null ? 'n/a' : `${candidate.rawDelay}d`
    const key = candidate.documentKey.length > 0 ? `"${candidate.documentKey}"` : '(empty key)'

    return [
      `${marker} #${candidate.selectionRank} ${candidate.documentId} ${key} -> ${candidate.specialty ?? 'no specialty'}`,
      `    ${criteria}`,
      `    eligible: ${candidate.eligible ? 'yes' : 'no'}, raw delay: ${delay}, closeness rank: ${candidate.closenessRank}`,
    ].join('\n')
  }
}
