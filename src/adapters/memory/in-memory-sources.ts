import type { Stay } from '../../types/stay'
import type { ClinicalDocument } from '../../types/document'
import type { DocumentSource, SourceScope, StaySource } from '../types'
import { BaseSource, isPeriodScope } from '../base-source'

/**
 * Serves stays held in memory. Useful for tests, fixtures and callers that
 * already extracted their data.
 *
 * @example
 * ```typescript
 * const source = new InMemoryStaySource(stays)
 * const march = await source.fetchStays({ period: { start, end } })
 * ```
 */
export class InMemoryStaySource extends BaseSource implements StaySource {
  constructor(private readonly stays: ReadonlyArray<Stay>) {
    super()
  }

  async fetchStays(scope: SourceScope): Promise<Stay[]> {
    this.validateScope(scope)

    if (isPeriodScope(scope)) {
      return this.stays.filter((stay) => this.withinPeriod(stay.dischargeTs, scope.period))
    }

    const wanted = new Set(scope.stayIds)
    return this.stays.filter((stay) => wanted.has(stay.stayId))
  }
}

/**
 * Serves documents held in memory.
 *
 * A stay-list scope selects the documents of the patients of those stays,
 * which requires the stays to be known; without them every document is
 * served.
 */
export class InMemoryDocumentSource extends BaseSource implements DocumentSource {
  constructor(
    private readonly documents: ReadonlyArray<ClinicalDocument>,
    private readonly stays?: ReadonlyArray<Stay>
  ) {
    super()
  }

  async fetchDocuments(scope: SourceScope): Promise<ClinicalDocument[]> {
    this.validateScope(scope)

    if (isPeriodScope(scope)) {
      return this.documents.filter((document) =>
        this.withinPeriod(document.validatedTs, scope.period)
      )
    }

    if (!this.stays) {
      return [...this.documents]
    }

    const wanted = new Set(scope.stayIds)
    const patients = new Set(
      this.stays.filter((stay) => wanted.has(stay.stayId)).map((stay) => stay.patientId)
    )
    return this.documents.filter((document) => patients.has(document.patientId))
  }
}
