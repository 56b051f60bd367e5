import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  ConflictResolver,
  DischargeMatch,
  InMemoryDocumentSource,
  InMemorySpecialtyMappingLoader,
  InMemoryStaySource,
  OutcomeClassifier,
  ReconciliationExplainer,
} from '../../src'
import type { ClinicalDocument, ProvisionalMatch, Stay, SpecialtyMappingLoader } from '../../src'
import { MAPPING_ROWS, PATIENT_ID, at, createDocument, createStay } from '../fixtures/factories'

/**
 * End-to-end runs through the public API, from sources to aggregated figures.
 */
function buildReconciler(
  stays: Stay[],
  documents: ClinicalDocument[],
  loader: SpecialtyMappingLoader = new InMemorySpecialtyMappingLoader(MAPPING_ROWS)
) {
  return DischargeMatch.create()
    .sources({
      staySource: new InMemoryStaySource(stays),
      documentSource: new InMemoryDocumentSource(documents, stays),
      specialtyLoader: loader,
    })
    .build()
}

const MARCH = {
  period: { start: at('2025-03-01', '00:00'), end: at('2025-03-31', '23:59') },
}

describe('Full Reconciliation Flow', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('classifies a letter validated on the discharge day as on-time', async () => {
    const stay = createStay({ dischargeTs: at('2025-03-10', '11:00') })
    const document = createDocument({ validatedTs: at('2025-03-10', '16:00') })

    const { results } = await buildReconciler([stay], [document]).run(MARCH)

    expect(results[0]).toMatchObject({
      selectedDocumentId: 'D1',
      specialty: 'Cardiologie',
      delay: 0,
      classification: 'on-time',
    })
  })

  it('classifies a letter validated two days after discharge as late', async () => {
    const stay = createStay({ dischargeTs: at('2025-03-10', '11:00') })
    const document = createDocument({ validatedTs: at('2025-03-12', '09:00') })

    const { results } = await buildReconciler([stay], [document]).run(MARCH)

    expect(results[0].delay).toBe(2)
    expect(results[0].classification).toBe('late')
  })

  it('leaves a stay without documents for its patient unmatched', async () => {
    const stay = createStay()
    const document = createDocument({ patientId: '987654321' })

    const { results } = await buildReconciler([stay], [document]).run(MARCH)

    expect(results[0].classification).toBe('unmatched')
    expect(results[0].selectedDocumentId).toBeNull()
  })

  it('lets the closest claimant keep a shared document', () => {
    const claims: ProvisionalMatch[] = [
      {
        stayId: 'S-0310',
        patientId: PATIENT_ID,
        specialty: 'Cardiologie',
        selectedDocumentId: 'D1',
        rawDelay: 0,
        documentFree: true,
      },
      {
        stayId: 'S-0311',
        patientId: PATIENT_ID,
        specialty: 'Cardiologie',
        selectedDocumentId: 'D1',
        rawDelay: 1,
        documentFree: true,
      },
    ]
    const classifier = new OutcomeClassifier()

    const results = new ConflictResolver()
      .resolve(claims)
      .map((match) => classifier.finalize(match))

    expect(results.map((result) => [result.stayId, result.classification])).toEqual([
      ['S-0310', 'on-time'],
      ['S-0311', 'unmatched'],
    ])
    expect(results[1].selectedDocumentId).toBe('D1')
    expect(results[1].documentFree).toBe(false)
  })

  it('completes with every stay unmatched when the mapping fails to load', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const failingLoader: SpecialtyMappingLoader = {
      async load() {
        throw new Error('mapping file unreadable')
      },
    }
    const stays = [createStay({ stayId: 'S1' }), createStay({ stayId: 'S2' })]

    const run = await buildReconciler(stays, [createDocument()], failingLoader).run(MARCH)

    expect(run.specialtyTableStatus).toBe('degraded')
    expect(run.results.map((result) => result.classification)).toEqual([
      'unmatched',
      'unmatched',
    ])
    expect(run.stats.global.unmatchedPct).toBe(100)
  })

  it('reports figures per specialty and explains each stay', async () => {
    const stays = [
      createStay({ stayId: 'S1' }),
      createStay({ stayId: 'S2', patientId: '222222222', unitCode: 'NEPH' }),
      createStay({ stayId: 'S3', patientId: '333333333', unitCode: 'NEPH' }),
    ]
    const documents = [
      createDocument({ documentId: 'D1', dispatchTs: at('2025-03-11') }),
      createDocument({
        documentId: 'D2',
        patientId: '222222222',
        label: 'Lettre de liaison Néphrologie',
        validatedTs: at('2025-03-13'),
      }),
    ]

    const run = await buildReconciler(stays, documents).run(MARCH, { includeCandidates: true })

    expect(run.stats.bySpecialty.map((row) => [row.specialty, row.onTime, row.late])).toEqual([
      ['Cardiologie', 1, 0],
      ['Néphrologie', 0, 1],
    ])
    expect(run.stats.global).toMatchObject({ total: 3, matched: 2, unmatched: 1, meanDelay: 1.5 })

    const explainer = new ReconciliationExplainer()
    const [first] = run.results
    expect(explainer.explain(first, run.candidates).split('\n').slice(0, 2)).toEqual([
      'Stay S1: On Time (delay 0d, Cardiologie)',
      'Selected document: D1 (kept, dispatched after 1d)',
    ])
  })
})
