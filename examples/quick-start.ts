/**
 * Quick Start Example
 *
 * This example demonstrates the most basic usage of discharge-match with
 * in-memory data. It shows how to:
 * - Describe stays and clinical documents
 * - Provide the unit/label to specialty mapping
 * - Run a reconciliation for a period
 * - Read the per-stay results, the indicators and an explanation
 */

import {
  DischargeMatch,
  InMemoryDocumentSource,
  InMemorySpecialtyMappingLoader,
  InMemoryStaySource,
  ReconciliationExplainer,
} from '../src'
import type { ClinicalDocument, Stay } from '../src'

const stays: Stay[] = [
  {
    patientId: '100000001',
    stayId: 'S-1001',
    admissionTs: new Date('2025-03-04T09:00:00Z'),
    dischargeTs: new Date('2025-03-10T11:00:00Z'),
    unitCode: 'CARD',
  },
  {
    patientId: '100000002',
    stayId: 'S-1002',
    admissionTs: new Date('2025-03-06T14:00:00Z'),
    dischargeTs: new Date('2025-03-12T10:30:00Z'),
    unitCode: 'NEPH',
  },
  {
    patientId: '100000003',
    stayId: 'S-1003',
    admissionTs: new Date('2025-03-08T08:00:00Z'),
    dischargeTs: new Date('2025-03-15T16:00:00Z'),
    unitCode: 'PNEU',
  },
]

const documents: ClinicalDocument[] = [
  {
    documentId: 'D-1',
    patientId: '100000001',
    label: 'CR Lettre de liaison Cardiologie',
    createdTs: new Date('2025-03-09T15:00:00Z'),
    validatedTs: new Date('2025-03-10T17:45:00Z'),
    venueNumber: 'S-1001',
    dispatchTs: new Date('2025-03-11T08:00:00Z'),
  },
  {
    documentId: 'D-2',
    patientId: '100000002',
    label: 'Lettre de liaison Néphrologie',
    createdTs: new Date('2025-03-12T09:00:00Z'),
    validatedTs: new Date('2025-03-14T12:00:00Z'),
  },
]

async function quickStart(): Promise<void> {
  console.log('=== discharge-match: Quick Start ===\n')

  const reconciler = DischargeMatch.create()
    .staySource(new InMemoryStaySource(stays))
    .documentSource(new InMemoryDocumentSource(documents, stays))
    .specialtyMapping(
      new InMemorySpecialtyMappingLoader([
        { unitCode: 'CARD', normalizedLabel: 'CARDIOLOGIE', specialty: 'Cardiologie' },
        { unitCode: 'NEPH', normalizedLabel: 'NEPHROLOGIE', specialty: 'Néphrologie' },
      ])
    )
    .build()

  const run = await reconciler.run(
    { period: { start: new Date('2025-03-01T00:00:00Z'), end: new Date('2025-03-31T23:59:59Z') } },
    { includeCandidates: true }
  )

  console.log('Results:')
  for (const result of run.results) {
    console.log(
      `  ${result.stayId}: ${result.classification}` +
        (result.delay === null ? '' : ` (delay ${result.delay}d)`)
    )
  }
  // S-1001: on-time (delay 0d)
  // S-1002: late (delay 2d)
  // S-1003: unmatched

  console.log('\nIndicators:')
  console.log(`  Letter found:    ${run.stats.global.matchedPct}%`)
  console.log(`  Validated day 0: ${run.stats.global.onTimePct}%`)

  const explainer = new ReconciliationExplainer()
  console.log('\nExplanation for the first stay:')
  console.log(explainer.explain(run.results[0], run.candidates))

  console.log('\n=== Example Complete ===')
}

quickStart().catch(console.error)
