import { describe, it, expect } from 'vitest'
import { ReconciliationExplainer } from '../../../src/core/scoring/explainer'
import type { CandidatePair, MatchResult } from '../../../src/types'

const result: MatchResult = {
  stayId: 'S1',
  patientId: '123456789',
  specialty: 'Cardiologie',
  selectedDocumentId: 'D1',
  documentFree: true,
  rawDelay: 0,
  delay: 0,
  dispatchDelay: 1,
  classification: 'on-time',
}

function candidate(overrides: Partial<CandidatePair> = {}): CandidatePair {
  return {
    stayId: 'S1',
    patientId: '123456789',
    documentId: 'D1',
    documentKey: 'CARDIOLOGIE',
    specialty: 'Cardiologie',
    venueMatch: true,
    validationWindow: true,
    parentTiming: true,
    creationLowerBound: true,
    creationDuringStay: true,
    parentFreshness: true,
    eligible: true,
    rawDelay: 0,
    closenessRank: 1,
    selectionRank: 1,
    ...overrides,
  }
}

describe('ReconciliationExplainer', () => {
  const explainer = new ReconciliationExplainer()

  it('describes the outcome and the selected document', () => {
    const lines = explainer.explain(result).split('\n')

    expect(lines).toEqual([
      'Stay S1: On Time (delay 0d, Cardiologie)',
      'Selected document: D1 (kept, dispatched after 1d)',
    ])
  })

  it('describes an unmatched stay without a document', () => {
    const text = explainer.explain({
      ...result,
      specialty: null,
      selectedDocumentId: null,
      rawDelay: null,
      delay: null,
      dispatchDelay: null,
      classification: 'unmatched',
    })

    expect(text).toBe('Stay S1: Unmatched (no delay, no specialty)\nSelected document: none')
  })

  it('flags a document held by another stay', () => {
    const text = explainer.explain({
      ...result,
      documentFree: false,
      rawDelay: null,
      delay: null,
      dispatchDelay: null,
      classification: 'unmatched',
    })

    expect(text.split('\n')[1]).toBe('Selected document: D1 (held by another stay)')
  })

  it('lists the stay candidates in selection order', () => {
    const lines = explainer
      .explain(result, [
        candidate({
          documentId: 'D2',
          documentKey: '',
          specialty: null,
          venueMatch: false,
          validationWindow: false,
          eligible: false,
          rawDelay: null,
          closenessRank: 2,
          selectionRank: 2,
        }),
        candidate(),
        candidate({ stayId: 'S2', documentId: 'D9' }),
      ])
      .split('\n')

    expect(lines.slice(2)).toEqual([
      '',
      'Candidates:',
      '→ #1 D1 "CARDIOLOGIE" -> Cardiologie',
      '    ✓ venue, ✓ validation window, ✓ parent timing, ✓ creation bound, ✓ created during stay, ✓ parent freshness',
      '    eligible: yes, raw delay: 0d, closeness rank: 1',
      '  #2 D2 (empty key) -> no specialty',
      '    ✗ venue, ✗ validation window, ✓ parent timing, ✓ creation bound, ✓ created during stay, ✓ parent freshness',
      '    eligible: no, raw delay: n/a, closeness rank: 2',
    ])
  })
})
