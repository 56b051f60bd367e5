import { describe, it, expect } from 'vitest'
import { InMemoryDocumentSource, InMemoryStaySource } from '../../../src/adapters/memory'
import { ValidationError } from '../../../src/adapters/adapter-error'
import { at, createDocument, createStay } from '../../fixtures/factories'

const period = { start: at('2025-03-01', '00:00'), end: at('2025-03-31', '23:59') }

const stays = [
  createStay({ stayId: 'S1', dischargeTs: at('2025-03-01', '00:00') }),
  createStay({ stayId: 'S2', patientId: '987654321', dischargeTs: at('2025-03-31', '23:59') }),
  createStay({ stayId: 'S3', dischargeTs: at('2025-04-01', '00:00') }),
]

const documents = [
  createDocument({ documentId: 'D1' }),
  createDocument({ documentId: 'D2', validatedTs: null }),
  createDocument({ documentId: 'D3', patientId: '987654321', validatedTs: at('2025-04-02') }),
]

describe('InMemoryStaySource', () => {
  const source = new InMemoryStaySource(stays)

  it('selects stays discharged within the period, bounds included', async () => {
    const result = await source.fetchStays({ period })
    expect(result.map((stay) => stay.stayId)).toEqual(['S1', 'S2'])
  })

  it('selects stays by id', async () => {
    const result = await source.fetchStays({ stayIds: ['S3', 'S9'] })
    expect(result.map((stay) => stay.stayId)).toEqual(['S3'])
  })

  it('rejects an inverted period', async () => {
    await expect(
      source.fetchStays({ period: { start: period.end, end: period.start } })
    ).rejects.toThrow('Period start must not be after its end')
  })

  it('rejects invalid period bounds', async () => {
    await expect(
      source.fetchStays({ period: { start: new Date('invalid'), end: period.end } })
    ).rejects.toThrow(ValidationError)
  })

  it('rejects blank stay ids', async () => {
    await expect(source.fetchStays({ stayIds: ['S1', ' '] })).rejects.toThrow(
      'stayIds must not contain blank ids'
    )
  })
})

describe('InMemoryDocumentSource', () => {
  it('selects documents validated within the period', async () => {
    const source = new InMemoryDocumentSource(documents)

    const result = await source.fetchDocuments({ period })

    expect(result.map((document) => document.documentId)).toEqual(['D1'])
  })

  it('selects the documents of the listed stays patients', async () => {
    const source = new InMemoryDocumentSource(documents, stays)

    const result = await source.fetchDocuments({ stayIds: ['S2'] })

    expect(result.map((document) => document.documentId)).toEqual(['D3'])
  })

  it('serves every document for a stay list when stays are unknown', async () => {
    const source = new InMemoryDocumentSource(documents)

    const result = await source.fetchDocuments({ stayIds: ['S2'] })

    expect(result).toHaveLength(3)
    expect(result).not.toBe(documents)
  })
})
