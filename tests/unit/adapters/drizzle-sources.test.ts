import { describe, it, expect, vi, afterEach } from 'vitest'
import { drizzle } from 'drizzle-orm/pg-proxy'
import { DrizzleDocumentSource, DrizzleStaySource } from '../../../src/adapters/drizzle'
import { QueryError, ValidationError } from '../../../src/adapters/adapter-error'
import { ReconciliationEngine } from '../../../src/core/engine'
import { UNIDENTIFIED_PATIENT_ID } from '../../../src/core/normalizers/document-key'
import { createDocument, createSpecialtyTable } from '../../fixtures/factories'

interface CapturedQuery {
  sql: string
  params: unknown[]
}

/**
 * A proxy database answering every query with the given rows.
 * Rows list column values in table definition order.
 */
function createProxyDatabase(rows: unknown[][] | Error) {
  const queries: CapturedQuery[] = []
  const db = drizzle(async (sql, params) => {
    queries.push({ sql, params })
    if (rows instanceof Error) {
      throw rows
    }
    return { rows }
  })
  return { db, queries }
}

const MARCH = {
  period: {
    start: new Date('2025-03-01T00:00:00.000Z'),
    end: new Date('2025-03-31T23:59:59.999Z'),
  },
}

describe('DrizzleStaySource', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('maps stay rows', async () => {
    const { db } = createProxyDatabase([
      ['S1', '123456789', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', ' CARD '],
    ])

    const stays = await new DrizzleStaySource(db).fetchStays(MARCH)

    expect(stays).toEqual([
      {
        stayId: 'S1',
        patientId: '123456789',
        admissionTs: new Date('2025-03-05T08:00:00.000Z'),
        dischargeTs: new Date('2025-03-10T12:00:00.000Z'),
        unitCode: 'CARD',
      },
    ])
  })

  it('filters on the discharge instant for a period', async () => {
    const { db, queries } = createProxyDatabase([])

    await new DrizzleStaySource(db).fetchStays(MARCH)

    expect(queries).toHaveLength(1)
    expect(queries[0].sql).toContain('from "hospital_stays"')
    expect(queries[0].sql).toContain('"discharge_ts"')
    expect(queries[0].params).toEqual(['2025-03-01T00:00:00.000Z', '2025-03-31T23:59:59.999Z'])
  })

  it('filters on stay ids for a stay list', async () => {
    const { db, queries } = createProxyDatabase([])

    await new DrizzleStaySource(db).fetchStays({ stayIds: ['S1', 'S2'] })

    expect(queries[0].params).toEqual(['S1', 'S2'])
  })

  it('does not query for an empty stay list', async () => {
    const { db, queries } = createProxyDatabase([])

    const stays = await new DrizzleStaySource(db).fetchStays({ stayIds: [] })

    expect(stays).toEqual([])
    expect(queries).toHaveLength(0)
  })

  it('truncates unit codes to the configured length', async () => {
    const { db } = createProxyDatabase([
      ['S1', '123456789', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', 'CARD01'],
    ])

    const [stay] = await new DrizzleStaySource(db, { unitCodeLength: 4 }).fetchStays(MARCH)

    expect(stay.unitCode).toBe('CARD')
  })

  it('rejects a non-positive unit code length', () => {
    const { db } = createProxyDatabase([])
    expect(() => new DrizzleStaySource(db, { unitCodeLength: 0 })).toThrow(ValidationError)
  })

  it('keeps stays with a malformed patient id as unidentified', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { db } = createProxyDatabase([
      ['S1', '123456789', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', 'CARD'],
      ['S2', 'TEMP-42', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', 'CARD'],
    ])

    const stays = await new DrizzleStaySource(db).fetchStays(MARCH)

    expect(stays.map((stay) => [stay.stayId, stay.patientId])).toEqual([
      ['S1', '123456789'],
      ['S2', UNIDENTIFIED_PATIENT_ID],
    ])
    expect(warn).toHaveBeenCalledWith(
      "Kept 1 hospital_stays row(s) with an invalid patient id as 'UNIDENTIFIED'."
    )
  })

  it('counts an unidentified stay as unmatched', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { db } = createProxyDatabase([
      ['S1', '123456789', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', 'CARD'],
      ['S2', '', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', 'CARD'],
    ])
    const stays = await new DrizzleStaySource(db).fetchStays(MARCH)

    const { results } = new ReconciliationEngine().reconcile(
      stays,
      [createDocument({ patientId: '123456789' })],
      createSpecialtyTable()
    )

    expect(results.map((result) => [result.stayId, result.classification])).toEqual([
      ['S1', 'on-time'],
      ['S2', 'unmatched'],
    ])
  })

  it('accepts a custom patient id pattern', async () => {
    const { db } = createProxyDatabase([
      ['S2', 'TEMP-42', '2025-03-05T08:00:00.000Z', '2025-03-10T12:00:00.000Z', 'CARD'],
    ])

    const stays = await new DrizzleStaySource(db, {
      patientIdPattern: /^TEMP-\d+$/,
    }).fetchStays(MARCH)

    expect(stays.map((stay) => stay.patientId)).toEqual(['TEMP-42'])
  })

  it('wraps driver failures', async () => {
    const { db } = createProxyDatabase(new Error('connection reset'))

    const failure = new DrizzleStaySource(db).fetchStays(MARCH)

    await expect(failure).rejects.toBeInstanceOf(QueryError)
    await expect(failure).rejects.toThrow('Failed to read hospital_stays')
  })
})

describe('DrizzleDocumentSource', () => {
  it('maps document rows, keeping absent columns as null', async () => {
    const { db } = createProxyDatabase([
      [
        'D1',
        '123456789',
        'CR Lettre de liaison Cardiologie',
        '2025-03-09T10:00:00.000Z',
        '2025-03-10T18:00:00.000Z',
        'S1',
        null,
        null,
        '2025-03-11T08:00:00.000Z',
      ],
    ])

    const documents = await new DrizzleDocumentSource(db).fetchDocuments(MARCH)

    expect(documents).toEqual([
      {
        documentId: 'D1',
        patientId: '123456789',
        label: 'CR Lettre de liaison Cardiologie',
        createdTs: new Date('2025-03-09T10:00:00.000Z'),
        validatedTs: new Date('2025-03-10T18:00:00.000Z'),
        venueNumber: 'S1',
        parentCreatedTs: null,
        parentModifiedTs: null,
        dispatchTs: new Date('2025-03-11T08:00:00.000Z'),
      },
    ])
  })

  it('filters on the validation instant for a period', async () => {
    const { db, queries } = createProxyDatabase([])

    await new DrizzleDocumentSource(db).fetchDocuments(MARCH)

    expect(queries[0].sql).toContain('from "clinical_documents"')
    expect(queries[0].sql).toContain('"validated_ts"')
    expect(queries[0].params).toEqual(['2025-03-01T00:00:00.000Z', '2025-03-31T23:59:59.999Z'])
  })

  it('selects the documents of the listed stays patients', async () => {
    const { db, queries } = createProxyDatabase([])

    await new DrizzleDocumentSource(db).fetchDocuments({ stayIds: ['S1'] })

    expect(queries).toHaveLength(1)
    expect(queries[0].sql).toContain('from "hospital_stays"')
    expect(queries[0].params).toEqual(['S1'])
  })

  it('wraps driver failures', async () => {
    const { db } = createProxyDatabase(new Error('connection reset'))

    await expect(
      new DrizzleDocumentSource(db).fetchDocuments({ stayIds: ['S1'] })
    ).rejects.toThrow('Failed to read clinical_documents')
  })
})
