import { describe, it, expect } from 'vitest'
import { SpecialtyTable } from '../../../src/core/specialty/specialty-table'
import { normalizeDocumentKey } from '../../../src/core/normalizers/document-key'

describe('SpecialtyTable', () => {
  describe('fromRows', () => {
    it('resolves an exact unit code and key', () => {
      const table = SpecialtyTable.fromRows([
        { unitCode: 'CARD', normalizedLabel: 'CARDIOLOGIE', specialty: 'Cardiologie' },
      ])

      expect(table.resolve('CARD', 'CARDIOLOGIE')).toBe('Cardiologie')
    })

    it('normalizes row labels with the document key normalizer', () => {
      const table = SpecialtyTable.fromRows([
        { unitCode: 'neph ', normalizedLabel: 'Lettre de liaison Néphrologie', specialty: 'Néphrologie' },
      ])

      const key = normalizeDocumentKey('CR lettre de liaison néphrologie')
      expect(key).toBe('NEPHROLOGIE')
      expect(table.resolve('NEPH', key)).toBe('Néphrologie')
    })

    it('normalizes the unit code of the lookup', () => {
      const table = SpecialtyTable.fromRows([
        { unitCode: 'CARD', normalizedLabel: 'CARDIOLOGIE', specialty: 'Cardiologie' },
      ])

      expect(table.resolve(' card ', 'CARDIOLOGIE')).toBe('Cardiologie')
    })

    it('keeps the first row of duplicate unit/key pairs', () => {
      const table = SpecialtyTable.fromRows([
        { unitCode: 'NEPH', normalizedLabel: 'NEPHROLOGIE', specialty: 'Néphrologie' },
        { unitCode: 'NEPH', normalizedLabel: 'Néphrologie', specialty: 'Dialyse' },
      ])

      expect(table.size).toBe(1)
      expect(table.resolve('NEPH', 'NEPHROLOGIE')).toBe('Néphrologie')
    })

    it('applies extra boilerplate to row labels', () => {
      const table = SpecialtyTable.fromRows(
        [{ unitCode: 'CARD', normalizedLabel: 'Hôpital Nord Cardiologie', specialty: 'Cardiologie' }],
        { extraBoilerplate: ['Hopital Nord'] }
      )

      expect(table.resolve('CARD', 'CARDIOLOGIE')).toBe('Cardiologie')
    })
  })

  describe('resolve', () => {
    const table = SpecialtyTable.fromRows([
      { unitCode: 'CARD', normalizedLabel: 'CARDIOLOGIE', specialty: 'Cardiologie' },
    ])

    it('returns null for an unknown unit', () => {
      expect(table.resolve('NEPH', 'CARDIOLOGIE')).toBeNull()
    })

    it('returns null for an unknown key', () => {
      expect(table.resolve('CARD', 'CARDIO')).toBeNull()
    })

    it('returns null for the empty key', () => {
      expect(table.resolve('CARD', '')).toBeNull()
    })
  })

  describe('empty', () => {
    it('misses every lookup', () => {
      const table = SpecialtyTable.empty()

      expect(table.isEmpty()).toBe(true)
      expect(table.size).toBe(0)
      expect(table.resolve('CARD', 'CARDIOLOGIE')).toBeNull()
    })
  })
})
