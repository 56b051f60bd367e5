import {
  createDocumentKeyNormalizer,
  normalizeUnitCode,
} from '../normalizers/document-key'
import type { KeyNormalizerOptions } from '../../types/config'

/**
 * One row of the reference mapping: a unit code and a normalized document
 * label resolve to a specialty.
 */
export interface SpecialtyMappingRow {
  unitCode: string
  normalizedLabel: string
  specialty: string
}

/**
 * Exact-match lookup from (unit code, document key) to specialty.
 *
 * Keys of the mapping rows go through the same normalizer as document
 * labels, so a row written as `Néphrologie` resolves a document labelled
 * `CR lettre de liaison néphrologie`.
 *
 * @example
 * ```typescript
 * const table = SpecialtyTable.fromRows([
 *   { unitCode: 'UF12', normalizedLabel: 'CARDIOLOGIE', specialty: 'Cardiology' },
 * ])
 * table.resolve('uf12', 'CARDIOLOGIE') // 'Cardiology'
 * table.resolve('UF99', 'CARDIOLOGIE') // null
 * ```
 */
export class SpecialtyTable {
  private readonly entries: ReadonlyMap<string, string>

  private constructor(entries: Map<string, string>) {
    this.entries = entries
  }

  /**
   * Builds a table from mapping rows. When two rows share the same unit
   * code and key, the first one wins.
   */
  static fromRows(
    rows: readonly SpecialtyMappingRow[],
    options: KeyNormalizerOptions = {}
  ): SpecialtyTable {
    const normalizeKey = createDocumentKeyNormalizer(options)
    const entries = new Map<string, string>()

    for (const row of rows) {
      const lookupKey = SpecialtyTable.lookupKey(
        normalizeUnitCode(row.unitCode),
        normalizeKey(row.normalizedLabel)
      )
      if (!entries.has(lookupKey)) {
        entries.set(lookupKey, row.specialty)
      }
    }

    return new SpecialtyTable(entries)
  }

  /**
   * The table used when the reference mapping is unavailable.
   * Every lookup misses.
   */
  static empty(): SpecialtyTable {
    return new SpecialtyTable(new Map())
  }

  /**
   * @param unitCode - Raw or normalized unit code of the stay
   * @param documentKey - Already normalized document key
   */
  resolve(unitCode: string, documentKey: string): string | null {
    if (documentKey.length === 0) return null
    return (
      this.entries.get(
        SpecialtyTable.lookupKey(normalizeUnitCode(unitCode), documentKey)
      ) ?? null
    )
  }

  get size(): number {
    return this.entries.size
  }

  isEmpty(): boolean {
    return this.entries.size === 0
  }

  private static lookupKey(unitCode: string, documentKey: string): string {
    return `${unitCode}\u0000${documentKey}`
  }
}
