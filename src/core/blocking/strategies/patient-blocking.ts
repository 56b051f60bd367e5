import type { BlockingStrategy, BlockSet, BlockKey } from '../types'

/**
 * Records that carry a patient identifier.
 */
export interface PatientKeyed {
  patientId: string
}

/**
 * Groups records by exact patient identifier.
 *
 * Identifiers are compared as given: sources normalize them before the
 * join. Blank identifiers produce no key.
 *
 * @example
 * ```typescript
 * const strategy = new PatientBlockingStrategy<ClinicalDocument>()
 * const blocks = strategy.generateBlocks(documents)
 * blocks.get('123456789') // documents of that patient, in input order
 * ```
 */
export class PatientBlockingStrategy<T extends PatientKeyed = PatientKeyed>
  implements BlockingStrategy<T>
{
  readonly name = 'patient'

  blockKey(record: T): BlockKey | null {
    const key = record.patientId
    return key.trim().length === 0 ? null : key
  }

  generateBlocks(records: ReadonlyArray<T>): BlockSet<T> {
    const blocks: BlockSet<T> = new Map()

    for (const record of records) {
      const key = this.blockKey(record)
      if (key === null) continue

      const block = blocks.get(key)
      if (block) {
        block.push(record)
      } else {
        blocks.set(key, [record])
      }
    }

    return blocks
  }
}
