import { describe, it, expect } from 'vitest'
import {
  ascending,
  ascendingNullsLast,
  compareBy,
  trueFirst,
} from '../../../src/core/ranking/sort-keys'

interface Row {
  id: string
  flag: boolean
  delay: number | null
}

describe('sort keys', () => {
  it('orders true before false', () => {
    const rows: Row[] = [
      { id: 'a', flag: false, delay: null },
      { id: 'b', flag: true, delay: null },
    ]
    expect(rows.sort(trueFirst((row) => row.flag)).map((row) => row.id)).toEqual(['b', 'a'])
  })

  it('orders numbers ascending with nulls and non-finite values last', () => {
    const delays = [null, 3, Number.NaN, -1, 0]
    const sorted = [...delays].sort(ascendingNullsLast((value) => value))
    expect(sorted.slice(0, 3)).toEqual([-1, 0, 3])
    expect(sorted[3]).toBeNull()
    expect(sorted[4]).toBeNaN()
  })

  it('orders strings by code unit', () => {
    expect(['b', 'B', 'a'].sort(ascending((value) => value))).toEqual(['B', 'a', 'b'])
  })

  it('falls through to later keys on ties', () => {
    const rows: Row[] = [
      { id: 'c', flag: true, delay: 1 },
      { id: 'b', flag: true, delay: 0 },
      { id: 'a', flag: true, delay: 1 },
      { id: 'd', flag: false, delay: 0 },
    ]
    const order = compareBy<Row>(
      trueFirst((row) => row.flag),
      ascendingNullsLast((row) => row.delay),
      ascending((row) => row.id)
    )
    expect(rows.sort(order).map((row) => row.id)).toEqual(['b', 'a', 'c', 'd'])
  })
})
