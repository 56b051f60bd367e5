/**
 * Comparator building blocks for stable multi-key sorts.
 * @module core/ranking/sort-keys
 */

export type Comparator<T> = (a: T, b: T) => number

/**
 * Chains comparators: the first non-zero result decides.
 *
 * @example
 * ```typescript
 * const byPriority = compareBy<Candidate>(
 *   trueFirst((c) => c.eligible),
 *   ascendingNullsLast((c) => c.rawDelay),
 *   ascending((c) => c.documentId)
 * )
 * candidates.sort(byPriority)
 * ```
 */
export function compareBy<T>(...comparators: Comparator<T>[]): Comparator<T> {
  return (a, b) => {
    for (const comparator of comparators) {
      const result = comparator(a, b)
      if (result !== 0) return result
    }
    return 0
  }
}

/**
 * Orders records whose key is true before those whose key is false.
 */
export function trueFirst<T>(key: (value: T) => boolean): Comparator<T> {
  return (a, b) => Number(key(b)) - Number(key(a))
}

/**
 * Ascending numeric order with null (and non-finite) keys after every number.
 */
export function ascendingNullsLast<T>(
  key: (value: T) => number | null
): Comparator<T> {
  const finiteKey = (value: T): number | null => {
    const result = key(value)
    return result !== null && Number.isFinite(result) ? result : null
  }

  return (a, b) => {
    const left = finiteKey(a)
    const right = finiteKey(b)
    if (left === null) return right === null ? 0 : 1
    if (right === null) return -1
    return left - right
  }
}

/**
 * Ascending order by code unit, independent of locale.
 */
export function ascending<T>(key: (value: T) => string | number): Comparator<T> {
  return (a, b) => {
    const left = key(a)
    const right = key(b)
    if (left < right) return -1
    if (left > right) return 1
    return 0
  }
}
