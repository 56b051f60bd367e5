import type { NormalizerFunction } from './types'

/**
 * Central registry of normalizer functions.
 * Maps normalizer names to their implementation functions.
 */
const normalizerRegistry = new Map<string, NormalizerFunction>()

/**
 * Registers a normalizer function with a given name.
 * If a normalizer with the same name already exists, it will be overwritten
 * and a warning will be logged.
 *
 * @param name - Unique identifier for the normalizer
 * @param fn - The normalizer function to register
 *
 * @example
 * ```typescript
 * registerNormalizer('siteLabel', (value) => {
 *   if (value == null) return null
 *   return String(value).replace(/^SITE\s+/i, '')
 * })
 * ```
 */
export function registerNormalizer(
  name: string,
  fn: NormalizerFunction
): void {
  if (normalizerRegistry.has(name)) {
    console.warn(
      `Normalizer '${name}' is already registered. Overwriting with new implementation.`
    )
  }
  normalizerRegistry.set(name, fn)
}

/**
 * Retrieves a registered normalizer function by name.
 *
 * @returns The normalizer function, or undefined if not found
 */
export function getNormalizer(name: string): NormalizerFunction | undefined {
  return normalizerRegistry.get(name)
}

/**
 * Lists all registered normalizer names.
 */
export function listNormalizers(): string[] {
  return Array.from(normalizerRegistry.keys())
}

/**
 * Applies a named normalizer to a value.
 * Falls back to the stringified original when the normalizer is unknown,
 * returns null, or throws; each fallback is logged.
 *
 * @example
 * ```typescript
 * applyNormalizer('  cardio  ', 'trim') // 'cardio'
 * ```
 */
export function applyNormalizer(value: unknown, normalizerName: string): string {
  const fallback = value == null ? '' : String(value)
  const normalizer = getNormalizer(normalizerName)

  if (!normalizer) {
    console.warn(`Normalizer '${normalizerName}' not found. Using original value.`)
    return fallback
  }

  try {
    const result = normalizer(value)
    return result !== null ? result : fallback
  } catch (error) {
    console.warn(
      `Normalizer '${normalizerName}' failed:`,
      error instanceof Error ? error.message : error
    )
    return fallback
  }
}

/**
 * Composes multiple normalizers into a single function that applies them in sequence.
 * Each normalizer receives the output of the previous one; a null result
 * short-circuits the chain.
 *
 * @example
 * ```typescript
 * const clean = composeNormalizers('trim', 'uppercase')
 * clean('  cardio  ') // 'CARDIO'
 * ```
 */
export function composeNormalizers(
  ...normalizers: (string | NormalizerFunction)[]
): NormalizerFunction {
  return (value: unknown) => {
    let result: string | null = value == null ? null : String(value)

    for (const normalizer of normalizers) {
      if (result === null) {
        return null
      }

      result =
        typeof normalizer === 'string'
          ? applyNormalizer(result, normalizer)
          : normalizer(result)
    }

    return result
  }
}

/**
 * Clears all registered normalizers.
 * Primarily useful for testing.
 *
 * @internal
 */
export function clearNormalizers(): void {
  normalizerRegistry.clear()
}
