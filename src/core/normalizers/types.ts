/**
 * Normalizer function signature.
 * Accepts a raw value and returns its canonical string form, or null when
 * the value carries nothing to normalize.
 *
 * @example
 * ```typescript
 * const trimNormalizer: NormalizerFunction = (value) => {
 *   if (value == null) return null
 *   return String(value).trim()
 * }
 * ```
 */
export type NormalizerFunction = (value: unknown) => string | null
