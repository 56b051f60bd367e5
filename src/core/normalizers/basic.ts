import { registerNormalizer } from './registry'
import type { NormalizerFunction } from './types'

/**
 * Trims whitespace from both ends of a string.
 *
 * @example
 * ```typescript
 * trim('  hello  ') // 'hello'
 * trim(null) // null
 * ```
 */
export const trim: NormalizerFunction = (value: unknown): string | null => {
  if (value == null) return null
  return String(value).trim()
}

/**
 * Converts a string to uppercase.
 *
 * @example
 * ```typescript
 * uppercase('Cardio') // 'CARDIO'
 * ```
 */
export const uppercase: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).toUpperCase()
}

/**
 * Removes diacritics by decomposing characters (NFD) and dropping the
 * combining marks.
 *
 * @example
 * ```typescript
 * stripAccents('Néphrologie') // 'Nephrologie'
 * stripAccents('Gériatrie à domicile') // 'Geriatrie a domicile'
 * ```
 */
export const stripAccents: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).normalize('NFD').replace(/\p{Mn}/gu, '')
}

/**
 * Collapses runs of whitespace into a single space and trims both ends.
 *
 * @example
 * ```typescript
 * normalizeWhitespace('  soins   de suite ') // 'soins de suite'
 * ```
 */
export const normalizeWhitespace: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).trim().replace(/\s+/g, ' ')
}

// Auto-register basic normalizers
registerNormalizer('trim', trim)
registerNormalizer('uppercase', uppercase)
registerNormalizer('stripAccents', stripAccents)
registerNormalizer('normalizeWhitespace', normalizeWhitespace)
