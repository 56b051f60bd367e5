import './basic'
import { composeNormalizers, registerNormalizer } from './registry'
import type { NormalizerFunction } from './types'
import type { KeyNormalizerOptions } from '../../types/config'

/**
 * Phrases stripped from document labels before specialty lookup.
 * Longer phrases are removed before their sub-phrases.
 */
export const DEFAULT_BOILERPLATE: readonly string[] = [
  'CR LETTRE DE LIAISON',
  'LETTRE DE LIAISON',
  'CR',
  'HDJ',
  'CS',
]

/**
 * Patient identifiers in the hospital information system are nine digits.
 */
export const DEFAULT_PATIENT_ID_PATTERN = /^\d{9}$/

/**
 * Patient id given to stays whose recorded id is missing or malformed.
 * No document carries it, so such stays stay unmatched but still count.
 */
export const UNIDENTIFIED_PATIENT_ID = 'UNIDENTIFIED'

const dropDots: NormalizerFunction = (value) =>
  value == null ? null : String(value).replace(/\./g, '')

const foldLabel = composeNormalizers('stripAccents', 'uppercase', dropDots, 'normalizeWhitespace')

const collapse = composeNormalizers('normalizeWhitespace')

const cleanUnitCode = composeNormalizers('trim', 'uppercase')

function prepareBoilerplate(phrases: readonly string[]): string[] {
  const folded = phrases
    .map((phrase) => foldLabel(phrase) ?? '')
    .filter((phrase) => phrase.length > 0)
  return Array.from(new Set(folded)).sort((a, b) => b.length - a.length || a.localeCompare(b))
}

const defaultBoilerplate = prepareBoilerplate(DEFAULT_BOILERPLATE)

function applyKeyPipeline(label: unknown, boilerplate: readonly string[]): string {
  if (label == null) return ''
  const text = String(label)
  if (text.trim().length === 0) return ''

  const key = boilerplate.reduce(
    (current, phrase) => current.split(phrase).join(''),
    foldLabel(text) ?? ''
  )
  return collapse(key) ?? ''
}

/**
 * Reduces a free-text document label to the key used by the specialty table.
 *
 * Accents are stripped, the label is uppercased, dots are dropped and
 * whitespace is collapsed. Each boilerplate phrase is then removed wherever
 * it occurs, longest first, even inside a word. Absent or blank labels give
 * the empty key.
 *
 * @example
 * ```typescript
 * normalizeDocumentKey('CR Lettre de liaison Néphrologie') // 'NEPHROLOGIE'
 * normalizeDocumentKey('Lettre de liaison HDJ Cardio.') // 'CARDIO'
 * normalizeDocumentKey('Soins critiques') // 'SOINS ITIQUES'
 * normalizeDocumentKey(null) // ''
 * ```
 */
export function normalizeDocumentKey(
  label: string | null | undefined,
  options: KeyNormalizerOptions = {}
): string {
  const extra = options.extraBoilerplate ?? []
  const boilerplate =
    extra.length === 0
      ? defaultBoilerplate
      : prepareBoilerplate([...DEFAULT_BOILERPLATE, ...extra])
  return applyKeyPipeline(label, boilerplate)
}

/**
 * Builds a document-key normalizer with the boilerplate list prepared once.
 * The engine uses this form so the list is not rebuilt per document.
 */
export function createDocumentKeyNormalizer(
  options: KeyNormalizerOptions = {}
): (label: string | null | undefined) => string {
  const extra = options.extraBoilerplate ?? []
  const boilerplate =
    extra.length === 0
      ? defaultBoilerplate
      : prepareBoilerplate([...DEFAULT_BOILERPLATE, ...extra])
  return (label) => applyKeyPipeline(label, boilerplate)
}

/**
 * Trims and uppercases a unit code. Absent codes give `''`.
 */
export function normalizeUnitCode(code: string | null | undefined): string {
  return cleanUnitCode(code) ?? ''
}

export interface PatientIdOptions {
  /** Accepted identifier shape, defaults to {@link DEFAULT_PATIENT_ID_PATTERN} */
  pattern?: RegExp
}

/**
 * Trims a patient identifier and checks it against the expected shape.
 *
 * @returns The trimmed identifier, or null when it is absent or malformed
 *
 * @example
 * ```typescript
 * normalizePatientId(' 012345678 ') // '012345678'
 * normalizePatientId('12345') // null
 * normalizePatientId('AB-1', { pattern: /^[A-Z]{2}-\d+$/ }) // 'AB-1'
 * ```
 */
export function normalizePatientId(
  id: string | number | null | undefined,
  options: PatientIdOptions = {}
): string | null {
  if (id == null) return null
  const trimmed = String(id).trim()
  if (trimmed.length === 0) return null
  const pattern = options.pattern ?? DEFAULT_PATIENT_ID_PATTERN
  return pattern.test(trimmed) ? trimmed : null
}

const documentKeyNormalizer: NormalizerFunction = (value) =>
  typeof value === 'string' ? normalizeDocumentKey(value) : null

const unitCodeNormalizer: NormalizerFunction = (value) =>
  typeof value === 'string' ? normalizeUnitCode(value) : null

const patientIdNormalizer: NormalizerFunction = (value) =>
  typeof value === 'string' || typeof value === 'number'
    ? normalizePatientId(value)
    : null

registerNormalizer('documentKey', documentKeyNormalizer)
registerNormalizer('unitCode', unitCodeNormalizer)
registerNormalizer('patientId', patientIdNormalizer)
