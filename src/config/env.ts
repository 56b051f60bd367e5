/**
 * Environment configuration of the reconciliation scripts.
 * @module config/env
 */

import { z } from 'zod'
import type { CriteriaConfig } from '../types'
import { DEFAULT_CRITERIA_CONFIG } from '../core/criteria/criteria-evaluator'
import { ConfigurationError } from '../utils/errors'

const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value

const optionalInteger = (schema: z.ZodNumber) =>
  z.preprocess(blankAsUndefined, z.coerce.number().pipe(schema).optional())

const flag = z.preprocess(
  blankAsUndefined,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
)

export const environmentSchema = z.object({
  DATABASE_URL: z.string().url(),
  SPECIALTY_MAPPING_PATH: z.preprocess(
    blankAsUndefined,
    z.string().default('data/specialty-mapping.csv')
  ),
  SPECIALTY_MAPPING_DELIMITER: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().length(1).default(';')
  ),
  UNIT_CODE_LENGTH: optionalInteger(z.number().int().positive()),
  VALIDATION_LOOKBACK_DAYS: optionalInteger(z.number().int().nonnegative()),
  CREATION_LOOKBACK_DAYS: optionalInteger(z.number().int().nonnegative()),
  COMPOSITE_THRESHOLD: optionalInteger(z.number().int().min(0).max(2)),
  LABEL_BOILERPLATE: z.preprocess(blankAsUndefined, z.string().optional()),
  VERBOSE: flag,
})

export interface EnvironmentConfig {
  databaseUrl: string
  specialtyMappingPath: string
  specialtyMappingDelimiter: string
  unitCodeLength?: number
  criteria: Omit<CriteriaConfig, 'defaults'>
  /** Extra label phrases, from the comma-separated `LABEL_BOILERPLATE` */
  extraBoilerplate: string[]
  verbose: boolean
}

/**
 * Validates the process environment and maps it onto library settings.
 *
 * @throws {ConfigurationError} When a variable is missing or malformed
 *
 * @example
 * ```typescript
 * import 'dotenv/config'
 *
 * const config = loadEnvironmentConfig(process.env)
 * ```
 */
export function loadEnvironmentConfig(
  env: Record<string, string | undefined>
): EnvironmentConfig {
  const parsed = environmentSchema.safeParse(env)

  if (!parsed.success) {
    const [issue] = parsed.error.issues
    const field = issue ? issue.path.join('.') : undefined
    throw new ConfigurationError(
      `Invalid environment variable ${field ?? ''}: ${issue?.message ?? 'unknown error'}`.trim(),
      field,
      { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) }
    )
  }

  const values = parsed.data
  return {
    databaseUrl: values.DATABASE_URL,
    specialtyMappingPath: values.SPECIALTY_MAPPING_PATH,
    specialtyMappingDelimiter: values.SPECIALTY_MAPPING_DELIMITER,
    unitCodeLength: values.UNIT_CODE_LENGTH,
    criteria: {
      validationLookbackDays:
        values.VALIDATION_LOOKBACK_DAYS ?? DEFAULT_CRITERIA_CONFIG.validationLookbackDays,
      creationLookbackDays:
        values.CREATION_LOOKBACK_DAYS ?? DEFAULT_CRITERIA_CONFIG.creationLookbackDays,
      compositeThreshold:
        values.COMPOSITE_THRESHOLD ?? DEFAULT_CRITERIA_CONFIG.compositeThreshold,
    },
    extraBoilerplate: (values.LABEL_BOILERPLATE ?? '')
      .split(',')
      .map((phrase) => phrase.trim())
      .filter((phrase) => phrase.length > 0),
    verbose: values.VERBOSE,
  }
}
