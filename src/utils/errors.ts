/**
 * Central error classes and validation utilities for discharge-match
 * @module utils/errors
 */

/**
 * Base error class for all discharge-match errors
 */
export class DischargeMatchError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'DischargeMatchError'
    this.code = code
    this.context = context

    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends DischargeMatchError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends DischargeMatchError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends DischargeMatchError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when an input table lacks a required column.
 * The shape contract with the source adapter is broken and the run aborts.
 */
export class MissingColumnError extends DischargeMatchError {
  public readonly table: 'stays' | 'documents'
  public readonly column: string
  public readonly rowIndex: number

  constructor(
    table: 'stays' | 'documents',
    column: string,
    rowIndex: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Required column '${column}' is missing or invalid in ${table} row ${rowIndex}`,
      'MISSING_COLUMN',
      { table, column, rowIndex, ...context }
    )
    this.name = 'MissingColumnError'
    this.table = table
    this.column = column
    this.rowIndex = rowIndex
  }
}

/**
 * Error thrown when a row carries all its columns but violates the input contract
 */
export class InvalidRecordError extends DischargeMatchError {
  public readonly table: 'stays' | 'documents'
  public readonly rowIndex: number
  public readonly reason: string

  constructor(
    table: 'stays' | 'documents',
    rowIndex: number,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid ${table} row ${rowIndex}: ${reason}`,
      'INVALID_RECORD',
      { table, rowIndex, reason, ...context }
    )
    this.name = 'InvalidRecordError'
    this.table = table
    this.rowIndex = rowIndex
    this.reason = reason
  }
}

/**
 * Error thrown when feature is not configured
 */
export class NotConfiguredError extends DischargeMatchError {
  public readonly feature: string

  constructor(feature: string, guidance: string, context?: Record<string, unknown>) {
    super(
      `Feature '${feature}' is not configured. ${guidance}`,
      'NOT_CONFIGURED',
      { feature, guidance, ...context }
    )
    this.name = 'NotConfiguredError'
    this.feature = feature
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

/**
 * Validates that a number is a non-negative integer (>= 0)
 */
export function requireNonNegativeInteger(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a non-negative integer'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Check if an error is a discharge-match error
 */
export function isDischargeMatchError(error: unknown): error is DischargeMatchError {
  return error instanceof DischargeMatchError
}
