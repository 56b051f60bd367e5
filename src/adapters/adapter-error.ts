import { DischargeMatchError } from '../utils/errors'

/**
 * Base error class for all source-related errors.
 * Extends the library error with source-specific codes.
 */
export class AdapterError extends DischargeMatchError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'AdapterError'

    Object.setPrototypeOf(this, AdapterError.prototype)
  }
}

/**
 * Error thrown when the database cannot be reached.
 *
 * @example
 * ```typescript
 * throw new ConnectionError(
 *   'Failed to connect to database',
 *   { host: 'localhost', port: 5432 }
 * )
 * ```
 */
export class ConnectionError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', context)
    this.name = 'ConnectionError'
    Object.setPrototypeOf(this, ConnectionError.prototype)
  }
}

/**
 * Error thrown when a source query fails.
 *
 * @example
 * ```typescript
 * throw new QueryError(
 *   'Failed to fetch stays',
 *   { table: 'hospital_stays', scope: 'period' }
 * )
 * ```
 */
export class QueryError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'QUERY_ERROR', context)
    this.name = 'QueryError'
    Object.setPrototypeOf(this, QueryError.prototype)
  }
}

/**
 * Error thrown when a source is asked for an invalid scope or built with an
 * invalid configuration.
 *
 * @example
 * ```typescript
 * throw new ValidationError(
 *   'Period start must not be after its end',
 *   { start: '2025-04-01', end: '2025-03-01' }
 * )
 * ```
 */
export class ValidationError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}
