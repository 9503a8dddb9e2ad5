/**
 * Central error classes and validation utilities for the ODS engine
 * @module utils/errors
 */

/**
 * Base error class for all ODS errors
 */
export class OdsError extends Error {
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
    this.name = 'OdsError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error raised when an instance name is not in the registry
 */
export class InstanceNotFoundError extends OdsError {
  public readonly instanceName: string

  constructor(instanceName: string, context?: Record<string, unknown>) {
    super(
      `ODS instance '${instanceName}' does not exist`,
      'INSTANCE_NOT_FOUND',
      { instanceName, ...context }
    )
    this.name = 'InstanceNotFoundError'
    this.instanceName = instanceName
  }
}

/**
 * Error raised when an entry index is outside an instance
 */
export class EntryIndexError extends OdsError {
  public readonly index: number
  public readonly length: number

  constructor(index: number, length: number, context?: Record<string, unknown>) {
    super(
      `Entry ${index} is out of range (instance holds ${length} records)`,
      'ENTRY_INDEX_OUT_OF_RANGE',
      { index, length, ...context }
    )
    this.name = 'EntryIndexError'
    this.index = index
    this.length = length
  }
}

/**
 * Error raised when a value cannot be read as a date
 */
export class DateParseError extends OdsError {
  public readonly value: unknown

  constructor(value: unknown, context?: Record<string, unknown>) {
    super(`Cannot interpret '${String(value)}' as a date`, 'DATE_PARSE_ERROR', {
      value,
      ...context,
    })
    this.name = 'DateParseError'
    this.value = value
  }
}

/**
 * Error raised when coverage cannot be computed
 */
export class CoverageError extends OdsError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Cannot compute coverage: ${reason}`, 'COVERAGE_ERROR', {
      reason,
      ...context,
    })
    this.name = 'CoverageError'
  }
}

/**
 * Error raised when an export names columns the standard does not have
 */
export class ExportColumnError extends OdsError {
  public readonly columns: string[]

  constructor(columns: string[], context?: Record<string, unknown>) {
    super(
      `Cannot export unknown column(s): ${columns.join(', ')}`,
      'EXPORT_COLUMN_ERROR',
      { columns, ...context }
    )
    this.name = 'ExportColumnError'
    this.columns = columns
  }
}

/**
 * Error raised when input has a shape that cannot be read as records
 */
export class StructuralInputError extends OdsError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Cannot interpret input: ${reason}`, 'STRUCTURAL_INPUT_ERROR', {
      reason,
      ...context,
    })
    this.name = 'StructuralInputError'
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends OdsError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends OdsError {
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

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(parameterName, value, 'must be a string')
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: T,
  allowedValues: readonly T[],
  parameterName: string
): T {
  if (!allowedValues.includes(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return value
}

/**
 * Validates that an object is a plain object (not null, not array)
 */
export function requirePlainObject(
  value: unknown,
  parameterName: string
): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a plain object'
    )
  }
  return value
}

/**
 * Type guard for non-null, non-array objects
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if an error is an ODS error
 */
export function isOdsError(error: unknown): error is OdsError {
  return error instanceof OdsError
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
