/**
 * Central error classes and validation utilities for login-oracle
 * @module utils/errors
 */

/**
 * Base error class for all login-oracle errors
 */
export class LoginOracleError extends Error {
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
    this.name = 'LoginOracleError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends LoginOracleError {
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
 * Error thrown when a username scheme is not recognised
 */
export class UnknownSchemeError extends LoginOracleError {
  public readonly scheme: string

  constructor(scheme: string, supported: readonly string[]) {
    super(
      `Unknown scheme '${scheme}'. Choose from ${supported.join(', ')}`,
      'UNKNOWN_SCHEME',
      { scheme, supported: [...supported] }
    )
    this.name = 'UnknownSchemeError'
    this.scheme = scheme
  }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigurationError extends LoginOracleError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a membership adapter returns counts that cannot
 * describe the query set it was given
 */
export class AdapterContractViolationError extends LoginOracleError {
  public readonly adapter: string

  constructor(adapter: string, message: string, context?: Record<string, unknown>) {
    super(
      `Adapter '${adapter}' violated the evaluation contract: ${message}`,
      'ADAPTER_CONTRACT_VIOLATION',
      { adapter, ...context }
    )
    this.name = 'AdapterContractViolationError'
    this.adapter = adapter
  }
}

/**
 * Error thrown when a membership structure does not meet the guarantee
 * declared by its kind
 */
export class InvariantViolationError extends LoginOracleError {
  public readonly kind: string
  public readonly invariant: string

  constructor(
    kind: string,
    invariant: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invariant '${invariant}' violated for kind '${kind}': ${message}`,
      'INVARIANT_VIOLATION',
      { kind, invariant, ...context }
    )
    this.name = 'InvariantViolationError'
    this.kind = kind
    this.invariant = invariant
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is a non-negative integer (>= 0)
 */
export function requireNonNegativeInteger(
  value: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (!Number.isSafeInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
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
