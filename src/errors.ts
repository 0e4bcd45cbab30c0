/**
 * Consolidated error system for tickgate.
 *
 * All error classes extend TickgateError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TickgateErrorCode = {
  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Time windows
  INVALID_WINDOW: 'INVALID_WINDOW',

  // Conditions
  INVALID_CONDITION: 'INVALID_CONDITION',
  CONDITION_EVALUATION: 'CONDITION_EVALUATION',

  // Parser registry
  CONDITION_PARSE: 'CONDITION_PARSE',

  // Gate configuration
  VALIDATION: 'VALIDATION',
} as const

export type TickgateErrorCode = (typeof TickgateErrorCode)[keyof typeof TickgateErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TickgateError extends Error {
  readonly code: TickgateErrorCode

  constructor(code: TickgateErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TickgateError'
    this.code = code
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends TickgateError {
  constructor(message: string) {
    super(TickgateErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Time Window Errors
// ============================================================================

export class InvalidWindowError extends TickgateError {
  constructor(message: string) {
    super(TickgateErrorCode.INVALID_WINDOW, message)
    this.name = 'InvalidWindowError'
  }
}

// ============================================================================
// Condition Errors
// ============================================================================

export class InvalidConditionError extends TickgateError {
  constructor(message: string) {
    super(TickgateErrorCode.INVALID_CONDITION, message)
    this.name = 'InvalidConditionError'
  }
}

/** Thrown when a condition cannot determine its truth value. */
export class ConditionEvaluationError extends TickgateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(TickgateErrorCode.CONDITION_EVALUATION, message, options)
    this.name = 'ConditionEvaluationError'
  }
}

// ============================================================================
// Parser Errors
// ============================================================================

export class ConditionParseError extends TickgateError {
  readonly input: string

  constructor(message: string, input: string) {
    super(TickgateErrorCode.CONDITION_PARSE, message)
    this.name = 'ConditionParseError'
    this.input = input
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends TickgateError {
  constructor(message: string) {
    super(TickgateErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}
