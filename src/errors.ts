/**
 * Consolidated error system for daywise.
 *
 * All error classes extend DaywiseError, which carries a typed error code.
 * Utility operations never throw these: they surface inside Result values.
 * Only calendar construction throws, for invalid configuration.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const DaywiseErrorCode = {
  // Configuration
  VALIDATION: 'VALIDATION',
  INVALID_LOCALE: 'INVALID_LOCALE',

  // Formatting & parsing
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_PATTERN: 'INVALID_PATTERN',
  INVALID_INSTANT: 'INVALID_INSTANT',
} as const

export type DaywiseErrorCode = (typeof DaywiseErrorCode)[keyof typeof DaywiseErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class DaywiseError extends Error {
  readonly code: DaywiseErrorCode

  constructor(code: DaywiseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DaywiseError'
    this.code = code
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends DaywiseError {
  constructor(message: string) {
    super(DaywiseErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class InvalidLocaleError extends DaywiseError {
  readonly localeIdentifier: string

  constructor(localeIdentifier: string) {
    super(DaywiseErrorCode.INVALID_LOCALE, `Unknown locale: '${localeIdentifier}'`)
    this.name = 'InvalidLocaleError'
    this.localeIdentifier = localeIdentifier
  }
}

// ============================================================================
// Formatting & Parsing Errors
// ============================================================================

export class ParseError extends DaywiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(DaywiseErrorCode.PARSE_ERROR, message, options)
    this.name = 'ParseError'
  }
}

export class InvalidPatternError extends DaywiseError {
  readonly pattern: string

  constructor(pattern: string, options?: { cause?: unknown }) {
    super(DaywiseErrorCode.INVALID_PATTERN, `Invalid format pattern: '${pattern}'`, options)
    this.name = 'InvalidPatternError'
    this.pattern = pattern
  }
}

export class InvalidInstantError extends DaywiseError {
  constructor(message: string) {
    super(DaywiseErrorCode.INVALID_INSTANT, message)
    this.name = 'InvalidInstantError'
  }
}
