/**
 * Consolidated error system for calendar-periods.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they are working with.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Periods
  INVALID_BOUNDARY: 'INVALID_BOUNDARY',
  INVALID_GRANULARITY: 'INVALID_GRANULARITY',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Events
  INVALID_RANGE: 'INVALID_RANGE',

  // Configuration and lookups
  VALIDATION: 'VALIDATION',
  NOT_FOUND: 'NOT_FOUND',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Period Errors
// ============================================================================

export class InvalidBoundaryError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_BOUNDARY, message)
    this.name = 'InvalidBoundaryError'
  }
}

export class InvalidGranularityError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_GRANULARITY, message)
    this.name = 'InvalidGranularityError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Event Errors
// ============================================================================

export class InvalidRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

// ============================================================================
// Configuration & Lookup Errors
// ============================================================================

export class ValidationError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}
