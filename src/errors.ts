/**
 * Consolidated error system for the sudoku solver.
 *
 * All error classes extend SudokuError, which carries a typed error code.
 * UNSOLVABLE and TIMED_OUT are search outcomes, not errors, and never appear here.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const SudokuErrorCode = {
  // Puzzle input
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_PUZZLE: 'INVALID_PUZZLE',

  // Solver configuration
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Internal
  CONTRACT_VIOLATION: 'CONTRACT_VIOLATION',
} as const

export type SudokuErrorCode = (typeof SudokuErrorCode)[keyof typeof SudokuErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class SudokuError extends Error {
  readonly code: SudokuErrorCode

  constructor(code: SudokuErrorCode, message: string) {
    super(message)
    this.name = 'SudokuError'
    this.code = code
  }
}

// ============================================================================
// Puzzle Input Errors
// ============================================================================

export class ParseError extends SudokuError {
  constructor(message: string) {
    super(SudokuErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidPuzzleError extends SudokuError {
  constructor(message: string) {
    super(SudokuErrorCode.INVALID_PUZZLE, message)
    this.name = 'InvalidPuzzleError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends SudokuError {
  constructor(message: string) {
    super(SudokuErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Internal Errors
// ============================================================================

/**
 * A Board precondition was broken. Only the search engine mutates the board,
 * so this always indicates a bug in the engine rather than bad input.
 */
export class ContractViolationError extends SudokuError {
  constructor(message: string) {
    super(SudokuErrorCode.CONTRACT_VIOLATION, message)
    this.name = 'ContractViolationError'
  }
}
