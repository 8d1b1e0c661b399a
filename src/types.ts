/**
 * Shared Types
 *
 * Cell values, coordinates and grids used across all modules.
 */

// ============================================================================
// Values
// ============================================================================

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9

/** 0 marks an empty cell */
export type CellValue = 0 | Digit

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9]

export function isDigit(n: number): n is Digit {
  return Number.isInteger(n) && n >= 1 && n <= 9
}

export function isCellValue(n: number): n is CellValue {
  return n === 0 || isDigit(n)
}

// ============================================================================
// Coordinates
// ============================================================================

/** Zero-based (row, col), row-major */
export type Cell = {
  readonly row: number
  readonly col: number
}

// ============================================================================
// Grids
// ============================================================================

/** 9 rows of 9 cell values */
export type Grid = CellValue[][]

export type ReadonlyGrid = readonly (readonly CellValue[])[]
