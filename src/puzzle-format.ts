/**
 * Puzzle Format
 *
 * Text puzzles: nine non-blank lines of nine whitespace-separated values,
 * 0 or '.' for an empty cell. Blank lines are ignored.
 *
 * Parsing returns a Result; only an unreadable file rejects.
 */

import { readFile } from 'node:fs/promises'
import type { CellValue, Grid, ReadonlyGrid } from './types'
import { isCellValue } from './types'
import { SIZE, findConflicts, formatCell } from './grid'
import { type Result, Ok, Err } from './result'
import { ParseError, InvalidPuzzleError } from './errors'

export { ParseError, InvalidPuzzleError } from './errors'

export type PuzzleError = ParseError | InvalidPuzzleError

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks shape, value range and peer conflicts. The first conflict found in
 * row-major order is reported.
 */
export function validateGrid(grid: readonly (readonly number[])[]): Result<Grid, InvalidPuzzleError> {
  if (grid.length !== SIZE) {
    return Err(new InvalidPuzzleError(`Puzzle must have ${SIZE} rows, got ${grid.length}`))
  }

  const out: Grid = []
  for (let r = 0; r < SIZE; r++) {
    const row = grid[r]
    if (row.length !== SIZE) {
      return Err(new InvalidPuzzleError(`Row ${r + 1} must have ${SIZE} values, got ${row.length}`))
    }
    const values: CellValue[] = []
    for (let c = 0; c < SIZE; c++) {
      const value = row[c]
      if (!isCellValue(value)) {
        return Err(new InvalidPuzzleError(`Invalid value ${value} at ${formatCell({ row: r, col: c })}: expected 0-9`))
      }
      values.push(value)
    }
    out.push(values)
  }

  const conflicts = findConflicts(out)
  if (conflicts.length > 0) {
    const { a, b, value } = conflicts[0]
    return Err(new InvalidPuzzleError(`Conflict: ${formatCell(a)} and ${formatCell(b)} both hold ${value}`))
  }

  return Ok(out)
}

// ============================================================================
// Parsing
// ============================================================================

function parseToken(token: string): number | null {
  if (token === '.') return 0
  if (!/^\d$/.test(token)) return null
  return parseInt(token, 10)
}

export function parsePuzzle(text: string): Result<Grid, PuzzleError> {
  const lines = text
    .split(/\r?\n/)
    .map((line, i) => ({ text: line.trim(), number: i + 1 }))
    .filter(line => line.text.length > 0)

  if (lines.length !== SIZE) {
    return Err(new ParseError(`Expected ${SIZE} non-blank lines, got ${lines.length}`))
  }

  const rows: number[][] = []
  for (const line of lines) {
    const tokens = line.text.split(/\s+/)
    if (tokens.length !== SIZE) {
      return Err(new ParseError(`Line ${line.number}: expected ${SIZE} values, got ${tokens.length}`))
    }
    const row: number[] = []
    for (let i = 0; i < tokens.length; i++) {
      const value = parseToken(tokens[i])
      if (value === null) {
        return Err(new ParseError(`Line ${line.number}, value ${i + 1}: invalid token '${tokens[i]}'`))
      }
      row.push(value)
    }
    rows.push(row)
  }

  return validateGrid(rows)
}

export async function loadPuzzleFile(path: string): Promise<Result<Grid, PuzzleError>> {
  const text = await readFile(path, 'utf8')
  return parsePuzzle(text)
}

/** Inverse of parsePuzzle, with 0 for empty cells */
export function serializePuzzle(grid: ReadonlyGrid): string {
  return grid.map(row => row.join(' ')).join('\n') + '\n'
}
