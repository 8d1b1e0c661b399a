/**
 * Grid Geometry
 *
 * Pure functions over coordinates: units, peers, row-major ordering.
 * The peer table is computed once from coordinates alone and never mutated.
 */

import type { Cell, CellValue, Grid, ReadonlyGrid } from './types'

export const SIZE = 9
export const BOX_SIZE = 3
export const CELL_COUNT = SIZE * SIZE
export const PEER_COUNT = 20

// ============================================================================
// Indexing
// ============================================================================

export function cellAt(row: number, col: number): Cell {
  return { row, col }
}

/** Row-major position, 0..80 */
export function cellIndex(cell: Cell): number {
  return cell.row * SIZE + cell.col
}

export function cellFromIndex(index: number): Cell {
  return cellAt(Math.floor(index / SIZE), index % SIZE)
}

/** Box number 0..8, left to right then top to bottom */
export function boxOf(cell: Cell): number {
  return Math.floor(cell.row / BOX_SIZE) * BOX_SIZE + Math.floor(cell.col / BOX_SIZE)
}

export function isInBounds(cell: Cell): boolean {
  return Number.isInteger(cell.row) && Number.isInteger(cell.col)
    && cell.row >= 0 && cell.row < SIZE
    && cell.col >= 0 && cell.col < SIZE
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col
}

export function formatCell(cell: Cell): string {
  return `(${cell.row},${cell.col})`
}

// ============================================================================
// Units & Peers
// ============================================================================

export const ALL_CELLS: readonly Cell[] = Array.from({ length: CELL_COUNT }, (_, i) => cellFromIndex(i))

function computePeers(cell: Cell): Cell[] {
  const box = boxOf(cell)
  return ALL_CELLS.filter(other =>
    !sameCell(other, cell)
    && (other.row === cell.row || other.col === cell.col || boxOf(other) === box)
  )
}

const PEER_TABLE: readonly (readonly Cell[])[] = ALL_CELLS.map(computePeers)

/** The 20 cells sharing a row, column or box with `cell`, in row-major order */
export function peersOf(cell: Cell): readonly Cell[] {
  return PEER_TABLE[cellIndex(cell)]
}

export function rowCells(row: number): Cell[] {
  return Array.from({ length: SIZE }, (_, col) => cellAt(row, col))
}

export function colCells(col: number): Cell[] {
  return Array.from({ length: SIZE }, (_, row) => cellAt(row, col))
}

export function boxCells(box: number): Cell[] {
  return ALL_CELLS.filter(cell => boxOf(cell) === box)
}

/** All 27 rows, columns and boxes */
export function allUnits(): Cell[][] {
  const units: Cell[][] = []
  for (let i = 0; i < SIZE; i++) units.push(rowCells(i))
  for (let i = 0; i < SIZE; i++) units.push(colCells(i))
  for (let i = 0; i < SIZE; i++) units.push(boxCells(i))
  return units
}

// ============================================================================
// Whole-grid Checks
// ============================================================================

export function valueAt(grid: ReadonlyGrid, cell: Cell): CellValue {
  return grid[cell.row][cell.col]
}

export function copyGrid(grid: ReadonlyGrid): Grid {
  return grid.map(row => [...row])
}

export function emptyGrid(): Grid {
  return Array.from({ length: SIZE }, () => Array<CellValue>(SIZE).fill(0))
}

export type Conflict = {
  a: Cell
  b: Cell
  value: CellValue
}

/** Every pair of peers holding the same non-zero value, each pair reported once */
export function findConflicts(grid: ReadonlyGrid): Conflict[] {
  const conflicts: Conflict[] = []
  for (const cell of ALL_CELLS) {
    const value = valueAt(grid, cell)
    if (value === 0) continue
    for (const peer of peersOf(cell)) {
      if (cellIndex(peer) <= cellIndex(cell)) continue
      if (valueAt(grid, peer) === value) conflicts.push({ a: cell, b: peer, value })
    }
  }
  return conflicts
}

export function countEmpty(grid: ReadonlyGrid): number {
  let n = 0
  for (const cell of ALL_CELLS) {
    if (valueAt(grid, cell) === 0) n++
  }
  return n
}

/** Every row, column and box is a permutation of 1..9 */
export function isCompleteSolution(grid: ReadonlyGrid): boolean {
  return allUnits().every(unit => {
    const seen = new Set(unit.map(cell => valueAt(grid, cell)))
    return !seen.has(0) && seen.size === SIZE
  })
}
