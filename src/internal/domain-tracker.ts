/**
 * Domain Tracker
 *
 * Legal values per empty cell, kept equal to peer exclusion over the live board.
 * Two strategies share one contract:
 *   - scanning: recompute from the 20 peers on every query
 *   - counting: per (row, digit), (col, digit) and (box, digit) counts updated on place/clear
 */

import type { Cell, CellValue, Digit } from '../types'
import { DIGITS } from '../types'
import { SIZE, boxOf, cellIndex, peersOf } from '../grid'

export type DomainStrategy = 'counting' | 'scanning'

export const DOMAIN_STRATEGIES: readonly DomainStrategy[] = ['counting', 'scanning']

export type DomainTracker = {
  readonly strategy: DomainStrategy
  /** Ascending legal values; empty for a filled cell */
  domain(cell: Cell): Digit[]
  domainSize(cell: Cell): number
  allows(cell: Cell, value: Digit): boolean
  /** Called after `value` is written into `cell` */
  place(cell: Cell, value: Digit): void
  /** Called after `value` is removed from `cell` */
  clear(cell: Cell, value: Digit): void
}

/**
 * @param cells live row-major storage owned by the board; read, never written
 */
export function createDomainTracker(cells: readonly CellValue[], strategy: DomainStrategy): DomainTracker {
  return strategy === 'scanning'
    ? createScanningTracker(cells)
    : createCountingTracker(cells)
}

// ============================================================================
// Scanning
// ============================================================================

function createScanningTracker(cells: readonly CellValue[]): DomainTracker {
  function peerHolds(cell: Cell, value: Digit): boolean {
    return peersOf(cell).some(peer => cells[cellIndex(peer)] === value)
  }

  function allows(cell: Cell, value: Digit): boolean {
    return cells[cellIndex(cell)] === 0 && !peerHolds(cell, value)
  }

  function domain(cell: Cell): Digit[] {
    if (cells[cellIndex(cell)] !== 0) return []
    const used = new Set<CellValue>()
    for (const peer of peersOf(cell)) used.add(cells[cellIndex(peer)])
    return DIGITS.filter(d => !used.has(d))
  }

  return {
    strategy: 'scanning',
    domain,
    domainSize: (cell) => domain(cell).length,
    allows,
    place: () => {},
    clear: () => {},
  }
}

// ============================================================================
// Counting
// ============================================================================

// Slot layout: unit * 10 + digit, digit 0 unused
const SLOTS = SIZE * 10

function createCountingTracker(cells: readonly CellValue[]): DomainTracker {
  const rowCounts = new Array<number>(SLOTS).fill(0)
  const colCounts = new Array<number>(SLOTS).fill(0)
  const boxCounts = new Array<number>(SLOTS).fill(0)

  function adjust(cell: Cell, value: Digit, delta: number): void {
    rowCounts[cell.row * 10 + value] += delta
    colCounts[cell.col * 10 + value] += delta
    boxCounts[boxOf(cell) * 10 + value] += delta
  }

  for (let i = 0; i < cells.length; i++) {
    const value = cells[i]
    if (value !== 0) adjust({ row: Math.floor(i / SIZE), col: i % SIZE }, value, 1)
  }

  function allows(cell: Cell, value: Digit): boolean {
    return cells[cellIndex(cell)] === 0
      && rowCounts[cell.row * 10 + value] === 0
      && colCounts[cell.col * 10 + value] === 0
      && boxCounts[boxOf(cell) * 10 + value] === 0
  }

  function domain(cell: Cell): Digit[] {
    return DIGITS.filter(d => allows(cell, d))
  }

  return {
    strategy: 'counting',
    domain,
    domainSize: (cell) => domain(cell).length,
    allows,
    place: (cell, value) => adjust(cell, value, 1),
    clear: (cell, value) => adjust(cell, value, -1),
  }
}
