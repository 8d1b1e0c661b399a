/**
 * Cell Selector
 *
 * Picks the next cell to branch on: fewest legal values (MRV), then most
 * empty peers (Degree), then lowest row, then lowest column.
 */

import type { Cell, Digit } from './types'
import type { Board } from './board'
import { ALL_CELLS, peersOf } from './grid'

export type Selection = {
  cell: Cell
  /** Ascending */
  domain: Digit[]
  domainSize: number
  degree: number
}

/** Number of peers that are also empty, read from the live board */
export function degreeOf(board: Board, cell: Cell): number {
  let n = 0
  for (const peer of peersOf(cell)) {
    if (board.isEmpty(peer)) n++
  }
  return n
}

function ranksBefore(a: Selection, b: Selection): boolean {
  if (a.domainSize !== b.domainSize) return a.domainSize < b.domainSize
  return a.degree > b.degree
}

/**
 * Returns null when the board has no empty cell.
 * Cells are visited in row-major order and only a strictly better rank
 * replaces the current best, which gives the positional tie-break.
 */
export function selectNext(board: Board): Selection | null {
  let best: Selection | null = null
  for (const cell of ALL_CELLS) {
    if (!board.isEmpty(cell)) continue
    const domain = board.domain(cell)
    const candidate: Selection = {
      cell,
      domain,
      domainSize: domain.length,
      degree: degreeOf(board, cell),
    }
    if (best === null || ranksBefore(candidate, best)) best = candidate
  }
  return best
}
