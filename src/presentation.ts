/**
 * Presentation
 *
 * Plain-text rendering of grids, recorded moves and solve reports.
 */

import type { ReadonlyGrid } from './types'
import type { MoveRecord } from './move-recorder'
import type { SolveResult } from './solver'

export function formatGrid(grid: ReadonlyGrid): string {
  return grid
    .map(row => row.map(v => (v === 0 ? '.' : String(v))).join(' '))
    .join('\n')
}

export function formatMove(move: MoveRecord): string {
  const { order, cell, domainSize, degree, value } = move
  return `${order}) var=(${cell.row},${cell.col}), domain=${domainSize}, degree=${degree}, value=${value}`
}

export function formatOutcome(result: SolveResult): string {
  const seconds = (result.elapsedMs / 1000).toFixed(3)
  const { assignments, backtracks } = result.stats
  return `Outcome: ${result.outcome} (${seconds}s, ${assignments} assignments, ${backtracks} backtracks)`
}

export function formatReport(result: SolveResult): string {
  const lines = [formatOutcome(result), '', 'Final:', formatGrid(result.board), '', 'First 4 assignments:']
  if (result.moves.length === 0) {
    lines.push('(none)')
  } else {
    for (const move of result.moves) lines.push(formatMove(move))
  }
  return lines.join('\n')
}
