/**
 * Board
 *
 * The 9×9 grid owned by one solve invocation. Mutated only through
 * assign/unassign, which keep the domain tracker in step.
 */

import type { Cell, CellValue, Digit, Grid, ReadonlyGrid } from './types'
import { isCellValue } from './types'
import { ALL_CELLS, SIZE, cellIndex, formatCell, isInBounds } from './grid'
import { ContractViolationError, InvalidPuzzleError } from './errors'
import { createDomainTracker, type DomainStrategy } from './internal/domain-tracker'

export type { DomainStrategy } from './internal/domain-tracker'

export type Board = {
  readonly strategy: DomainStrategy
  get(cell: Cell): CellValue
  isEmpty(cell: Cell): boolean
  /** Filled in the initial puzzle; never unassigned */
  isGiven(cell: Cell): boolean
  domain(cell: Cell): Digit[]
  domainSize(cell: Cell): number
  assign(cell: Cell, value: Digit): void
  unassign(cell: Cell): void
  emptyCount(): number
  snapshot(): Grid
}

function assertShape(grid: ReadonlyGrid): void {
  if (grid.length !== SIZE || grid.some(row => row.length !== SIZE)) {
    throw new InvalidPuzzleError(`Board must be ${SIZE}x${SIZE}`)
  }
  for (const row of grid) {
    for (const value of row) {
      if (!isCellValue(value)) throw new InvalidPuzzleError(`Invalid cell value: ${value}`)
    }
  }
}

export function createBoard(grid: ReadonlyGrid, strategy: DomainStrategy = 'counting'): Board {
  assertShape(grid)

  const cells: CellValue[] = grid.flatMap(row => [...row])
  const given: boolean[] = cells.map(v => v !== 0)
  let empty = cells.filter(v => v === 0).length
  const tracker = createDomainTracker(cells, strategy)

  function checkOnBoard(cell: Cell, action: string): void {
    if (!isInBounds(cell)) throw new ContractViolationError(`${action}: cell is off the board`)
  }

  function get(cell: Cell): CellValue {
    checkOnBoard(cell, `Cannot read ${formatCell(cell)}`)
    return cells[cellIndex(cell)]
  }

  function assign(cell: Cell, value: Digit): void {
    checkOnBoard(cell, `Cannot assign ${value} to ${formatCell(cell)}`)
    const i = cellIndex(cell)
    if (cells[i] !== 0) {
      throw new ContractViolationError(`Cannot assign ${value} to ${formatCell(cell)}: cell holds ${cells[i]}`)
    }
    if (!tracker.allows(cell, value)) {
      throw new ContractViolationError(`Cannot assign ${value} to ${formatCell(cell)}: value not in domain`)
    }
    cells[i] = value
    empty--
    tracker.place(cell, value)
  }

  function unassign(cell: Cell): void {
    checkOnBoard(cell, `Cannot unassign ${formatCell(cell)}`)
    const i = cellIndex(cell)
    const value = cells[i]
    if (value === 0) {
      throw new ContractViolationError(`Cannot unassign ${formatCell(cell)}: cell is empty`)
    }
    if (given[i]) {
      throw new ContractViolationError(`Cannot unassign ${formatCell(cell)}: cell is a given`)
    }
    cells[i] = 0
    empty++
    tracker.clear(cell, value)
  }

  function snapshot(): Grid {
    const out: Grid = []
    for (let r = 0; r < SIZE; r++) out.push(cells.slice(r * SIZE, (r + 1) * SIZE))
    return out
  }

  return {
    strategy,
    get,
    isEmpty: (cell) => get(cell) === 0,
    isGiven: (cell) => given[cellIndex(cell)],
    domain: (cell) => tracker.domain(cell),
    domainSize: (cell) => tracker.domainSize(cell),
    assign,
    unassign,
    emptyCount: () => empty,
    snapshot,
  }
}

/** Row-major list of currently empty cells */
export function emptyCells(board: Board): Cell[] {
  return ALL_CELLS.filter(cell => board.isEmpty(cell))
}
