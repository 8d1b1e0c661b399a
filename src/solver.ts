/**
 * Search Engine
 *
 * Recursive backtracking over one mutable board: select a cell (MRV, Degree,
 * row-major), try its values in ascending order, recurse, undo on dead end.
 * The time guard is polled on every recursive entry.
 *
 * Each frame's loop over the remaining values is the undo log: a frame that
 * returns DEAD_END has unassigned everything it assigned.
 */

import type { Cell, Digit, Grid, ReadonlyGrid } from './types'
import { createBoard, type Board, type DomainStrategy } from './board'
import { selectNext } from './cell-selector'
import { createTimeGuard, validateTimeLimit, DEFAULT_TIME_LIMIT_MS, type Clock, type TimeGuard } from './time-guard'
import { createMoveRecorder, type MoveRecord, type MoveRecorder } from './move-recorder'
import { createEmitter, type Emitter } from './internal/events'
import { InvalidConfigError } from './errors'
import { DOMAIN_STRATEGIES } from './internal/domain-tracker'

// ============================================================================
// Types
// ============================================================================

export const SolveOutcome = {
  SOLVED: 'SOLVED',
  UNSOLVABLE: 'UNSOLVABLE',
  TIMED_OUT: 'TIMED_OUT',
} as const

export type SolveOutcome = (typeof SolveOutcome)[keyof typeof SolveOutcome]

/** Per-frame result. DEAD_END never leaves `solve`. */
type SearchState = 'SOLVED' | 'DEAD_END' | 'TIMED_OUT'

export type SolveStats = {
  /** Every assignment, including ones later undone */
  assignments: number
  backtracks: number
  /** Most search assignments simultaneously on the board */
  maxDepth: number
}

export type SolveResult = {
  outcome: SolveOutcome
  /** Complete when SOLVED; the partial board at the moment of return otherwise */
  board: Grid
  moves: MoveRecord[]
  elapsedMs: number
  stats: SolveStats
}

export type SolverOptions = {
  timeLimitMs?: number
  clock?: Clock
  domainStrategy?: DomainStrategy
}

export type AssignEvent = Readonly<{ order: number; depth: number; cell: Cell; value: Digit; domainSize: number; degree: number }>
export type UnassignEvent = Readonly<{ depth: number; cell: Cell; value: Digit }>
export type DeadEndEvent = Readonly<{ depth: number; cell: Cell }>
export type TimeoutEvent = Readonly<{ depth: number; deadline: number }>
/** Frozen copy of the result; handlers cannot reach the returned arrays */
export type FinishEvent = Readonly<{
  outcome: SolveOutcome
  board: ReadonlyGrid
  moves: readonly MoveRecord[]
  elapsedMs: number
  stats: Readonly<SolveStats>
}>

export type SolverEventMap = {
  assign: AssignEvent
  unassign: UnassignEvent
  deadEnd: DeadEndEvent
  timeout: TimeoutEvent
  finish: FinishEvent
}

export type Solver = {
  solve(initial: ReadonlyGrid): SolveResult
  on: Emitter<SolverEventMap>['on']
}

// ============================================================================
// Configuration
// ============================================================================

type ResolvedOptions = {
  timeLimitMs: number
  clock: Clock
  domainStrategy: DomainStrategy
}

function resolveOptions(options: SolverOptions): ResolvedOptions {
  const timeLimitMs = options.timeLimitMs ?? DEFAULT_TIME_LIMIT_MS
  validateTimeLimit(timeLimitMs)
  const domainStrategy = options.domainStrategy ?? 'counting'
  if (!DOMAIN_STRATEGIES.includes(domainStrategy)) {
    throw new InvalidConfigError(`Unknown domain strategy: '${domainStrategy}'`)
  }
  return { timeLimitMs, clock: options.clock ?? Date.now, domainStrategy }
}

// ============================================================================
// Search
// ============================================================================

type SearchContext = {
  board: Board
  guard: TimeGuard
  recorder: MoveRecorder
  stats: SolveStats
  events: Emitter<SolverEventMap>
}

function search(ctx: SearchContext, depth: number): SearchState {
  const { board, guard, recorder, stats, events } = ctx
  if (depth > stats.maxDepth) stats.maxDepth = depth

  if (guard.expired()) {
    events.emit('timeout', { depth, deadline: guard.deadline })
    return 'TIMED_OUT'
  }

  const selection = selectNext(board)
  if (selection === null) return 'SOLVED'

  const { cell, domain, domainSize, degree } = selection
  if (domainSize === 0) {
    events.emit('deadEnd', { depth, cell })
    return 'DEAD_END'
  }

  for (const value of domain) {
    board.assign(cell, value)
    stats.assignments++
    const order = stats.assignments
    recorder.record({ order, cell, domainSize, degree, value })
    events.emit('assign', { order, depth, cell, value, domainSize, degree })

    const state = search(ctx, depth + 1)
    if (state !== 'DEAD_END') return state

    board.unassign(cell)
    stats.backtracks++
    events.emit('unassign', { depth, cell, value })
  }

  events.emit('deadEnd', { depth, cell })
  return 'DEAD_END'
}

function toOutcome(state: SearchState): SolveOutcome {
  switch (state) {
    case 'SOLVED': return SolveOutcome.SOLVED
    case 'TIMED_OUT': return SolveOutcome.TIMED_OUT
    case 'DEAD_END': return SolveOutcome.UNSOLVABLE
  }
}

function toFinishEvent(result: SolveResult): FinishEvent {
  return Object.freeze({
    outcome: result.outcome,
    board: Object.freeze(result.board.map(row => Object.freeze([...row]))),
    moves: Object.freeze([...result.moves]),
    elapsedMs: result.elapsedMs,
    stats: Object.freeze({ ...result.stats }),
  })
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Options are validated here, so a bad time limit or strategy throws
 * InvalidConfigError before any puzzle is seen.
 */
export function createSolver(options: SolverOptions = {}): Solver {
  const config = resolveOptions(options)
  const events = createEmitter<SolverEventMap>()

  function solve(initial: ReadonlyGrid): SolveResult {
    const board = createBoard(initial, config.domainStrategy)
    const guard = createTimeGuard(config.timeLimitMs, config.clock)
    const ctx: SearchContext = {
      board,
      guard,
      recorder: createMoveRecorder(),
      stats: { assignments: 0, backtracks: 0, maxDepth: 0 },
      events,
    }

    const state = search(ctx, 0)
    const result: SolveResult = {
      outcome: toOutcome(state),
      board: board.snapshot(),
      moves: ctx.recorder.moves(),
      elapsedMs: guard.elapsed(),
      stats: { ...ctx.stats },
    }
    events.emit('finish', toFinishEvent(result))
    return result
  }

  return { solve, on: events.on }
}

/**
 * Solves a validated 9×9 grid (0 = empty). Validation of the initial grid,
 * including peer conflicts, is the loader's job; see puzzle-format.ts.
 */
export function solve(initial: ReadonlyGrid, options: SolverOptions = {}): SolveResult {
  return createSolver(options).solve(initial)
}
