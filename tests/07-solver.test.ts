/**
 * Segment 07: Search Engine Tests
 *
 * End-to-end scenarios for solve(): outcomes, final boards, move traces,
 * statistics, time budget, events and determinism.
 *
 * Expected traces were worked out from the initial boards by applying the
 * selection rule (MRV, Degree, row-major) and ascending value order.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { solve, createSolver, SolveOutcome, type FinishEvent, type SolveResult } from '../src/solver'
import { DOMAIN_STRATEGIES } from '../src/internal/domain-tracker'
import { copyGrid, emptyGrid } from '../src/grid'
import { InvalidConfigError } from '../src/errors'
import { loadFixture, tickingClock } from './helpers/puzzles'
import { assertKeepsGivens, assertNoPeerConflicts, assertSolves } from './helpers/board-invariants'

const STANDARD_TRACE = [
  { order: 1, cell: { row: 6, col: 1 }, domainSize: 2, degree: 13, value: 1 },
  { order: 2, cell: { row: 7, col: 1 }, domainSize: 1, degree: 12, value: 5 },
  { order: 3, cell: { row: 7, col: 2 }, domainSize: 1, degree: 10, value: 6 },
  { order: 4, cell: { row: 8, col: 0 }, domainSize: 1, degree: 10, value: 2 },
]

const frozenClock = () => 0

describe('Segment 07: Search Engine', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  // ========================================================================
  // Scenarios
  // ========================================================================

  describe('trivial puzzle', () => {
    it('fills the single empty cell in one assignment', () => {
      const result = solve(loadFixture('one-empty'))
      expect(result.outcome).toBe(SolveOutcome.SOLVED)
      expect(result.board).toEqual(loadFixture('standard-solution'))
      expect(result.moves).toEqual([
        { order: 1, cell: { row: 4, col: 4 }, domainSize: 1, degree: 0, value: 8 },
      ])
      expect(result.stats).toEqual({ assignments: 1, backtracks: 0, maxDepth: 1 })
    })

    it('returns SOLVED with no moves for an already complete board', () => {
      const result = solve(loadFixture('standard-solution'))
      expect(result.outcome).toBe(SolveOutcome.SOLVED)
      expect(result.moves).toEqual([])
      expect(result.stats.assignments).toBe(0)
    })
  })

  describe('unsolvable puzzle', () => {
    it('stops at a cell whose domain is empty from the start', () => {
      const puzzle = loadFixture('empty-domain')
      const result = solve(puzzle)
      expect(result.outcome).toBe(SolveOutcome.UNSOLVABLE)
      expect(result.moves).toEqual([])
      expect(result.stats).toEqual({ assignments: 0, backtracks: 0, maxDepth: 0 })
      expect(result.board).toEqual(puzzle)
    })

    it('exhausts the search and undoes every assignment', () => {
      const puzzle = loadFixture('unsolvable')
      const result = solve(puzzle)
      expect(result.outcome).toBe(SolveOutcome.UNSOLVABLE)
      expect(result.board).toEqual(puzzle)
      expect(result.stats).toEqual({ assignments: 22, backtracks: 22, maxDepth: 10 })
    })

    it('records undone moves in chronological order', () => {
      const result = solve(loadFixture('unsolvable'))
      expect(result.moves).toEqual([
        { order: 1, cell: { row: 6, col: 1 }, domainSize: 2, degree: 13, value: 1 },
        { order: 2, cell: { row: 7, col: 1 }, domainSize: 1, degree: 12, value: 5 },
        { order: 3, cell: { row: 7, col: 2 }, domainSize: 1, degree: 10, value: 6 },
        { order: 4, cell: { row: 6, col: 1 }, domainSize: 2, degree: 13, value: 2 },
      ])
    })
  })

  describe('standard puzzle', () => {
    it('solves to the unique completion', () => {
      const puzzle = loadFixture('standard')
      const result = solve(puzzle)
      expect(result.outcome).toBe(SolveOutcome.SOLVED)
      expect(result.board).toEqual(loadFixture('standard-solution'))
      assertSolves(puzzle, result.board)
    })

    it('records the first four assignments attempted', () => {
      const result = solve(loadFixture('standard'))
      expect(result.moves).toEqual(STANDARD_TRACE)
    })

    it('keeps the first move in the trace although backtracking replaced it', () => {
      const result = solve(loadFixture('standard'))
      expect(result.moves[0]?.value).toBe(1)
      expect(result.board[6][1]).toBe(2)
    })

    it('counts assignments, backtracks and depth', () => {
      const result = solve(loadFixture('standard'))
      expect(result.stats).toEqual({ assignments: 324, backtracks: 268, maxDepth: 56 })
    })

    it('does not modify the caller\'s grid', () => {
      const puzzle = loadFixture('standard')
      const before = copyGrid(puzzle)
      solve(puzzle)
      expect(puzzle).toEqual(before)
    })
  })

  describe('empty grid', () => {
    it('fills all 81 cells', () => {
      const result = solve(emptyGrid())
      expect(result.outcome).toBe(SolveOutcome.SOLVED)
      assertSolves(emptyGrid(), result.board)
      expect(result.board[0]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9])
      expect(result.stats).toEqual({ assignments: 83, backtracks: 2, maxDepth: 81 })
      expect(result.moves).toEqual([
        { order: 1, cell: { row: 0, col: 0 }, domainSize: 9, degree: 20, value: 1 },
        { order: 2, cell: { row: 0, col: 1 }, domainSize: 8, degree: 19, value: 2 },
        { order: 3, cell: { row: 0, col: 2 }, domainSize: 7, degree: 18, value: 3 },
        { order: 4, cell: { row: 0, col: 3 }, domainSize: 6, degree: 17, value: 4 },
      ])
    })
  })

  // ========================================================================
  // Time budget
  // ========================================================================

  describe('timeout', () => {
    it('returns TIMED_OUT before any assignment when the budget is already spent', () => {
      const puzzle = loadFixture('standard')
      const { clock } = tickingClock()
      const result = solve(puzzle, { timeLimitMs: 1, clock })
      expect(result.outcome).toBe(SolveOutcome.TIMED_OUT)
      expect(result.moves).toEqual([])
      expect(result.board).toEqual(puzzle)
      expect(result.elapsedMs).toBe(2)
    })

    it('keeps the partial board of the interrupted branch', () => {
      const puzzle = loadFixture('standard')
      const { clock } = tickingClock()
      const result = solve(puzzle, { timeLimitMs: 10, clock })

      expect(result.outcome).toBe(SolveOutcome.TIMED_OUT)
      expect(result.stats).toEqual({ assignments: 9, backtracks: 0, maxDepth: 9 })
      expect(result.elapsedMs).toBe(11)
      expect(result.moves).toEqual(STANDARD_TRACE)

      const expected = copyGrid(puzzle)
      expected[1][2] = 4
      expected[2][3] = 4
      expected[3][3] = 5
      expected[4][3] = 8
      expected[6][1] = 1
      expected[7][1] = 5
      expected[7][2] = 6
      expected[7][4] = 4
      expected[8][0] = 2
      expect(result.board).toEqual(expected)
    })

    it('partial board never holds a peer conflict', () => {
      const puzzle = loadFixture('standard')
      for (const limit of [3, 25, 200]) {
        const { clock } = tickingClock()
        const result = solve(puzzle, { timeLimitMs: limit, clock })
        expect(result.outcome).toBe(SolveOutcome.TIMED_OUT)
        assertNoPeerConflicts(result.board)
        assertKeepsGivens(puzzle, result.board)
      }
    })

    it('polls the clock once per recursive entry', () => {
      const { clock, calls } = tickingClock()
      solve(loadFixture('one-empty'), { clock })
      // start, two entries, elapsed
      expect(calls()).toBe(4)
    })
  })

  // ========================================================================
  // Strategies & determinism
  // ========================================================================

  describe('determinism', () => {
    it('repeated runs give identical results', () => {
      const puzzle = loadFixture('standard')
      const first = solve(puzzle, { clock: frozenClock })
      const second = solve(puzzle, { clock: frozenClock })
      expect(second).toEqual(first)
    })

    it('a solver instance can be reused', () => {
      const solver = createSolver({ clock: frozenClock })
      const first = solver.solve(loadFixture('unsolvable'))
      const second = solver.solve(loadFixture('unsolvable'))
      expect(second).toEqual(first)
    })

    it.each(['standard', 'unsolvable'] as const)('both domain strategies agree on %s', (name) => {
      const results: SolveResult[] = DOMAIN_STRATEGIES.map(domainStrategy =>
        solve(loadFixture(name), { clock: frozenClock, domainStrategy }))
      expect(results[1]).toEqual(results[0])
    })
  })

  // ========================================================================
  // Configuration
  // ========================================================================

  describe('configuration', () => {
    it('rejects a non-positive time limit', () => {
      expect(() => createSolver({ timeLimitMs: 0 })).toThrow(InvalidConfigError)
      expect(() => solve(loadFixture('standard'), { timeLimitMs: -1 })).toThrow('Time limit must be a positive number of milliseconds, got -1')
    })
  })

  // ========================================================================
  // Events
  // ========================================================================

  describe('events', () => {
    it('emits one assign per assignment and one unassign per backtrack', () => {
      const solver = createSolver()
      let assigns = 0
      let unassigns = 0
      solver.on('assign', () => { assigns++ })
      solver.on('unassign', () => { unassigns++ })
      const result = solver.solve(loadFixture('standard'))
      expect(assigns).toBe(result.stats.assignments)
      expect(unassigns).toBe(result.stats.backtracks)
    })

    it('assign payload carries the order, depth and selection', () => {
      const solver = createSolver()
      const seen: unknown[] = []
      solver.on('assign', (e) => { seen.push(e) })
      solver.solve(loadFixture('one-empty'))
      expect(seen).toEqual([
        { order: 1, depth: 0, cell: { row: 4, col: 4 }, value: 8, domainSize: 1, degree: 0 },
      ])
    })

    it('emits deadEnd for a root cell with an empty domain', () => {
      const solver = createSolver()
      const cells: unknown[] = []
      solver.on('deadEnd', (e) => { cells.push(e.cell) })
      solver.solve(loadFixture('empty-domain'))
      expect(cells).toEqual([{ row: 0, col: 0 }])
    })

    it('emits timeout once with the depth it fired at', () => {
      const { clock } = tickingClock()
      const solver = createSolver({ timeLimitMs: 10, clock })
      const depths: number[] = []
      solver.on('timeout', (e) => { depths.push(e.depth) })
      solver.solve(loadFixture('standard'))
      expect(depths).toEqual([9])
    })

    it('emits finish with the result', () => {
      const solver = createSolver({ clock: frozenClock })
      const finished: unknown[] = []
      solver.on('finish', (r) => { finished.push(r) })
      const result = solver.solve(loadFixture('one-empty'))
      expect(finished).toEqual([result])
    })

    it('finish handlers cannot alter the returned result', () => {
      const solver = createSolver({ clock: frozenClock })
      const writes: boolean[] = []
      solver.on('finish', (r) => {
        writes.push(Reflect.set(r.board[0], 0, 0), Reflect.set(r.moves, 'length', 0))
        writes.push(Reflect.set(r.stats, 'assignments', 99))
      })
      const result = solver.solve(loadFixture('one-empty'))

      expect(writes).toEqual([false, false, false])
      expect(result.outcome).toBe(SolveOutcome.SOLVED)
      expect(result.board).toEqual(loadFixture('standard-solution'))
      expect(result.moves).toHaveLength(1)
      expect(result.stats.assignments).toBe(1)
    })

    it('finish payload is a copy of the result arrays', () => {
      const solver = createSolver({ clock: frozenClock })
      const payloads: FinishEvent[] = []
      solver.on('finish', (r) => { payloads.push(r) })
      const result = solver.solve(loadFixture('one-empty'))

      expect(payloads).toHaveLength(1)
      const [payload] = payloads
      expect(payload.board).not.toBe(result.board)
      expect(payload.board[4]).not.toBe(result.board[4])
      expect(payload.moves).not.toBe(result.moves)
      expect(Object.isFrozen(payload.board[4])).toBe(true)
    })

    it('unsubscribe stops delivery', () => {
      const solver = createSolver()
      let count = 0
      const off = solver.on('finish', () => { count++ })
      solver.solve(loadFixture('one-empty'))
      off()
      solver.solve(loadFixture('one-empty'))
      expect(count).toBe(1)
    })

    it('a throwing handler is reported and does not stop the search', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const solver = createSolver()
      solver.on('assign', () => { throw new Error('handler failed') })
      const result = solver.solve(loadFixture('one-empty'))
      expect(result.outcome).toBe(SolveOutcome.SOLVED)
      expect(errorSpy).toHaveBeenCalledTimes(1)
      expect(errorSpy.mock.calls[0]?.[0]).toBe("Event handler error on 'assign':")
    })
  })
})
