/**
 * sudoku-backtrack
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  SudokuError, SudokuErrorCode,
  ParseError, InvalidPuzzleError, InvalidConfigError, ContractViolationError,
} from './errors'
export type { SudokuErrorCode as SudokuErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Values, coordinates, grids
export type { Digit, CellValue, Cell, Grid, ReadonlyGrid } from './types'
export { DIGITS, isDigit, isCellValue } from './types'
export type { Conflict } from './grid'
export {
  SIZE, BOX_SIZE, CELL_COUNT, PEER_COUNT, ALL_CELLS,
  cellAt, cellIndex, cellFromIndex, boxOf, peersOf, formatCell,
  copyGrid, emptyGrid, findConflicts, countEmpty, isCompleteSolution,
} from './grid'

// Board & domains
export type { Board, DomainStrategy } from './board'
export { createBoard, emptyCells } from './board'
export { DOMAIN_STRATEGIES } from './internal/domain-tracker'

// Cell selection
export type { Selection } from './cell-selector'
export { selectNext, degreeOf } from './cell-selector'

// Time guard
export type { Clock, TimeGuard } from './time-guard'
export { createTimeGuard, DEFAULT_TIME_LIMIT_MS } from './time-guard'

// Move recorder
export type { MoveRecord, MoveRecorder } from './move-recorder'
export { createMoveRecorder, TRACE_CAPACITY } from './move-recorder'

// Search engine
export type {
  SolveResult, SolveStats, SolverOptions, Solver, SolverEventMap,
  AssignEvent, UnassignEvent, DeadEndEvent, TimeoutEvent, FinishEvent,
} from './solver'
export { solve, createSolver, SolveOutcome } from './solver'

// Puzzle files
export type { PuzzleError } from './puzzle-format'
export { parsePuzzle, validateGrid, loadPuzzleFile, serializePuzzle } from './puzzle-format'

// Presentation
export { formatGrid, formatMove, formatOutcome, formatReport } from './presentation'
