/**
 * Move Recorder
 *
 * Keeps the first assignments made during a search, in the order they were
 * attempted. Entries stay even when backtracking later undoes the move.
 */

import type { Cell, Digit } from './types'

export const TRACE_CAPACITY = 4

export type MoveRecord = Readonly<{
  /** 1-based position among all assignments of the search */
  order: number
  cell: Readonly<Cell>
  domainSize: number
  degree: number
  value: Digit
}>

export type MoveRecorder = {
  /** Returns false once the recorder is full */
  record(move: MoveRecord): boolean
  isFull(): boolean
  moves(): MoveRecord[]
}

export function createMoveRecorder(capacity: number = TRACE_CAPACITY): MoveRecorder {
  const trace: MoveRecord[] = []

  function record(move: MoveRecord): boolean {
    if (trace.length >= capacity) return false
    trace.push(Object.freeze({ ...move, cell: Object.freeze({ row: move.cell.row, col: move.cell.col }) }))
    return true
  }

  return {
    record,
    isFull: () => trace.length >= capacity,
    moves: () => [...trace],
  }
}
