/**
 * Time Guard
 *
 * Absolute wall-clock deadline for one solve invocation. Advisory only:
 * the search engine polls `expired()` and unwinds by itself.
 */

import { InvalidConfigError } from './errors'

export type Clock = () => number

export const DEFAULT_TIME_LIMIT_MS = 60 * 60 * 1000

export type TimeGuard = {
  readonly startedAt: number
  readonly deadline: number
  expired(): boolean
  elapsed(): number
}

export function validateTimeLimit(timeLimitMs: number): void {
  if (!Number.isFinite(timeLimitMs) || timeLimitMs <= 0) {
    throw new InvalidConfigError(`Time limit must be a positive number of milliseconds, got ${timeLimitMs}`)
  }
}

/** Reads the clock once now, then once per `expired()` or `elapsed()` call */
export function createTimeGuard(timeLimitMs: number = DEFAULT_TIME_LIMIT_MS, clock: Clock = Date.now): TimeGuard {
  validateTimeLimit(timeLimitMs)
  const startedAt = clock()
  const deadline = startedAt + timeLimitMs

  return {
    startedAt,
    deadline,
    expired: () => clock() >= deadline,
    elapsed: () => clock() - startedAt,
  }
}
