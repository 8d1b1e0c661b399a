/**
 * Command-line front end.
 *
 *   sudoku-solve <puzzle-file> [--time-limit <seconds>] [--strategy <counting|scanning>] [--verbose]
 *
 * Exit codes: 0 solved, 1 unsolvable, 2 timed out, 3 load or usage error.
 */

import { parseArgs } from 'node:util'
import { loadPuzzleFile } from './puzzle-format'
import { createSolver, SolveOutcome, type Solver, type SolverOptions } from './solver'
import { formatGrid, formatReport } from './presentation'
import { SudokuError } from './errors'
import { DOMAIN_STRATEGIES, type DomainStrategy } from './internal/domain-tracker'

export type CliIO = {
  stdout(line: string): void
  stderr(line: string): void
}

export const ExitCode = {
  SOLVED: 0,
  UNSOLVABLE: 1,
  TIMED_OUT: 2,
  ERROR: 3,
} as const

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}

export const USAGE = 'Usage: sudoku-solve <puzzle-file> [--time-limit <seconds>] [--strategy <counting|scanning>] [--verbose]'

type CliArgs = {
  file: string
  options: SolverOptions
  verbose: boolean
}

function isDomainStrategy(name: string): name is DomainStrategy {
  return DOMAIN_STRATEGIES.some(s => s === name)
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'time-limit': { type: 'string' },
      strategy: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

/** Returns the parsed arguments, or an error message */
export function parseCliArgs(argv: string[]): CliArgs | { help: true } | string {
  let parsed: ReturnType<typeof readArgs>
  try {
    parsed = readArgs(argv)
  } catch (e) {
    return e instanceof Error ? e.message : String(e)
  }

  const { values, positionals } = parsed
  if (values.help) return { help: true }
  if (positionals.length !== 1) return 'Expected exactly one puzzle file'

  const options: SolverOptions = {}
  const limit = values['time-limit']
  if (limit !== undefined) {
    const seconds = Number(limit)
    if (!Number.isFinite(seconds) || seconds <= 0) return `Invalid --time-limit: '${limit}'`
    options.timeLimitMs = seconds * 1000
  }
  const strategy = values.strategy
  if (strategy !== undefined) {
    if (!isDomainStrategy(strategy)) return `Invalid --strategy: '${strategy}'`
    options.domainStrategy = strategy
  }

  return { file: positionals[0], options, verbose: values.verbose === true }
}

function exitCodeFor(outcome: SolveOutcome): number {
  switch (outcome) {
    case SolveOutcome.SOLVED: return ExitCode.SOLVED
    case SolveOutcome.UNSOLVABLE: return ExitCode.UNSOLVABLE
    case SolveOutcome.TIMED_OUT: return ExitCode.TIMED_OUT
  }
}

export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const args = parseCliArgs(argv)
  if (typeof args === 'string') {
    io.stderr(args)
    io.stderr(USAGE)
    return ExitCode.ERROR
  }
  if ('help' in args) {
    io.stdout(USAGE)
    return ExitCode.SOLVED
  }

  let loaded: Awaited<ReturnType<typeof loadPuzzleFile>>
  try {
    loaded = await loadPuzzleFile(args.file)
  } catch (e) {
    io.stderr(`Cannot read ${args.file}: ${e instanceof Error ? e.message : String(e)}`)
    return ExitCode.ERROR
  }
  if (!loaded.ok) {
    io.stderr(`${args.file}: ${loaded.error.message}`)
    return ExitCode.ERROR
  }

  let solver: Solver
  try {
    solver = createSolver(args.options)
  } catch (e) {
    if (e instanceof SudokuError) {
      io.stderr(e.message)
      return ExitCode.ERROR
    }
    throw e
  }

  if (args.verbose) {
    solver.on('assign', (e) => io.stderr(`assign #${e.order} depth=${e.depth} (${e.cell.row},${e.cell.col})=${e.value} domain=${e.domainSize} degree=${e.degree}`))
    solver.on('unassign', (e) => io.stderr(`undo depth=${e.depth} (${e.cell.row},${e.cell.col})=${e.value}`))
    solver.on('timeout', (e) => io.stderr(`time limit reached at depth ${e.depth}`))
  }

  io.stdout('Initial:')
  io.stdout(formatGrid(loaded.value))
  io.stdout('')

  const result = solver.solve(loaded.value)
  io.stdout(formatReport(result))
  return exitCodeFor(result.outcome)
}
