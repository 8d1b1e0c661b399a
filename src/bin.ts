#!/usr/bin/env node
import { runCli, ExitCode } from './cli'

runCli(process.argv.slice(2)).then(
  (code) => { process.exitCode = code },
  (e: unknown) => {
    console.error(e)
    process.exitCode = ExitCode.ERROR
  },
)
