#!/usr/bin/env node
/**
 * Executable entry for the `grove` command.
 */

import { runCLI } from './index'

runCLI(process.argv.slice(2), {
  stdout: (msg) => process.stdout.write(`${msg}\n`),
  stderr: (msg) => process.stderr.write(`${msg}\n`),
}).then(
  (result) => {
    process.exitCode = result.exitCode
  },
  (error: unknown) => {
    process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exitCode = 1
  }
)
