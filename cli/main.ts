#!/usr/bin/env node
import { runCLI } from './index'

runCLI(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
})
  .then((result) => {
    process.exitCode = result.exitCode
  })
  .catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
  })
