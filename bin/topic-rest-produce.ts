#!/usr/bin/env -S node --import tsx

import { main } from '../src/cli/run.ts'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

process.exitCode = await main(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  signal: controller.signal
})
