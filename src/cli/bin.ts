#!/usr/bin/env node
/**
 * @fileoverview Executable entry for git-blob-purge.
 *
 * @module cli/bin
 */

import { runCLI } from './index'

async function main(): Promise<void> {
  const result = await runCLI(process.argv.slice(2))
  process.exitCode = result.exitCode
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
