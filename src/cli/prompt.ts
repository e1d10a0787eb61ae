/**
 * @fileoverview Interactive confirmation on the terminal.
 *
 * @module cli/prompt
 */

import { createInterface } from 'readline/promises'
import type { Readable, Writable } from 'stream'
import type { ConfirmFn } from '../ops/pipeline'

/**
 * Ask a question and resolve to the next line read from `input`.
 *
 * Resolves to an empty string when the input ends before a line arrives,
 * which the pipeline treats as a declined confirmation.
 */
export async function askLine(input: Readable, output: Writable, question: string): Promise<string> {
  const rl = createInterface({ input, output })
  let closed = false
  const onClose = new Promise<string>((resolve) => {
    rl.once('close', () => {
      closed = true
      resolve('')
    })
  })
  const answer = rl.question(question).catch((error: unknown) => {
    if (closed) return ''
    throw error
  })

  try {
    return await Promise.race([answer, onClose])
  } finally {
    rl.close()
  }
}

/**
 * Ask a question on stdin/stdout and resolve to the line the operator typed.
 */
export const terminalConfirm: ConfirmFn = (question) => askLine(process.stdin, process.stdout, question)
