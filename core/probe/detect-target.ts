import { join } from 'node:path'

import { captureCommand } from '../process/capture-command'
import { AbortError } from '../errors/abort-error'
import { parseTarget } from './parse-target'

/**
 * Ask the freshly installed compiler which target it builds for.
 *
 * @param installDirectory - Install prefix of the toolchain.
 * @returns Target triple (e.g. 'x86_64-unknown-linux-gnu').
 */
export async function detectTarget(installDirectory: string): Promise<string> {
  let output = await captureCommand(join(installDirectory, 'bin', 'clang'), [
    '-###',
  ])
  let target = parseTarget(output)
  if (target === null) {
    throw new AbortError('Cannot deduce LLVM target.')
  }
  return target
}
