import { spawn } from 'node:child_process'

import { AbortError } from '../errors/abort-error'

/**
 * Run a command and collect stdout and stderr into one string, in the order
 * the chunks arrive.
 *
 * @param command - Executable name or path.
 * @param args - Command arguments.
 * @returns Combined output.
 */
export function captureCommand(
  command: string,
  args: string[],
): Promise<string> {
  return new Promise((resolve, reject) => {
    let child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    let chunks: Buffer[] = []

    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk))

    child.on('error', error => {
      reject(
        new AbortError(`Failed to run ${command}: ${error.message}`, {
          cause: error,
        }),
      )
    })

    child.on('close', code => {
      let output = Buffer.concat(chunks).toString('utf8')
      if (code === 0) {
        resolve(output)
        return
      }
      reject(
        new AbortError(
          `Command "${[command, ...args].join(' ')}" failed with exit code ${code}.`,
        ),
      )
    })
  })
}
