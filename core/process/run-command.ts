import { spawn } from 'node:child_process'

import { AbortError } from '../errors/abort-error'

/**
 * Run a command with inherited stdio and wait for it to exit.
 *
 * @param command - Executable name or path.
 * @param args - Command arguments.
 * @param options - Spawn options.
 * @param options.cwd - Working directory of the child process.
 * @returns Resolves when the command exits with status 0.
 */
export function runCommand(
  command: string,
  args: string[],
  options: { cwd?: string } = {},
): Promise<void> {
  return new Promise((resolve, reject) => {
    let child = spawn(command, args, { cwd: options.cwd, stdio: 'inherit' })

    child.on('error', error => {
      reject(
        new AbortError(`Failed to run ${command}: ${error.message}`, {
          cause: error,
        }),
      )
    })

    child.on('close', (code, signal) => {
      if (code === 0) {
        resolve()
        return
      }
      let status = signal ? `signal ${signal}` : `exit code ${code}`
      reject(
        new AbortError(`Command "${[command, ...args].join(' ')}" failed with ${status}.`),
      )
    })
  })
}
