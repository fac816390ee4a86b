import type { Credentials } from '../../types/credentials'

import { AbortError } from '../errors/abort-error'

/**
 * Merge explicit credentials over environment variables.
 *
 * @param options - Values passed on the command line.
 * @param options.ghUser - GitHub user name.
 * @param options.ghToken - GitHub API token.
 * @param env - Environment to fall back to.
 * @returns Resolved credentials.
 */
export function resolveCredentials(
  options: { ghToken?: string; ghUser?: string },
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  let userName = pick(options.ghUser, env['GITHUB_USERNAME'])
  if (!userName) {
    throw new AbortError(
      'Must specify either --gh-user or GITHUB_USERNAME in environment',
    )
  }

  let apiToken = pick(options.ghToken, env['GITHUB_TOKEN'])
  if (!apiToken) {
    throw new AbortError(
      'Must specify either --gh-token or GITHUB_TOKEN in environment',
    )
  }

  return { userName, apiToken }
}

function pick(
  explicit: undefined | string,
  fallback: undefined | string,
): undefined | string {
  for (let value of [explicit, fallback]) {
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim()
    }
  }
  return undefined
}
