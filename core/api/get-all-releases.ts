import type { GitHubClientContext } from '../../types/github-client-context'
import type { RemoteRelease } from '../../types/remote-release'

import { toRemoteRelease } from './to-remote-release'
import { AbortError } from '../errors/abort-error'
import { makeRequest } from './make-request'

/**
 * Fetch releases of the repository.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.limit - Maximum number of releases to fetch (default 100).
 * @returns Releases, most recent first.
 */
export async function getAllReleases(
  context: GitHubClientContext,
  parameters: { limit?: number } = {},
): Promise<RemoteRelease[]> {
  let { limit = 100 } = parameters
  let { owner, repo } = context

  let { data } = await makeRequest(
    context,
    `/repos/${owner}/${repo}/releases?per_page=${limit}`,
    { action: 'Getting releases', expectedStatus: 200 },
  )

  if (!Array.isArray(data)) {
    throw new AbortError('GitHub API returned an unexpected releases list.')
  }

  return data.map(toRemoteRelease)
}
