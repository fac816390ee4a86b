/* eslint-disable camelcase */

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RemoteRelease } from '../../types/remote-release'

import { toRemoteRelease } from './to-remote-release'
import { makeRequest } from './make-request'

/**
 * Create a release for a tag.
 *
 * @param context - Client context.
 * @param tagName - Tag of the new release.
 * @returns Created release.
 */
export async function createRelease(
  context: GitHubClientContext,
  tagName: string,
): Promise<RemoteRelease> {
  let { owner, repo } = context
  let { data } = await makeRequest(context, `/repos/${owner}/${repo}/releases`, {
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ tag_name: tagName }),
    action: 'Releasing',
    expectedStatus: 201,
    method: 'POST',
  })
  return toRemoteRelease(data)
}

/* eslint-enable camelcase */
