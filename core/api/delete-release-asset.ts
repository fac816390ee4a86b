import type { GitHubClientContext } from '../../types/github-client-context'

import { makeRequest } from './make-request'

/**
 * Delete a release asset.
 *
 * @param context - Client context.
 * @param assetId - Identifier of the asset.
 */
export async function deleteReleaseAsset(
  context: GitHubClientContext,
  assetId: number,
): Promise<void> {
  let { owner, repo } = context
  await makeRequest(
    context,
    `/repos/${owner}/${repo}/releases/assets/${assetId}`,
    { action: 'Deleting asset', expectedStatus: 204, method: 'DELETE' },
  )
}
