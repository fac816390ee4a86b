import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubClient } from '../../types/github-client'
import type { Credentials } from '../../types/credentials'

import { uploadReleaseAsset } from './upload-release-asset'
import { deleteReleaseAsset } from './delete-release-asset'
import { getAllReleases } from './get-all-releases'
import { createRelease } from './create-release'

/**
 * Create a functional GitHub API client bound to one repository.
 *
 * @param options - Client options.
 * @param options.credentials - Basic auth credentials.
 * @param options.owner - Repository owner.
 * @param options.repo - Repository name.
 * @param options.baseUrl - API base URL override.
 * @returns Client with bound methods.
 */
export function createGitHubClient(options: {
  credentials: Credentials
  baseUrl?: string
  owner: string
  repo: string
}): GitHubClient {
  let context: GitHubClientContext = {
    baseUrl: options.baseUrl ?? 'https://api.github.com',
    credentials: options.credentials,
    owner: options.owner,
    repo: options.repo,
  }

  return {
    uploadReleaseAsset: (uploadUrl, filePath) =>
      uploadReleaseAsset(context, uploadUrl, filePath),
    deleteReleaseAsset: assetId => deleteReleaseAsset(context, assetId),
    createRelease: tagName => createRelease(context, tagName),
    getAllReleases: () => getAllReleases(context),
  }
}
