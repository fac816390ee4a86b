import { basename } from 'node:path'
import pc from 'picocolors'

import type { PublishResult } from '../../types/publish-result'
import type { RetryOptions } from '../../types/retry-options'
import type { GitHubClient } from '../../types/github-client'

import { normalizeUploadUrl } from './normalize-upload-url'
import { withRetries } from '../retry/with-retries'

/**
 * Publish a bundle under the release tagged with the effective version.
 *
 * The release is created when missing. An asset with the bundle's file name
 * is deleted before uploading, so a release never carries two copies of the
 * same bundle. Every request is retried on abort. An upload attempt after a
 * failed one first deletes whatever asset the failed attempt left behind.
 *
 * @param client - GitHub client bound to the release repository.
 * @param parameters - What to publish.
 * @param parameters.tagName - Release tag (the effective version).
 * @param parameters.bundlePath - Path of the bundle archive.
 * @param retry - Retry bounds for each request.
 * @returns Mutations performed on the release.
 */
export async function publishBundle(
  client: GitHubClient,
  parameters: { bundlePath: string; tagName: string },
  retry?: RetryOptions,
): Promise<PublishResult> {
  let { bundlePath, tagName } = parameters
  let bundleName = basename(bundlePath)
  let deleted = false
  let created = false

  let releases = await withRetries(() => client.getAllReleases(), retry)
  let release = releases.find(item => item.tagName === tagName)
  let uploadUrl: string

  if (release) {
    console.info(pc.gray(`Version ${tagName} already released.`))
    ;({ uploadUrl } = release)

    let staleAsset = release.assets.find(asset => asset.name === bundleName)
    if (staleAsset) {
      console.info(pc.gray(`Deleting ${bundleName} on GitHub.`))
      let { id } = staleAsset
      await withRetries(() => client.deleteReleaseAsset(id), retry)
      deleted = true
    }
  } else {
    console.info(pc.gray(`Releasing ${tagName} on GitHub.`))
    let createdRelease = await withRetries(
      () => client.createRelease(tagName),
      retry,
    )
    ;({ uploadUrl } = createdRelease)
    created = true
  }

  let target = normalizeUploadUrl(uploadUrl)

  let attempt = 0
  await withRetries(async () => {
    attempt++
    if (attempt > 1 && (await deleteStaleAsset(client, tagName, bundleName))) {
      deleted = true
    }
    console.info(pc.gray(`Uploading ${bundleName} on GitHub.`))
    await client.uploadReleaseAsset(target, bundlePath)
  }, retry)

  return { uploadUrl: target, deleted, created }
}

/**
 * Delete the asset a failed upload may have left on the release.
 *
 * @param client - GitHub client bound to the release repository.
 * @param tagName - Release tag.
 * @param bundleName - File name of the bundle.
 * @returns True when an asset was deleted.
 */
async function deleteStaleAsset(
  client: GitHubClient,
  tagName: string,
  bundleName: string,
): Promise<boolean> {
  let releases = await client.getAllReleases()
  let staleAsset = releases
    .find(item => item.tagName === tagName)
    ?.assets.find(asset => asset.name === bundleName)

  if (!staleAsset) {
    return false
  }

  console.info(pc.gray(`Deleting ${bundleName} on GitHub.`))
  await client.deleteReleaseAsset(staleAsset.id)
  return true
}
