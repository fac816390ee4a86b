import { openAsBlob } from 'node:fs'
import { basename } from 'node:path'

import type { GitHubClientContext } from '../../types/github-client-context'

import { normalizeUploadUrl } from './normalize-upload-url'
import { makeRequest } from './make-request'

/**
 * Upload a file as a release asset named after the file.
 *
 * @param context - Client context.
 * @param uploadUrl - Release upload URL, with or without its URI template.
 * @param filePath - Path of the xz archive to upload.
 */
export async function uploadReleaseAsset(
  context: GitHubClientContext,
  uploadUrl: string,
  filePath: string,
): Promise<void> {
  let url = new URL(normalizeUploadUrl(uploadUrl))
  url.searchParams.set('name', basename(filePath))

  await makeRequest(context, url.toString(), {
    headers: { 'Content-Type': 'application/x-xz' },
    body: await openAsBlob(filePath, { type: 'application/x-xz' }),
    action: 'Uploading',
    expectedStatus: 201,
    method: 'POST',
  })
}
