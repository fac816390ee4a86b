/**
 * Strip the URI template suffix from a release upload URL.
 *
 * @param uploadUrl - Upload URL as returned by the API.
 * @returns Plain upload URL.
 */
export function normalizeUploadUrl(uploadUrl: string): string {
  return uploadUrl.replace('{?name,label}', '')
}
