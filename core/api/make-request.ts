import type { GitHubClientContext } from '../../types/github-client-context'

import { AbortError } from '../errors/abort-error'

/** Request options understood by `makeRequest`. */
export interface RequestOptions extends Omit<RequestInit, 'headers'> {
  /** Extra headers, merged over the defaults. */
  headers?: Record<string, string>

  /** Status code the request must answer with. */
  expectedStatus: number

  /** Short description used in error messages (e.g., 'Uploading'). */
  action: string
}

/**
 * Perform an authenticated request against the GitHub API.
 *
 * Relative paths are resolved against the context base URL; absolute URLs
 * (such as upload URLs) are used as is.
 *
 * @param context - Client context with credentials.
 * @param path - API path beginning with '/' or an absolute URL.
 * @param options - Request options.
 * @returns Status and parsed JSON body (null when empty).
 */
export async function makeRequest(
  context: GitHubClientContext,
  path: string,
  options: RequestOptions,
): Promise<{ status: number; data: unknown }> {
  let { expectedStatus, action, headers = {}, ...init } = options
  let { userName, apiToken } = context.credentials

  let authorization = Buffer.from(`${userName}:${apiToken}`).toString('base64')

  let response: Response
  try {
    response = await fetch(resolveUrl(path, context.baseUrl), {
      ...init,
      headers: {
        Accept: 'application/vnd.github.v3+json',
        Authorization: `Basic ${authorization}`,
        'User-Agent': 'llvm-packager',
        ...headers,
      },
    })
  } catch (error) {
    throw new AbortError(
      `${action} failed with message: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  let data = parseBody(await response.text())

  if (response.status !== expectedStatus) {
    throw new AbortError(
      `${action} failed with message: ${getErrorMessage(data, response)}`,
    )
  }

  return { status: response.status, data }
}

function resolveUrl(path: string, baseUrl: string): URL {
  if (/^https?:\/\//u.test(path)) {
    return new URL(path)
  }
  return new URL(`${baseUrl.replace(/\/+$/u, '')}${path}`)
}

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null
  }
  try {
    return JSON.parse(text) as unknown
  } catch {
    /** Not JSON, keep the raw text for error reporting. */
    return text
  }
}

function getErrorMessage(data: unknown, response: Response): string {
  if (
    data !== null &&
    typeof data === 'object' &&
    'message' in data &&
    typeof data.message === 'string'
  ) {
    return data.message
  }
  if (typeof data === 'string' && data.trim() !== '') {
    return data.trim()
  }
  return `${response.status} ${response.statusText}`.trim()
}
