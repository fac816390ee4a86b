import type { Credentials } from './credentials'

/**
 * Internal client context shared by all API functions.
 *
 * Holds the credentials and the repository every request is addressed to.
 */
export interface GitHubClientContext {
  /** Credentials sent as basic authentication. */
  credentials: Credentials

  /** GitHub REST API base URL. */
  baseUrl: string

  /** Repository owner (user or organization). */
  owner: string

  /** Repository name. */
  repo: string
}
