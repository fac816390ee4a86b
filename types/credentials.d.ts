/** Basic authentication credentials for the GitHub API. */
export interface Credentials {
  /** GitHub user name. */
  userName: string

  /** Personal access token or workflow token. */
  apiToken: string
}
