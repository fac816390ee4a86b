import { createWriteStream } from 'node:fs'
import { pipeline } from 'node:stream/promises'
import { Readable } from 'node:stream'
import { rm } from 'node:fs/promises'
import { join } from 'node:path'

import { AbortError } from '../errors/abort-error'

/** Write buffer size for downloads (1 MiB). */
export const CHUNK_SIZE = 1024 * 1024

/**
 * Stream a remote file into a directory, keeping its URL file name.
 *
 * @param url - Absolute URL of the file.
 * @param directory - Destination directory.
 * @returns Path of the written file.
 */
export async function downloadFile(
  url: string,
  directory: string,
): Promise<string> {
  let fileName = url.slice(url.lastIndexOf('/') + 1)
  let destination = join(directory, fileName)

  let response: Response
  try {
    response = await fetch(url)
  } catch (error) {
    throw new AbortError(
      `Downloading ${fileName} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  if (!response.ok || !response.body) {
    await response.body?.cancel()
    throw new AbortError(
      `Downloading ${fileName} failed with status ${response.status} ${response.statusText}`,
    )
  }

  try {
    await pipeline(
      Readable.fromWeb(response.body),
      createWriteStream(destination, { highWaterMark: CHUNK_SIZE }),
    )
  } catch (error) {
    await rm(destination, { force: true })
    throw new AbortError(
      `Downloading ${fileName} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  return destination
}
