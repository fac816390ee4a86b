import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { tmpdir } from 'node:os'

import { getSourcePaths } from '../../core/release/get-source-paths'
import { extractArchive } from '../../core/sources/extract-archive'
import { downloadFile } from '../../core/sources/download-file'
import { fetchSources } from '../../core/sources/fetch-sources'
import { AbortError } from '../../core/errors/abort-error'
import { pathExists } from '../../core/fs/path-exists'

vi.mock(import('../../core/sources/download-file'), () => ({
  downloadFile: vi.fn(),
}))

vi.mock(import('../../core/sources/extract-archive'), () => ({
  extractArchive: vi.fn(),
}))

vi.mock('nanospinner', () => {
  let spinner = { success: vi.fn(), error: vi.fn(), start: vi.fn() }
  spinner.start.mockReturnValue(spinner)
  return { createSpinner: vi.fn(() => spinner) }
})

describe('fetchSources', () => {
  let root: string

  beforeEach(async () => {
    vi.clearAllMocks()
    root = await mkdtemp(join(tmpdir(), 'fetch-sources-'))

    vi.mocked(downloadFile).mockImplementation(async (url, directory) => {
      let destination = join(directory, basename(url))
      await writeFile(destination, 'archive')
      return destination
    })

    /** Extraction creates `<name>.src/tools` like a real source archive. */
    vi.mocked(extractArchive).mockImplementation(async (archive, directory) => {
      let name = basename(archive).replace(/\.tar\.xz$/u, '')
      await mkdir(join(directory, name, 'tools'), { recursive: true })
    })
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('downloads, extracts and merges both archives on a fresh directory', async () => {
    let paths = getSourcePaths({ version: '14.0.0' }, root)

    await fetchSources(paths, { interval: 0 })

    expect(downloadFile).toHaveBeenCalledTimes(2)
    expect(downloadFile).toHaveBeenNthCalledWith(
      1,
      'http://releases.llvm.org/14.0.0/llvm-14.0.0.src.tar.xz',
      root,
    )
    expect(downloadFile).toHaveBeenNthCalledWith(
      2,
      'http://releases.llvm.org/14.0.0/cfe-14.0.0.src.tar.xz',
      root,
    )
    expect(extractArchive).toHaveBeenNthCalledWith(
      1,
      join(root, 'llvm-14.0.0.src.tar.xz'),
      root,
    )
    expect(extractArchive).toHaveBeenNthCalledWith(
      2,
      join(root, 'cfe-14.0.0.src.tar.xz'),
      root,
    )
    expect(
      await pathExists(join(root, 'llvm-14.0.0.src', 'tools', 'clang')),
    ).toBeTruthy()
    expect(await pathExists(join(root, 'cfe-14.0.0.src'))).toBeFalsy()
  })

  it('does nothing when the merged tree already exists', async () => {
    let paths = getSourcePaths({ version: '14.0.0' }, root)
    await mkdir(join(paths.coreDirectory, 'tools', 'clang'), { recursive: true })

    await fetchSources(paths, { interval: 0 })

    expect(downloadFile).not.toHaveBeenCalled()
    expect(extractArchive).not.toHaveBeenCalled()
  })

  it('extracts an archive left by an earlier run without downloading it', async () => {
    let paths = getSourcePaths({ version: '14.0.0' }, root)
    await writeFile(join(root, 'llvm-14.0.0.src.tar.xz'), 'archive')
    await writeFile(join(root, 'cfe-14.0.0.src.tar.xz'), 'archive')

    await fetchSources(paths, { interval: 0 })

    expect(downloadFile).not.toHaveBeenCalled()
    expect(extractArchive).toHaveBeenCalledTimes(2)
  })

  it('retries aborted downloads', async () => {
    let paths = getSourcePaths({ version: '14.0.0' }, root)
    await mkdir(join(paths.coreDirectory, 'tools'), { recursive: true })
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.mocked(downloadFile).mockRejectedValueOnce(
      new AbortError('Downloading cfe-14.0.0.src.tar.xz failed'),
    )

    await fetchSources(paths, { interval: 0 })

    expect(downloadFile).toHaveBeenCalledTimes(2)
    expect(
      await pathExists(join(root, 'llvm-14.0.0.src', 'tools', 'clang')),
    ).toBeTruthy()
  })
})
