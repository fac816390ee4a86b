import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { pathExists } from '../../core/fs/path-exists'

describe('pathExists', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'path-exists-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('returns true for files and directories', async () => {
    await writeFile(join(root, 'llvm-14.0.0.src.tar.xz'), 'archive')

    await expect(pathExists(root)).resolves.toBeTruthy()
    await expect(
      pathExists(join(root, 'llvm-14.0.0.src.tar.xz')),
    ).resolves.toBeTruthy()
  })

  it('returns false for missing paths', async () => {
    await expect(pathExists(join(root, 'missing'))).resolves.toBeFalsy()
  })
})
