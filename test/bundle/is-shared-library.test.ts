import { describe, expect, it } from 'vitest'

import { isSharedLibrary } from '../../core/bundle/is-shared-library'

describe('isSharedLibrary', () => {
  it('matches plain and versioned shared library names', () => {
    expect(isSharedLibrary('libclang.so')).toBeTruthy()
    expect(isSharedLibrary('libLLVM.so.14')).toBeTruthy()
    expect(isSharedLibrary('libclang.so.14.0.0')).toBeTruthy()
  })

  it('ignores other files', () => {
    expect(isSharedLibrary('libclang.a')).toBeFalsy()
    expect(isSharedLibrary('clang')).toBeFalsy()
    expect(isSharedLibrary('libfoo.so.x')).toBeFalsy()
    expect(isSharedLibrary('libfoo.sox')).toBeFalsy()
    expect(isSharedLibrary('README.so.txt')).toBeFalsy()
  })
})
