import { describe, expect, it } from 'vitest'

import { getEffectiveVersion } from '../../core/release/get-effective-version'

describe('getEffectiveVersion', () => {
  it('returns the version of a final release', () => {
    expect(getEffectiveVersion({ version: '14.0.0' })).toBe('14.0.0')
  })

  it('appends the release candidate', () => {
    expect(getEffectiveVersion({ releaseCandidate: 2, version: '15.0.0' })).toBe(
      '15.0.0rc2',
    )
  })
})
