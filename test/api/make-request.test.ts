import { beforeEach, describe, expect, it, vi } from 'vitest'

import { makeRequest } from '../../core/api/make-request'
import { AbortError } from '../../core/errors/abort-error'
import { context } from './context'

describe('makeRequest', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('sends basic authentication and GitHub headers', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockImplementation((_url, init) => {
      let headers = init?.headers as Record<string, string>
      expect(headers['Authorization']).toBe(
        `Basic ${Buffer.from('octocat:test-secret').toString('base64')}`,
      )
      expect(headers['Accept']).toBe('application/vnd.github.v3+json')
      expect(headers['User-Agent']).toBe('llvm-packager')
      return Promise.resolve(new Response('[]', { status: 200 }))
    })

    await makeRequest(context(), '/repos/octocat/llvm/releases', {
      action: 'Getting releases',
      expectedStatus: 200,
    })
    expect(spy).toHaveBeenCalledOnce()
  })

  it('resolves paths against the base URL', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('{}', { status: 200 }))

    await makeRequest(context(), '/repos/octocat/llvm/releases', {
      action: 'Getting releases',
      expectedStatus: 200,
    })
    expect(String(spy.mock.calls[0]![0])).toBe(
      'https://api.github.com/repos/octocat/llvm/releases',
    )
  })

  it('uses absolute URLs as is', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('{}', { status: 201 }))

    await makeRequest(
      context(),
      'https://uploads.github.com/repos/octocat/llvm/releases/1/assets',
      { action: 'Uploading', expectedStatus: 201, method: 'POST' },
    )
    expect(String(spy.mock.calls[0]![0])).toBe(
      'https://uploads.github.com/repos/octocat/llvm/releases/1/assets',
    )
  })

  it('returns parsed JSON and status', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{"id":7}', { status: 201 }),
    )

    await expect(
      makeRequest(context(), '/x', { action: 'Releasing', expectedStatus: 201 }),
    ).resolves.toEqual({ data: { id: 7 }, status: 201 })
  })

  it('returns null data for an empty body', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(null, { status: 204 }),
    )

    await expect(
      makeRequest(context(), '/x', {
        action: 'Deleting asset',
        expectedStatus: 204,
        method: 'DELETE',
      }),
    ).resolves.toEqual({ data: null, status: 204 })
  })

  it('aborts with the API message on an unexpected status', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ message: 'Bad credentials' }), {
        statusText: 'Unauthorized',
        status: 401,
      }),
    )

    let promise = makeRequest(context(), '/x', {
      action: 'Getting releases',
      expectedStatus: 200,
    })
    await expect(promise).rejects.toBeInstanceOf(AbortError)
    await expect(promise).rejects.toThrow(
      'Getting releases failed with message: Bad credentials',
    )
  })

  it('treats other success codes as unexpected', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{}', { statusText: 'OK', status: 200 }),
    )

    await expect(
      makeRequest(context(), '/x', { action: 'Releasing', expectedStatus: 201 }),
    ).rejects.toThrow('Releasing failed with message: 200 OK')
  })

  it('falls back to a plain text body', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('upstream unavailable', {
        statusText: 'Bad Gateway',
        status: 502,
      }),
    )

    await expect(
      makeRequest(context(), '/x', { action: 'Uploading', expectedStatus: 201 }),
    ).rejects.toThrow('Uploading failed with message: upstream unavailable')
  })

  it('turns network failures into aborts', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'))

    await expect(
      makeRequest(context(), '/x', { action: 'Uploading', expectedStatus: 201 }),
    ).rejects.toThrow('Uploading failed with message: fetch failed')
  })
})
