/**
 * TfeStateSource Unit Tests
 */

import { describe, expect, test, vi } from 'vitest'
import { StateSourceError, StateVersionNotFoundError } from '../../errors'
import { TfeStateSource } from './tfe'

const ADDRESS = 'https://tfe.example.test'
const DOWNLOAD_URL = 'https://archivist.example.test/v1/object/state-abc'
const STATE = '{"version":4,"serial":3}'

function jsonApi(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/vnd.api+json' },
  })
}

function stateVersion(downloadUrl: string | null = DOWNLOAD_URL): unknown {
  return {
    data: {
      id: 'sv-abc',
      type: 'state-versions',
      attributes: { serial: 3, 'hosted-state-download-url': downloadUrl },
    },
  }
}

/**
 * fetch stand-in routing the two Terraform Cloud calls.
 */
function createFetch(routes: { version?: () => Response; download?: () => Response }) {
  return vi.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    if (url.endsWith('/current-state-version')) {
      return routes.version ? routes.version() : jsonApi(stateVersion())
    }
    if (url === DOWNLOAD_URL) {
      return routes.download ? routes.download() : new Response(STATE)
    }
    return new Response('not found', { status: 404 })
  })
}

function createSource(fetch: ReturnType<typeof createFetch>) {
  return new TfeStateSource({ token: 'test-token', address: ADDRESS, fetch })
}

describe('TfeStateSource', () => {
  test('has type tfe', () => {
    expect(createSource(createFetch({})).type).toBe('tfe')
  })

  test('reads the current state version then downloads it', async () => {
    const fetch = createFetch({})

    const result = await createSource(fetch).fetchCurrentState('ws-abc123')

    expect(result).toEqual({ ignored: false, contents: new TextEncoder().encode(STATE) })
    expect(fetch).toHaveBeenCalledTimes(2)
    expect(fetch.mock.calls[0][0]).toBe(
      'https://tfe.example.test/api/v2/workspaces/ws-abc123/current-state-version',
    )
    expect(fetch.mock.calls[0][1]).toEqual({
      method: 'GET',
      headers: {
        Accept: 'application/vnd.api+json',
        Authorization: 'Bearer test-token',
      },
    })
    expect(fetch.mock.calls[1][0]).toBe(DOWNLOAD_URL)
    expect(fetch.mock.calls[1][1]).toEqual({
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: 'Bearer test-token',
      },
    })
  })

  test('strips a trailing slash from the address', async () => {
    const fetch = createFetch({})
    const source = new TfeStateSource({ token: 'test-token', address: `${ADDRESS}/`, fetch })

    await source.fetchCurrentState('ws-abc123')

    expect(fetch.mock.calls[0][0]).toBe(
      'https://tfe.example.test/api/v2/workspaces/ws-abc123/current-state-version',
    )
  })

  describe('no current state version', () => {
    const missing = () => new Response('{"errors":[{"status":"404"}]}', { status: 404 })

    test('releases the response body', async () => {
      const response = missing()
      const fetch = createFetch({ version: () => response })

      await createSource(fetch).fetchCurrentState('ws-abc123', { ignoreEmpty: true })

      expect(response.bodyUsed).toBe(true)
    })

    test('throws StateVersionNotFoundError by default', async () => {
      const fetch = createFetch({ version: missing })

      await expect(createSource(fetch).fetchCurrentState('ws-abc123')).rejects.toBeInstanceOf(
        StateVersionNotFoundError,
      )
      expect(fetch).toHaveBeenCalledTimes(1)
    })

    test('is ignored with ignoreEmpty', async () => {
      const fetch = createFetch({ version: missing })

      const result = await createSource(fetch).fetchCurrentState('ws-abc123', {
        ignoreEmpty: true,
      })

      expect(result).toEqual({ ignored: true })
      expect(fetch).toHaveBeenCalledTimes(1)
    })
  })

  test('ignoreEmpty does not hide other failures', async () => {
    const fetch = createFetch({
      version: () => new Response('boom', { status: 500 }),
    })

    const error = await createSource(fetch)
      .fetchCurrentState('ws-abc123', { ignoreEmpty: true })
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(StateSourceError)
    expect(error).toMatchObject({
      operation: 'read current state version',
      workspaceId: 'ws-abc123',
      message: '500: boom',
      reason: 'server_error',
    })
  })

  test('rejects an invalid workspace id without calling the API', async () => {
    const fetch = createFetch({})

    await expect(createSource(fetch).fetchCurrentState('ws/../admin')).rejects.toMatchObject({
      name: 'StateSourceError',
      message: 'invalid value for workspace ID',
      reason: 'invalid_request',
    })
    expect(fetch).not.toHaveBeenCalled()
  })

  test('fails when the state version has no download url', async () => {
    const fetch = createFetch({ version: () => jsonApi(stateVersion(null)) })

    await expect(createSource(fetch).fetchCurrentState('ws-abc123')).rejects.toMatchObject({
      operation: 'read current state version',
      message: 'state version sv-abc has no download url',
      reason: 'invalid_response',
    })
    expect(fetch).toHaveBeenCalledTimes(1)
  })

  test('fails on an unexpected payload', async () => {
    const fetch = createFetch({ version: () => jsonApi({ errors: [] }) })

    await expect(createSource(fetch).fetchCurrentState('ws-abc123')).rejects.toMatchObject({
      message: 'unexpected state version payload',
    })
  })

  test('reports a failed download', async () => {
    const fetch = createFetch({
      download: () => new Response('denied', { status: 403 }),
    })

    await expect(createSource(fetch).fetchCurrentState('ws-abc123')).rejects.toMatchObject({
      name: 'StateSourceError',
      operation: 'download state',
      message: '403: denied',
      reason: 'permission_denied',
    })
  })

  test('wraps transport errors', async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new Error('connection refused')
    })
    const source = new TfeStateSource({ token: 'test-token', address: ADDRESS, fetch })

    await expect(source.fetchCurrentState('ws-abc123')).rejects.toMatchObject({
      name: 'StateSourceError',
      operation: 'read current state version',
      message: 'connection refused',
      reason: 'network_error',
    })
  })

  test('reports an aborted request as a timeout', async () => {
    const timeout = new Error('The operation was aborted due to timeout')
    timeout.name = 'TimeoutError'
    const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw timeout
    })
    const source = new TfeStateSource({ token: 'test-token', address: ADDRESS, fetch })

    await expect(source.fetchCurrentState('ws-abc123')).rejects.toMatchObject({
      reason: 'timeout',
    })
  })
})
