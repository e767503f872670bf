import { afterEach, describe, expect, it, vi } from 'vitest'
import { DrawTransport, retryDelayMs } from '../transport.js'
import type { DrawRequest } from '../types.js'
import { fakeClock, jsonResponse, stubFetch } from './helpers.js'

const request: DrawRequest = {
  url: 'https://api.example.test/draws?openDate=2025-08-19',
  method: 'GET',
  headers: { accept: 'application/json' },
}

function transport(maxRetries = 2) {
  const clock = fakeClock()
  const client = new DrawTransport({
    retryPolicy: { maxRetries, delayMs: 100, backoff: 'linear' },
    clock,
  })
  return { clock, client }
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('retryDelayMs', () => {
  it('grows linearly or stays fixed', () => {
    expect(retryDelayMs({ maxRetries: 3, delayMs: 100, backoff: 'linear' }, 3)).toBe(300)
    expect(retryDelayMs({ maxRetries: 3, delayMs: 100, backoff: 'fixed' }, 3)).toBe(100)
  })
})

describe('DrawTransport', () => {
  it('returns the decoded payload on success', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ content: { totalSize: 1 } }))
    const { client } = transport()

    const result = await client.execute(request, 'json')

    expect(result.outcome).toEqual({
      kind: 'success',
      statusCode: 200,
      body: '{"content":{"totalSize":1}}',
      payload: { content: { totalSize: 1 } },
    })
    expect(result.attempts).toBe(1)
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'GET', headers: { accept: 'application/json' } })
  })

  it('retries a server error on the same request with linear backoff', async () => {
    const statuses = [500, 502]
    stubFetch(() => {
      const status = statuses.shift()
      return status ? new Response('busy', { status }) : jsonResponse([])
    })
    const { client, clock } = transport()

    const result = await client.execute(request, 'json')

    expect(result.outcome).toMatchObject({ kind: 'success', payload: [] })
    expect(result.attempts).toBe(3)
    expect(clock.sleeps).toEqual([100, 200])
  })

  it('gives up after maxRetries and reports the last server error', async () => {
    const fetchMock = stubFetch(() => new Response('down', { status: 503 }))
    const { client } = transport(2)

    const result = await client.execute(request, 'json')

    expect(result.outcome).toEqual({ kind: 'server_error', statusCode: 503 })
    expect(result.attempts).toBe(3)
    expect(fetchMock).toHaveBeenCalledTimes(3)
  })

  it('never retries a client error', async () => {
    const fetchMock = stubFetch(() => new Response('missing', { status: 404 }))
    const { client, clock } = transport()

    const result = await client.execute(request, 'json')

    expect(result.outcome).toEqual({ kind: 'client_error', statusCode: 404 })
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(clock.sleeps).toEqual([])
  })

  it('treats rate limiting as a client error', async () => {
    stubFetch(() => new Response('slow down', { status: 429 }))
    const { client } = transport()

    const result = await client.execute(request, 'json')

    expect(result.outcome).toEqual({ kind: 'client_error', statusCode: 429 })
    expect(result.attempts).toBe(1)
  })

  it('classifies blank and undecodable bodies as empty', async () => {
    const { client } = transport()

    stubFetch(() => new Response('  \n', { status: 200 }))
    expect((await client.execute(request, 'json')).outcome).toEqual({
      kind: 'empty',
      statusCode: 200,
      reason: 'EMPTY_BODY',
    })

    stubFetch(() => new Response('<html>maintenance</html>', { status: 200 }))
    expect((await client.execute(request, 'json')).outcome).toEqual({
      kind: 'empty',
      statusCode: 200,
      reason: 'INVALID_JSON',
    })
  })

  it('returns the raw body in text mode', async () => {
    stubFetch(() => new Response('<html>draws</html>', { status: 200 }))
    const { client } = transport()

    const result = await client.execute(request, 'text')

    expect(result.outcome).toEqual({
      kind: 'success',
      statusCode: 200,
      body: '<html>draws</html>',
      payload: '<html>draws</html>',
    })
  })

  it('retries network failures', async () => {
    const fetchMock = stubFetch(() => {
      throw new TypeError('fetch failed')
    })
    const { client } = transport(1)

    const result = await client.execute(request, 'json')

    expect(result.outcome).toEqual({ kind: 'transport_failure', cause: 'fetch failed' })
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('aborts a call that exceeds the timeout', async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('This operation was aborted')
            error.name = 'AbortError'
            reject(error)
          })
        })
    )
    const client = new DrawTransport({
      retryPolicy: { maxRetries: 0, delayMs: 0, backoff: 'fixed' },
      timeoutMs: 20,
      clock: fakeClock(),
    })

    const result = await client.execute(request, 'json')

    expect(result.outcome).toEqual({ kind: 'transport_failure', cause: 'timed out after 20ms' })
  })
})
