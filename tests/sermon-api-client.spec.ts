/**
 * HTTP client for the sermon backend, against an injected fetch
 */

import { test, expect } from '@playwright/test'
import {
  ApiRequestError,
  SermonApiClient,
  classifyConnectionError,
  parseProcessingJob,
  parseSseEvents
} from '../src/services/sermonApiClient'
import type { ProgressUpdate } from '../src/types/sermon'
import { job } from './test-utils'

interface RecordedRequest {
  url: string
  method: string
  headers: Headers
  body: string | null
}

type Responder = (request: RecordedRequest, signal: AbortSignal | null) => Response | Promise<Response>

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  return input instanceof URL ? input.href : input.url
}

function fakeFetch(responders: Responder[]): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    const body = init?.body
    const request: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof body === 'string' ? body : body instanceof Uint8Array ? Buffer.from(body).toString() : null
    }
    requests.push(request)

    const responder = responders[Math.min(requests.length - 1, responders.length - 1)]
    return responder(request, init?.signal ?? null)
  }
  return { fetchImpl, requests }
}

function json(status: number, value: unknown): Response {
  return new Response(JSON.stringify(value), { status, headers: { 'Content-Type': 'application/json' } })
}

function client(fetchImpl: typeof fetch): SermonApiClient {
  return new SermonApiClient({
    baseUrl: 'http://sermons.test/api/',
    retryDelayMs: 1,
    getAccessToken: () => 'test-token',
    fetchImpl
  })
}

function sse(update: ProgressUpdate): string {
  return `data: ${JSON.stringify(update)}\n\n`
}

/**
 * Event-stream body whose reads fail once the request is aborted, like a
 * real fetch body
 */
function eventStream(parts: string[], signal: AbortSignal | null, close: boolean): Response {
  const encoder = new TextEncoder()
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part))
      if (close) {
        controller.close()
      } else {
        signal?.addEventListener('abort', () => controller.error(new Error('aborted')), { once: true })
      }
    }
  })
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } })
}

test.describe('SermonApiClient storage', () => {
  test('PUTs chunk bytes under an encoded path with auth', async () => {
    const { fetchImpl, requests } = fakeFetch([() => new Response(null, { status: 201 })])

    const stored = await client(fetchImpl).upload('user-1/my sermon/chunk_000.wav', Buffer.from('RIFF'), 'audio/wav')

    expect(stored).toBe('user-1/my sermon/chunk_000.wav')
    expect(requests).toHaveLength(1)
    expect(requests[0].url).toBe('http://sermons.test/api/storage/user-1/my%20sermon/chunk_000.wav')
    expect(requests[0].method).toBe('PUT')
    expect(requests[0].body).toBe('RIFF')
    expect(requests[0].headers.get('content-type')).toBe('audio/wav')
    expect(requests[0].headers.get('authorization')).toBe('Bearer test-token')
  })

  test('retries server errors and then succeeds', async () => {
    const { fetchImpl, requests } = fakeFetch([
      () => new Response(null, { status: 503 }),
      () => new Response(null, { status: 200 })
    ])

    await client(fetchImpl).upload('u/s/chunk_000.wav', Buffer.alloc(2), 'audio/wav')
    expect(requests).toHaveLength(2)
  })

  test('persistent server errors become upload failures with the server message', async () => {
    const { fetchImpl, requests } = fakeFetch([() => json(503, { error: { message: 'storage offline' } })])

    await expect(client(fetchImpl).upload('u/s/chunk_000.wav', Buffer.alloc(2), 'audio/wav')).rejects.toMatchObject({
      code: 'UPLOAD_FAILED',
      message: 'Upload failed: storage offline'
    })
    expect(requests).toHaveLength(3)
  })

  test('a refused connection is not retried', async () => {
    const { fetchImpl, requests } = fakeFetch([
      () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:443')
      }
    ])

    await expect(client(fetchImpl).upload('u/s/chunk_000.wav', Buffer.alloc(2), 'audio/wav')).rejects.toMatchObject({
      code: 'UPLOAD_FAILED',
      message: 'Upload failed: Connection refused. Ensure the sermon server is reachable.'
    })
    expect(requests).toHaveLength(1)
  })

  test('network errors are retried', async () => {
    const { fetchImpl, requests } = fakeFetch([
      () => {
        throw new TypeError('fetch failed')
      },
      () => new Response(null, { status: 200 })
    ])

    await client(fetchImpl).upload('u/s/chunk_000.wav', Buffer.alloc(2), 'audio/wav')
    expect(requests).toHaveLength(2)
  })
})

test.describe('SermonApiClient jobs', () => {
  test('enqueue posts the sermon id and accepts an existing job', async () => {
    const { fetchImpl, requests } = fakeFetch([
      () => new Response(null, { status: 202 }),
      () => new Response(null, { status: 409 })
    ])
    const api = client(fetchImpl)

    await api.enqueue('sermon-1')
    await api.enqueue('sermon-1')

    expect(requests.map(request => [request.method, request.url, request.body])).toEqual([
      ['POST', 'http://sermons.test/api/jobs', '{"sermonId":"sermon-1"}'],
      ['POST', 'http://sermons.test/api/jobs', '{"sermonId":"sermon-1"}']
    ])
  })

  test('enqueue surfaces client errors', async () => {
    const { fetchImpl } = fakeFetch([() => json(400, { error: 'unknown sermon' })])

    const failure = client(fetchImpl).enqueue('sermon-1')
    await expect(failure).rejects.toBeInstanceOf(ApiRequestError)
    await expect(failure).rejects.toMatchObject({ message: 'unknown sermon', statusCode: 400 })
  })

  test('getStatus parses the job record', async () => {
    const { fetchImpl } = fakeFetch([
      () => json(200, job('sermon-1', 'succeeded', 'running')),
      () => new Response(null, { status: 404 }),
      () => json(200, { sermonId: 'sermon-1', transcriptionStatus: 'done' })
    ])
    const api = client(fetchImpl)

    expect(await api.getStatus('sermon-1')).toEqual(job('sermon-1', 'succeeded', 'running'))
    expect(await api.getStatus('sermon-1')).toBeNull()
    await expect(api.getStatus('sermon-1')).rejects.toThrow('Malformed job record')
  })

  test('progress stream parses events, drops regressions and ends on a terminal job', async () => {
    const running = job('sermon-1', 'running', 'pending')
    const done = job('sermon-1', 'succeeded', 'succeeded')
    const body = [
      sse({ job: running, progress: 0.1 }),
      sse({ job: running, progress: 0.05 }) + `data: ${JSON.stringify({ job: running, progress: 0.5 })}`,
      '\n\n: keep-alive\n\n' + sse({ job: done, progress: 1 }) + sse({ job: done, progress: 1 })
    ]
    const { fetchImpl, requests } = fakeFetch([(_, signal) => eventStream(body, signal, true)])

    const updates: ProgressUpdate[] = []
    for await (const update of client(fetchImpl).progressStream('sermon-1')) {
      updates.push(update)
    }

    expect(updates.map(update => update.progress)).toEqual([0.1, 0.5, 1])
    expect(updates[2].job).toEqual(done)
    expect(requests[0].url).toBe('http://sermons.test/api/jobs/sermon-1/events')
    expect(requests[0].headers.get('accept')).toBe('text/event-stream')
  })

  test('aborting ends an open progress stream', async () => {
    const running = job('sermon-1', 'running', 'pending')
    const { fetchImpl } = fakeFetch([(_, signal) => eventStream([sse({ job: running, progress: 0.3 })], signal, false)])
    const controller = new AbortController()

    const iterator = client(fetchImpl).progressStream('sermon-1', controller.signal)[Symbol.asyncIterator]()
    expect((await iterator.next()).value).toEqual({ job: running, progress: 0.3 })

    const next = iterator.next()
    controller.abort()
    expect((await next).done).toBe(true)
  })
})

test.describe('wire helpers', () => {
  test('parseSseEvents joins data lines and keeps the incomplete tail', () => {
    expect(parseSseEvents('data: a\r\ndata: b\r\n\r\nevent: ping\n\ndata: partial')).toEqual({
      events: ['a\nb'],
      rest: 'data: partial'
    })
  })

  test('parseSseEvents keeps a CRLF split across reads inside one event', () => {
    const first = parseSseEvents('data: a\r')
    expect(first).toEqual({ events: [], rest: 'data: a\r' })

    const second = parseSseEvents(first.rest + '\ndata: b\r\n\r\n')
    expect(second).toEqual({ events: ['a\nb'], rest: '' })
  })

  test('parseProcessingJob validates statuses', () => {
    expect(parseProcessingJob({ sermonId: 's', transcriptionStatus: 'failed', studyGuideStatus: 'pending', transcriptionError: 'x' })).toEqual({
      sermonId: 's',
      transcriptionStatus: 'failed',
      studyGuideStatus: 'pending',
      transcriptionError: 'x',
      studyGuideError: null
    })
    expect(parseProcessingJob({ sermonId: 's', transcriptionStatus: 'queued', studyGuideStatus: 'pending' })).toBeNull()
    expect(parseProcessingJob(null)).toBeNull()
  })

  test('classifyConnectionError', () => {
    const timeout = new Error('The operation was aborted due to timeout')
    timeout.name = 'TimeoutError'

    expect(classifyConnectionError(timeout)).toMatchObject({ type: 'timeout', retryable: true })
    expect(classifyConnectionError(new Error('getaddrinfo ENOTFOUND sermons.test'))).toMatchObject({
      type: 'network_error',
      retryable: true
    })
    expect(classifyConnectionError(new SyntaxError('Unexpected token < in JSON'))).toMatchObject({
      type: 'parse_error',
      retryable: false
    })
    expect(classifyConnectionError('boom')).toEqual({
      type: 'unknown',
      message: 'An unknown error occurred',
      retryable: false
    })
  })
})
