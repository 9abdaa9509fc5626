/**
 * Sermon API Client
 *
 * HTTP client for the sermon processing backend. Implements both remote
 * chunk storage and the processing job queue:
 *
 *   PUT  /storage/<path>      chunk bytes
 *   POST /jobs                enqueue { sermonId }
 *   GET  /jobs/<id>           job snapshot
 *   GET  /jobs/<id>/events    Server-Sent Events, one ProgressUpdate per event
 *
 * Requests carry a timeout and are retried with backoff on retryable
 * connection errors. The event stream has no timeout; it ends on a terminal
 * job, when the server closes it, or when the caller aborts.
 */

import { loggerService } from './loggerService'
import { SermonErrors } from './sermonErrors'
import { isTerminalJob } from './sermonStatus'
import type { ProcessingJobQueue, RemoteStorage } from '../types/collaborators'
import type { ProcessingJob, ProcessingStatus, ProgressUpdate } from '../types/sermon'

const log = loggerService.scope('SermonApiClient')

// ============================================================================
// Types
// ============================================================================

export interface SermonApiClientConfig {
  /** Base URL of the backend */
  baseUrl: string
  /** Request timeout in milliseconds */
  timeout: number
  /** Number of retry attempts for retryable failures */
  retryAttempts: number
  /** Base delay between retry attempts in milliseconds */
  retryDelayMs: number
  /** Bearer token source; no Authorization header when it returns null */
  getAccessToken?: () => string | null
  fetchImpl?: typeof fetch
}

export type ConnectionErrorType =
  | 'timeout'
  | 'connection_refused'
  | 'network_error'
  | 'parse_error'
  | 'unknown'

export interface ConnectionError {
  type: ConnectionErrorType
  message: string
  originalError?: Error
  retryable: boolean
}

export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly statusCode: number | null,
    readonly connection: ConnectionError | null = null
  ) {
    super(message)
    this.name = 'ApiRequestError'
  }
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT'
  body?: Buffer | string
  contentType?: string
  timeout?: number
  retries?: number
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_API_CLIENT_CONFIG: Omit<SermonApiClientConfig, 'baseUrl'> = {
  timeout: 30000,
  retryAttempts: 2,
  retryDelayMs: 1000
}

// ============================================================================
// Helper Functions
// ============================================================================

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const JOB_STEP_STATUSES: readonly ProcessingStatus[] = ['pending', 'running', 'succeeded', 'failed']

function isJobStepStatus(value: unknown): value is ProcessingStatus {
  return typeof value === 'string' && JOB_STEP_STATUSES.some(status => status === value)
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null
}

/**
 * Classify fetch failures so only transient ones are retried
 */
export function classifyConnectionError(error: unknown): ConnectionError {
  if (error instanceof Error) {
    const message = error.message.toLowerCase()

    if (error.name === 'TimeoutError' || message.includes('timeout') || message.includes('timed out')) {
      return {
        type: 'timeout',
        message: 'Request timed out. The server may be overloaded or unresponsive.',
        originalError: error,
        retryable: true
      }
    }

    if (message.includes('econnrefused') || message.includes('connection refused')) {
      return {
        type: 'connection_refused',
        message: 'Connection refused. Ensure the sermon server is reachable.',
        originalError: error,
        retryable: false
      }
    }

    if (message.includes('network') || message.includes('enotfound') || message.includes('fetch failed')) {
      return {
        type: 'network_error',
        message: 'Network error. Check your connection and server address.',
        originalError: error,
        retryable: true
      }
    }

    if (error instanceof SyntaxError || message.includes('json')) {
      return {
        type: 'parse_error',
        message: 'Failed to parse server response.',
        originalError: error,
        retryable: false
      }
    }

    return {
      type: 'unknown',
      message: error.message,
      originalError: error,
      retryable: true
    }
  }

  return {
    type: 'unknown',
    message: 'An unknown error occurred',
    retryable: false
  }
}

/**
 * Validate a job record received from the server
 */
export function parseProcessingJob(value: unknown): ProcessingJob | null {
  if (!isRecord(value)) return null
  const { sermonId, transcriptionStatus, studyGuideStatus } = value
  if (typeof sermonId !== 'string') return null
  if (!isJobStepStatus(transcriptionStatus) || !isJobStepStatus(studyGuideStatus)) return null

  return {
    sermonId,
    transcriptionStatus,
    studyGuideStatus,
    transcriptionError: optionalString(value.transcriptionError),
    studyGuideError: optionalString(value.studyGuideError)
  }
}

export function parseProgressUpdate(data: string): ProgressUpdate | null {
  let value: unknown
  try {
    value = JSON.parse(data)
  } catch {
    log.warn('Ignoring malformed progress event', { data })
    return null
  }
  if (!isRecord(value) || typeof value.progress !== 'number') return null

  const job = parseProcessingJob(value.job)
  return job ? { job, progress: value.progress } : null
}

/**
 * Split buffered SSE text into the data payloads of complete events.
 * Whatever follows the last blank line comes back as `rest`. A trailing
 * `\r` stays in `rest`, since the next read may start with its `\n`.
 */
export function parseSseEvents(buffer: string): { events: string[]; rest: string } {
  const heldCr = buffer.endsWith('\r')
  const text = heldCr ? buffer.slice(0, -1) : buffer
  const blocks = text.replace(/\r\n?/g, '\n').split('\n\n')
  const rest = (blocks.pop() ?? '') + (heldCr ? '\r' : '')
  const events: string[] = []

  for (const block of blocks) {
    const data = block
      .split('\n')
      .filter(line => line.startsWith('data:'))
      .map(line => line.slice(5).replace(/^ /, ''))
    if (data.length > 0) {
      events.push(data.join('\n'))
    }
  }

  return { events, rest }
}

// ============================================================================
// Sermon API Client Class
// ============================================================================

export class SermonApiClient implements RemoteStorage, ProcessingJobQueue {
  private config: SermonApiClientConfig

  constructor(config: Partial<SermonApiClientConfig> & { baseUrl: string }) {
    this.config = { ...DEFAULT_API_CLIENT_CONFIG, ...config }
  }

  updateConfig(config: Partial<SermonApiClientConfig>): void {
    this.config = { ...this.config, ...config }
  }

  getConfig(): SermonApiClientConfig {
    return { ...this.config }
  }

  // --------------------------------------------------------------------------
  // Core HTTP Methods
  // --------------------------------------------------------------------------

  private get fetchImpl(): typeof fetch {
    return this.config.fetchImpl ?? fetch
  }

  private url(endpoint: string): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}${endpoint}`
  }

  private headers(contentType?: string): Record<string, string> {
    const headers: Record<string, string> = {}
    if (contentType) headers['Content-Type'] = contentType
    const token = this.config.getAccessToken?.()
    if (token) headers.Authorization = `Bearer ${token}`
    return headers
  }

  /**
   * Make an HTTP request with timeout and retries. Connection failures and
   * 5xx responses are retried; any other response goes back to the caller.
   */
  private async makeRequest(endpoint: string, options: RequestOptions = {}): Promise<Response> {
    const {
      method = 'GET',
      body,
      contentType,
      timeout = this.config.timeout,
      retries = this.config.retryAttempts
    } = options

    let lastError: ConnectionError | null = null

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const response = await this.fetchImpl(this.url(endpoint), {
          method,
          headers: this.headers(contentType),
          body,
          signal: AbortSignal.timeout(timeout)
        })

        if (response.status >= 500 && attempt < retries) {
          log.warn('Server error, retrying', { endpoint, status: response.status, attempt })
          await delay(this.config.retryDelayMs * (attempt + 1))
          continue
        }
        return response
      } catch (error) {
        lastError = classifyConnectionError(error)

        if (lastError.retryable && attempt < retries) {
          log.debug('Request failed, retrying', { endpoint, attempt, reason: lastError.type })
          await delay(this.config.retryDelayMs * (attempt + 1))
          continue
        }
        break
      }
    }

    throw new ApiRequestError(lastError?.message ?? 'Request failed after retries', null, lastError)
  }

  private async errorFrom(response: Response): Promise<ApiRequestError> {
    let message = `Server returned status ${response.status}`
    try {
      const data: unknown = await response.json()
      if (isRecord(data)) {
        if (isRecord(data.error) && typeof data.error.message === 'string') {
          message = data.error.message
        } else if (typeof data.error === 'string') {
          message = data.error
        }
      }
    } catch (error) {
      log.debug('Error response has no JSON body', {
        status: response.status,
        error: error instanceof Error ? error.message : String(error)
      })
    }
    return new ApiRequestError(message, response.status)
  }

  // --------------------------------------------------------------------------
  // Remote Storage
  // --------------------------------------------------------------------------

  async upload(remotePath: string, data: Buffer, contentType: string): Promise<string> {
    const encoded = remotePath.split('/').map(encodeURIComponent).join('/')
    let response: Response
    try {
      response = await this.makeRequest(`/storage/${encoded}`, {
        method: 'PUT',
        body: data,
        contentType
      })
    } catch (error) {
      throw SermonErrors.uploadFailed(error instanceof Error ? error.message : String(error))
    }

    if (!response.ok) {
      const error = await this.errorFrom(response)
      throw SermonErrors.uploadFailed(error.message)
    }

    log.debug('Chunk stored', { remotePath, bytes: data.length })
    return remotePath
  }

  // --------------------------------------------------------------------------
  // Processing Job Queue
  // --------------------------------------------------------------------------

  async enqueue(sermonId: string): Promise<void> {
    const response = await this.makeRequest('/jobs', {
      method: 'POST',
      body: JSON.stringify({ sermonId }),
      contentType: 'application/json'
    })

    // 409: a job for this sermon already exists
    if (!response.ok && response.status !== 409) {
      throw await this.errorFrom(response)
    }
    log.info('Job enqueued', { sermonId, status: response.status })
  }

  async getStatus(sermonId: string): Promise<ProcessingJob | null> {
    const response = await this.makeRequest(`/jobs/${encodeURIComponent(sermonId)}`)
    if (response.status === 404) return null
    if (!response.ok) {
      throw await this.errorFrom(response)
    }

    const job = parseProcessingJob(await response.json())
    if (!job) {
      throw new ApiRequestError('Malformed job record', response.status)
    }
    return job
  }

  progressStream(sermonId: string, signal?: AbortSignal): AsyncIterable<ProgressUpdate> {
    return this.streamEvents(sermonId, signal)
  }

  private async *streamEvents(
    sermonId: string,
    signal?: AbortSignal
  ): AsyncGenerator<ProgressUpdate, void, undefined> {
    if (signal?.aborted) return

    let response: Response
    try {
      response = await this.fetchImpl(this.url(`/jobs/${encodeURIComponent(sermonId)}/events`), {
        headers: { ...this.headers(), Accept: 'text/event-stream' },
        signal
      })
    } catch (error) {
      if (signal?.aborted) return
      const connection = classifyConnectionError(error)
      throw new ApiRequestError(connection.message, null, connection)
    }

    if (!response.ok) {
      throw await this.errorFrom(response)
    }

    const body = response.body
    if (!body) return

    const reader = body.getReader()
    const decoder = new TextDecoder()
    let buffer = ''
    let last = -1

    try {
      while (!signal?.aborted) {
        const chunk = await reader.read().catch((error: unknown) => {
          if (signal?.aborted) return null
          throw error
        })
        if (!chunk || chunk.done) return

        buffer += decoder.decode(chunk.value, { stream: true })
        const parsed = parseSseEvents(buffer)
        buffer = parsed.rest

        for (const data of parsed.events) {
          const update = parseProgressUpdate(data)
          if (!update || update.progress < last) continue
          last = update.progress

          yield update
          if (isTerminalJob(update.job)) return
        }
      }
    } finally {
      reader.releaseLock()
      await body.cancel().catch((error: unknown) => {
        log.debug('Event stream cancel failed', { error: error instanceof Error ? error.message : String(error) })
      })
    }
  }
}
