/**
 * Flow Orchestrator
 *
 * Drives one sermon through capture (recording or import), persistence,
 * upload, remote processing and viewing. Every mutating entry point runs on
 * a SerialTaskQueue; processing itself runs as a separate task that reset()
 * and enterBackground() can abort. The observable state lives in a zustand
 * store and only changes through flowReducer actions.
 */

import * as fs from 'fs'
import { randomUUID } from 'crypto'
import { createAudioChunkDraft } from './audioChunkService'
import type { AudioCaptureService, ChunkCompletedEvent } from './audioCaptureService'
import { detectAudioFormat } from './audioFormats'
import { AudioLevelHistory } from './audioLevelHistory'
import { ChunkUploader } from './chunkUploader'
import {
  canStartRecording,
  meetsMinimumDuration,
  type FlowState
} from './flowState'
import type { ImportedAudio, ImportValidator } from './importValidator'
import { loggerService } from './loggerService'
import { mediaMetadataService, type MediaMetadataService } from './mediaMetadataService'
import { ProcessingSteps, mapCompositeProgress, stepProgress } from './progressMapping'
import { SerialTaskQueue } from './serialTaskQueue'
import type { SermonCaptureConfig } from './sermonConfig'
import { SermonErrors, toSermonError, type SermonError } from './sermonErrors'
import { createSermonDraft } from './sermonService'
import { isJobComplete, isTerminalJob, jobFromSermon } from './sermonStatus'
import { generateWaveformSamples } from './wavUtils'
import { createFlowStore, type FlowAction, type FlowStore } from '../stores/flow-store'
import type {
  AuthProvider,
  ProcessingJobQueue,
  SermonContentReader,
  SermonSync
} from '../types/collaborators'
import type {
  AudioChunk,
  BookmarkLabel,
  CreateBookmarkInput,
  ProcessingJob,
  Sermon,
  SermonBookmark,
  StudyGuide,
  Transcript
} from '../types/sermon'

const log = loggerService.scope('FlowOrchestrator')

/**
 * Local record keeping the orchestrator needs beyond SermonSync
 */
export interface SermonRecordStore {
  applyJobStatus(job: ProcessingJob): Sermon | null
  getChunks(sermonId: string): AudioChunk[]
  addBookmark(input: CreateBookmarkInput): SermonBookmark
}

export interface FlowOrchestratorOptions {
  auth: AuthProvider
  capture: AudioCaptureService
  importValidator: ImportValidator
  sync: SermonSync
  jobQueue: ProcessingJobQueue
  content: SermonContentReader
  records: SermonRecordStore
  config: SermonCaptureConfig
  metadata?: MediaMetadataService
  store?: FlowStore
  now?: () => number
}

export interface BookmarkOptions {
  label?: BookmarkLabel
  note?: string | null
  /** Defaults to the elapsed recording time while recording, else 0 */
  timestampSeconds?: number
}

type PendingBookmark = Omit<CreateBookmarkInput, 'sermon_id' | 'user_id'>

type ProcessingSource =
  | { kind: 'recorded'; paths: string[] }
  | { kind: 'imported'; chunk: AudioChunk }
  | { kind: 'existing'; chunks: AudioChunk[] }

interface RecordingSession {
  seconds: number
  timer: NodeJS.Timeout
  levels: AbortController
  onChunk: (event: ChunkCompletedEvent) => void
  onError: (error: SermonError) => void
}

interface ProcessingRun {
  controller: AbortController
  /** Aborted alone when only progress following stops */
  follow: AbortController
  done: Promise<void>
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function withJobStatus(sermon: Sermon, job: ProcessingJob): Sermon {
  return {
    ...sermon,
    transcription_status: job.transcriptionStatus,
    transcription_error: job.transcriptionError,
    study_guide_status: job.studyGuideStatus,
    study_guide_error: job.studyGuideError
  }
}

export class FlowOrchestrator {
  readonly store: FlowStore
  private readonly queue = new SerialTaskQueue()
  private readonly uploader: ChunkUploader
  private readonly metadata: MediaMetadataService
  private readonly now: () => number
  private recording: RecordingSession | null = null
  private processing: ProcessingRun | null = null
  private pendingBookmarks: PendingBookmark[] = []
  private sermonPersisted = false

  constructor(private readonly deps: FlowOrchestratorOptions) {
    this.store = deps.store ?? createFlowStore()
    this.uploader = new ChunkUploader(deps.sync)
    this.metadata = deps.metadata ?? mediaMetadataService
    this.now = deps.now ?? Date.now
  }

  getState(): FlowState {
    return this.store.getState()
  }

  get config(): SermonCaptureConfig {
    return this.deps.config
  }

  setDetails(details: { title?: string; speakerName?: string }): void {
    this.dispatch({ type: 'details/set', ...details })
  }

  /**
   * Resolves once the current processing task, if any, has finished
   */
  async waitForProcessing(): Promise<void> {
    await this.processing?.done
  }

  // --------------------------------------------------------------------------
  // Recording
  // --------------------------------------------------------------------------

  startRecording(): Promise<void> {
    return this.queue.run(async () => {
      if (!canStartRecording(this.getState())) return

      await this.refreshSession()
      const userId = this.deps.auth.currentUserId()
      if (!userId) {
        this.fail(SermonErrors.notAuthenticated())
        return
      }

      const state = this.getState()
      const sermon = createSermonDraft({
        user_id: userId,
        title: state.title,
        speaker_name: state.speakerName.trim() || null
      })

      const levels = new AudioLevelHistory(this.deps.config.levelHistorySize)
      try {
        await this.deps.capture.start(sermon.id, {
          chunkDurationSeconds: this.deps.config.chunkDurationSeconds,
          levels
        })
      } catch (error) {
        this.fail(toSermonError(error, SermonErrors.recordingFailed))
        return
      }

      this.sermonPersisted = false
      this.pendingBookmarks = []
      this.dispatch({ type: 'recording/started', sermon })
      this.beginRecordingSession(levels)
      log.info('Recording started', { sermonId: sermon.id })
    })
  }

  pauseRecording(): void {
    const state = this.getState()
    if (state.phase.kind !== 'recording' || !state.isRecording || state.isPaused) return
    this.deps.capture.pause()
    this.dispatch({ type: 'recording/paused' })
  }

  resumeRecording(): void {
    const state = this.getState()
    if (state.phase.kind !== 'recording' || !state.isPaused) return
    this.deps.capture.resume()
    this.dispatch({ type: 'recording/resumed' })
  }

  /**
   * Below the minimum duration this only raises RECORDING_TOO_SHORT and
   * keeps recording.
   */
  stopRecording(): Promise<void> {
    return this.queue.run(async () => {
      const state = this.getState()
      const sermon = state.currentSermon
      if (state.phase.kind !== 'recording' || !state.isRecording || !sermon) return

      const minimum = this.deps.config.minimumRecordingSeconds
      if (!meetsMinimumDuration(state, minimum)) {
        this.dispatch({
          type: 'error/raised',
          error: SermonErrors.recordingTooShort(Math.floor(state.recordingDuration), minimum)
        })
        return
      }

      this.endRecordingSession()
      let paths: string[]
      try {
        paths = await this.deps.capture.stop()
      } catch (error) {
        this.fail(toSermonError(error, SermonErrors.recordingFailed))
        return
      }
      this.dispatch({ type: 'recording/stopped' })

      if (paths.length === 0) {
        this.fail(SermonErrors.recordingFailed('No audio was captured'))
        return
      }

      log.info('Recording stopped', { sermonId: sermon.id, chunkCount: paths.length })
      this.startProcessing(sermon, { kind: 'recorded', paths })
    })
  }

  /**
   * Discard the recording; nothing is persisted
   */
  cancelRecording(): Promise<void> {
    return this.queue.run(async () => {
      if (this.getState().phase.kind !== 'recording') return

      this.endRecordingSession()
      await this.deps.capture.cancel()
      this.pendingBookmarks = []
      this.dispatch({ type: 'recording/cancelled' })
      log.info('Recording cancelled')
    })
  }

  /**
   * While recording the bookmark is buffered until the sermon is saved and
   * null is returned; while viewing it is saved right away.
   */
  async addBookmark(options: BookmarkOptions = {}): Promise<SermonBookmark | null> {
    const state = this.getState()
    const sermon = state.currentSermon
    if (!sermon) return null

    if (state.phase.kind === 'recording') {
      this.pendingBookmarks.push({
        timestamp_seconds: options.timestampSeconds ?? state.recordingDuration,
        label: options.label,
        note: options.note ?? null
      })
      return null
    }

    if (state.phase.kind !== 'viewing') return null

    try {
      return this.deps.records.addBookmark({
        sermon_id: sermon.id,
        user_id: sermon.user_id,
        timestamp_seconds: options.timestampSeconds ?? 0,
        label: options.label,
        note: options.note ?? null
      })
    } catch (error) {
      log.warn('Failed to add bookmark', { sermonId: sermon.id, error: errorMessage(error) })
      return null
    }
  }

  // --------------------------------------------------------------------------
  // Import
  // --------------------------------------------------------------------------

  importAudio(sourcePath: string): Promise<void> {
    return this.queue.run(async () => {
      if (!canStartRecording(this.getState())) return

      await this.refreshSession()
      const userId = this.deps.auth.currentUserId()
      if (!userId) {
        this.fail(SermonErrors.notAuthenticated())
        return
      }

      this.dispatch({ type: 'import/started' })

      const sermonId = randomUUID()
      let imported: ImportedAudio
      try {
        imported = await this.deps.importValidator.importFile(sourcePath, sermonId)
      } catch (error) {
        this.fail(toSermonError(error, SermonErrors.importFailed))
        return
      }

      const state = this.getState()
      const sermon = createSermonDraft({
        id: sermonId,
        user_id: userId,
        title: state.title.trim() || imported.baseName,
        speaker_name: state.speakerName.trim() || null,
        duration_seconds: imported.durationSeconds,
        audio_file_size: imported.fileSize,
        audio_mime_type: imported.format.mimeType
      })

      this.sermonPersisted = false
      this.pendingBookmarks = []
      this.startProcessing(sermon, { kind: 'imported', chunk: imported.chunk })
    })
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Stop following progress. Pending uploads and the enqueue still run, so
   * the remote job exists; resume later through loadExistingSermon.
   */
  enterBackground(): void {
    const run = this.processing
    if (!run || run.follow.signal.aborted) return
    log.info('Processing moved to background', { sermonId: this.getState().currentSermon?.id })
    run.follow.abort()
  }

  /**
   * Replay processing from upload with the chunks already on disk
   */
  retry(): Promise<void> {
    return this.queue.run(async () => {
      const state = this.getState()
      if (state.phase.kind !== 'error') return

      const sermon = state.currentSermon
      if (!sermon || state.audioChunks.length === 0) {
        this.dispatch({ type: 'error/dismissed' })
        return
      }

      const pending: Sermon = {
        ...sermon,
        transcription_status: sermon.transcription_status === 'failed' ? 'pending' : sermon.transcription_status,
        study_guide_status: sermon.study_guide_status === 'failed' ? 'pending' : sermon.study_guide_status
      }
      log.info('Retrying processing', { sermonId: sermon.id })
      this.startProcessing(pending, { kind: 'existing', chunks: state.audioChunks })
    })
  }

  dismissError(): void {
    this.dispatch({ type: 'error/dismissed' })
  }

  reset(): Promise<void> {
    return this.queue.run(async () => {
      this.abortProcessing()
      if (this.recording) {
        this.endRecordingSession()
        await this.deps.capture.cancel()
      }
      this.pendingBookmarks = []
      this.sermonPersisted = false
      this.dispatch({ type: 'flow/reset' })
    })
  }

  loadExistingSermon(sermon: Sermon): Promise<void> {
    return this.queue.run(async () => {
      if (this.getState().phase.kind === 'recording') return

      this.abortProcessing()
      this.dispatch({ type: 'flow/reset' })

      let loaded = sermon
      try {
        loaded = (await this.deps.sync.loadSermon(sermon.id)) ?? sermon
      } catch (error) {
        log.warn('Failed to reload sermon', { sermonId: sermon.id, error: errorMessage(error) })
      }
      loaded = await this.refreshJobStatus(loaded)
      this.sermonPersisted = true

      const transcription = loaded.transcription_status
      const studyGuide = loaded.study_guide_status

      if (transcription === 'succeeded' && studyGuide === 'succeeded') {
        this.enterViewing(loaded)
      } else if (transcription === 'running' || studyGuide === 'running') {
        const chunks = this.readChunks(loaded.id)
        this.dispatch({ type: 'processing/chunks', sermon: loaded, chunks })
        this.dispatch({ type: 'processing/entered', step: ProcessingSteps.transcribing(0.5, 1, 1) })
        this.startRun((_, follow) => this.followProgress(loaded, chunks.length, follow))
      } else if (transcription === 'failed') {
        this.dispatch({ type: 'processing/sermon', sermon: loaded })
        this.fail(SermonErrors.transcriptionFailed(loaded.transcription_error ?? 'Processing failed'))
      } else {
        this.enterViewing(loaded)
      }
    })
  }

  // --------------------------------------------------------------------------
  // Recording session
  // --------------------------------------------------------------------------

  private beginRecordingSession(levels: AudioLevelHistory): void {
    const levelsController = new AbortController()
    const session: RecordingSession = {
      seconds: 0,
      levels: levelsController,
      timer: setInterval(() => {
        if (this.getState().isPaused) return
        session.seconds++
        this.dispatch({ type: 'recording/tick', seconds: session.seconds })
      }, this.deps.config.durationTickMs),
      onChunk: event => {
        this.dispatch({ type: 'recording/chunkCompleted', index: event.index })
      },
      onError: error => {
        this.queue.run(() => this.failRecording(session, error)).catch((failure: unknown) => {
          log.error('Could not stop failed recording', failure instanceof Error ? failure : { error: String(failure) })
        })
      }
    }

    this.deps.capture.on('chunk-completed', session.onChunk)
    this.deps.capture.on('error', session.onError)
    this.recording = session

    this.consumeLevels(levels, levelsController.signal).catch((error: unknown) => {
      log.warn('Level metering stopped', { error: errorMessage(error) })
    })
  }

  private async consumeLevels(levels: AudioLevelHistory, signal: AbortSignal): Promise<void> {
    for await (const snapshot of levels.stream(signal)) {
      this.dispatch({ type: 'recording/levels', levels: snapshot })
    }
  }

  private endRecordingSession(): void {
    const session = this.recording
    if (!session) return

    clearInterval(session.timer)
    session.levels.abort()
    this.deps.capture.off('chunk-completed', session.onChunk)
    this.deps.capture.off('error', session.onError)
    this.recording = null
  }

  private async failRecording(session: RecordingSession, error: SermonError): Promise<void> {
    if (this.recording !== session) return
    this.endRecordingSession()
    await this.deps.capture.cancel()
    this.pendingBookmarks = []
    this.dispatch({ type: 'recording/stopped' })
    this.fail(error)
  }

  // --------------------------------------------------------------------------
  // Processing
  // --------------------------------------------------------------------------

  /**
   * The remote job status when the local record has not seen it finish
   */
  private async refreshJobStatus(sermon: Sermon): Promise<Sermon> {
    if (isTerminalJob(jobFromSermon(sermon))) return sermon

    try {
      const job = await this.deps.jobQueue.getStatus(sermon.id)
      if (!job) return sermon
      return this.deps.records.applyJobStatus(job) ?? withJobStatus(sermon, job)
    } catch (error) {
      log.warn('Failed to refresh job status', { sermonId: sermon.id, error: errorMessage(error) })
      return sermon
    }
  }

  private readChunks(sermonId: string): AudioChunk[] {
    try {
      return this.deps.records.getChunks(sermonId)
    } catch (error) {
      log.warn('Failed to read chunks', { sermonId, error: errorMessage(error) })
      return []
    }
  }

  private startProcessing(sermon: Sermon, source: ProcessingSource): void {
    this.dispatch({ type: 'processing/started', sermon, startedAt: this.now() })
    this.startRun((signal, follow) => this.process(sermon, source, signal, follow))
  }

  private startRun(task: (signal: AbortSignal, follow: AbortSignal) => Promise<void>): void {
    this.abortProcessing()

    const controller = new AbortController()
    const follow = new AbortController()
    controller.signal.addEventListener('abort', () => follow.abort(), { once: true })

    const run: ProcessingRun = { controller, follow, done: Promise.resolve() }
    run.done = task(controller.signal, follow.signal)
      .catch((error: unknown) => {
        if (controller.signal.aborted) return
        this.fail(toSermonError(error, SermonErrors.transcriptionFailed))
      })
      .finally(() => {
        if (this.processing === run) {
          this.processing = null
        }
      })
    this.processing = run
  }

  private abortProcessing(): void {
    const run = this.processing
    if (!run) return
    run.controller.abort()
    this.processing = null
  }

  private async process(
    sermon: Sermon,
    source: ProcessingSource,
    signal: AbortSignal,
    follow: AbortSignal
  ): Promise<void> {
    const startTime = this.now()
    log.startOperation('Process sermon', { sermonId: sermon.id })

    let current = sermon
    let chunks: AudioChunk[]

    try {
      if (source.kind === 'existing') {
        chunks = source.chunks
      } else {
        chunks = await this.prepareChunks(sermon.id, source)
        current = { ...sermon, duration_seconds: chunks.reduce((sum, chunk) => sum + chunk.duration_seconds, 0) }
      }
    } catch (error) {
      if (signal.aborted) return
      const fallback = source.kind === 'imported' ? SermonErrors.importFailed : SermonErrors.recordingFailed
      this.fail(toSermonError(error, fallback))
      return
    }
    if (signal.aborted) return

    this.dispatch({ type: 'processing/chunks', sermon: current, chunks })

    try {
      if (!this.sermonPersisted) {
        await this.deps.sync.createSermon(current, chunks)
        this.sermonPersisted = true
        this.flushBookmarks(current)
      }
      if (signal.aborted) return

      const uploaded = await this.uploader.uploadAll(
        chunks,
        fraction => {
          if (!signal.aborted) {
            this.dispatch({ type: 'processing/step', step: ProcessingSteps.uploading(fraction) })
          }
        },
        signal
      )
      if (signal.aborted) return

      this.dispatch({ type: 'processing/chunks', sermon: current, chunks: uploaded })
      this.dispatch({ type: 'processing/step', step: ProcessingSteps.transcribing(0, 1, chunks.length) })
      await this.deps.jobQueue.enqueue(current.id)
    } catch (error) {
      if (signal.aborted) return
      this.fail(toSermonError(error, SermonErrors.uploadFailed))
      return
    }
    if (signal.aborted) return
    if (follow.aborted) {
      log.info('Job enqueued in the background', { sermonId: current.id })
      return
    }

    await this.followProgress(current, chunks.length, follow)
    log.endOperation('Process sermon', startTime, { sermonId: sermon.id })
  }

  /**
   * Chunk records with contiguous offsets and waveform summaries
   */
  private async prepareChunks(
    sermonId: string,
    source: Exclude<ProcessingSource, { kind: 'existing' }>
  ): Promise<AudioChunk[]> {
    const drafts: AudioChunk[] = []

    if (source.kind === 'imported') {
      drafts.push(source.chunk)
    } else {
      for (const [index, chunkPath] of source.paths.entries()) {
        const format = detectAudioFormat(chunkPath)
        if (!format) {
          throw SermonErrors.recordingFailed(`Unrecognized chunk file ${chunkPath}`)
        }
        const durationSeconds = await this.metadata.getDuration(chunkPath, format)
        const stats = await fs.promises.stat(chunkPath)
        drafts.push(
          createAudioChunkDraft({
            sermon_id: sermonId,
            chunk_index: index,
            start_offset_seconds: 0,
            duration_seconds: durationSeconds,
            local_path: chunkPath,
            file_size: stats.size
          })
        )
      }
    }

    let offset = 0
    return drafts.map(chunk => {
      const prepared: AudioChunk = {
        ...chunk,
        start_offset_seconds: offset,
        waveform_samples: chunk.local_path
          ? generateWaveformSamples(chunk.local_path, this.deps.config.waveformSampleCount)
          : null
      }
      offset += chunk.duration_seconds
      return prepared
    })
  }

  /**
   * Consume the job's progress stream until a terminal update, racing the
   * processing timeout. Abort of `signal` ends silently.
   */
  private async followProgress(sermon: Sermon, chunkTotal: number, signal: AbortSignal): Promise<void> {
    const stream = new AbortController()
    const stopStream = (): void => stream.abort()
    signal.addEventListener('abort', stopStream, { once: true })

    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      stream.abort()
    }, this.deps.config.processingTimeoutMs)

    const stopped = new Promise<null>(resolve => {
      stream.signal.addEventListener('abort', () => resolve(null), { once: true })
    })

    let lastJob: ProcessingJob | null = null
    const iterator = this.deps.jobQueue.progressStream(sermon.id, stream.signal)[Symbol.asyncIterator]()

    try {
      while (!stream.signal.aborted) {
        const next = await Promise.race([iterator.next(), stopped])
        if (!next || next.done) break

        const update = next.value
        lastJob = update.job

        // Shown progress never moves back, including below the upload share
        const step = mapCompositeProgress(update.progress, chunkTotal)
        if (stepProgress(step) >= this.getState().processingProgress) {
          this.dispatch({ type: 'processing/step', step })
        }
        if (isTerminalJob(update.job)) break
      }
    } catch (error) {
      if (!signal.aborted && !timedOut) {
        this.fail(toSermonError(error, SermonErrors.transcriptionFailed))
        return
      }
    } finally {
      clearTimeout(timer)
      signal.removeEventListener('abort', stopStream)
      stream.abort()
      iterator.return?.().catch((error: unknown) => {
        log.debug('Progress stream close failed', { error: errorMessage(error) })
      })
    }

    if (signal.aborted) return
    if (timedOut) {
      log.warn('Processing timed out', { sermonId: sermon.id, timeoutMs: this.deps.config.processingTimeoutMs })
      this.fail(SermonErrors.processingTimeout())
      return
    }

    if (!lastJob || !isTerminalJob(lastJob)) {
      lastJob = await this.deps.jobQueue.getStatus(sermon.id)
      if (signal.aborted) return
    }
    if (!lastJob || !isTerminalJob(lastJob)) {
      log.warn('Progress stream ended before the job finished', { sermonId: sermon.id })
      this.fail(SermonErrors.processingTimeout())
      return
    }

    this.finishProcessing(sermon, lastJob)
  }

  private finishProcessing(sermon: Sermon, job: ProcessingJob): void {
    let updated = withJobStatus(sermon, job)
    try {
      updated = this.deps.records.applyJobStatus(job) ?? updated
    } catch (error) {
      log.warn('Failed to store job status', { sermonId: sermon.id, error: errorMessage(error) })
    }

    if (job.transcriptionStatus === 'failed') {
      this.dispatch({ type: 'processing/sermon', sermon: updated })
      this.fail(SermonErrors.transcriptionFailed(job.transcriptionError ?? 'Unknown error'))
      return
    }

    if (!isJobComplete(job)) {
      log.warn('Study guide generation failed, showing transcript only', {
        sermonId: sermon.id,
        error: job.studyGuideError
      })
    }
    this.enterViewing(updated)
  }

  private enterViewing(sermon: Sermon): void {
    this.dispatch({
      type: 'viewing/entered',
      sermon,
      transcript: this.readContent(sermon.id, id => this.deps.content.fetchTranscript(id)),
      studyGuide: this.readContent(sermon.id, id => this.deps.content.fetchStudyGuide(id))
    })
  }

  private readContent<T extends Transcript | StudyGuide>(sermonId: string, read: (id: string) => T | null): T | null {
    try {
      return read(sermonId)
    } catch (error) {
      log.warn('Failed to load sermon content', { sermonId, error: errorMessage(error) })
      return null
    }
  }

  private flushBookmarks(sermon: Sermon): void {
    const pending = this.pendingBookmarks
    this.pendingBookmarks = []

    for (const bookmark of pending) {
      try {
        this.deps.records.addBookmark({ ...bookmark, sermon_id: sermon.id, user_id: sermon.user_id })
      } catch (error) {
        log.warn('Failed to save bookmark', { sermonId: sermon.id, error: errorMessage(error) })
      }
    }
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async refreshSession(): Promise<void> {
    try {
      await this.deps.auth.refreshSession()
    } catch (error) {
      log.warn('Session refresh failed', { error: errorMessage(error) })
    }
  }

  private fail(error: SermonError): void {
    log.error('Sermon flow failed', error, { code: error.code })
    this.dispatch({ type: 'error/failed', error })
  }

  private dispatch(action: FlowAction): void {
    this.store.dispatch(action)
  }
}
