/**
 * Flow orchestrator end to end: capture or import, persistence, upload,
 * processing progress and viewing, against in-process fakes
 */

import { test, expect } from '@playwright/test'
import * as fs from 'fs'
import * as path from 'path'
import { createAudioChunkDraft } from '../src/services/audioChunkService'
import { AudioCaptureService } from '../src/services/audioCaptureService'
import { getDatabaseService } from '../src/services/database'
import { FlowOrchestrator } from '../src/services/flowOrchestrator'
import type { FlowPhase } from '../src/services/flowState'
import { ImportValidator } from '../src/services/importValidator'
import { DEFAULT_SERMON_CONFIG, type SermonCaptureConfig } from '../src/services/sermonConfig'
import { sermonRepository } from '../src/services/sermonRepository'
import { createSermonDraft } from '../src/services/sermonService'
import { SermonSyncService } from '../src/services/sermonSyncService'
import { subscribeToPhase } from '../src/stores/flow-store'
import type { Sermon } from '../src/types/sermon'
import {
  FakeMicrophone,
  MemoryStorage,
  ScriptedJobQueue,
  auth,
  closeDatabase,
  constantPcm,
  job,
  makeTempDir,
  openMemoryDatabase,
  permission,
  removeDir,
  writeWavFile
} from './test-utils'

interface Harness {
  orchestrator: FlowOrchestrator
  microphone: FakeMicrophone
  capture: AudioCaptureService
  storage: MemoryStorage
  jobs: ScriptedJobQueue
  authProvider: ReturnType<typeof auth>
  phases: FlowPhase[]
}

let dir: string
let harness: Harness | null = null

function setup(
  config: Partial<SermonCaptureConfig> = {},
  options: { userId?: string | null; granted?: boolean } = {}
): Harness {
  const microphone = new FakeMicrophone()
  const capture = new AudioCaptureService({
    recordingsDir: path.join(dir, 'recordings'),
    microphone,
    permission: permission(options.granted ?? true)
  })
  const storage = new MemoryStorage()
  const jobs = new ScriptedJobQueue()
  const authProvider = auth(options.userId === undefined ? 'User-1' : options.userId)

  const orchestrator = new FlowOrchestrator({
    auth: authProvider,
    capture,
    importValidator: new ImportValidator({ recordingsDir: path.join(dir, 'recordings') }),
    sync: new SermonSyncService(sermonRepository, storage),
    jobQueue: jobs,
    content: sermonRepository,
    records: sermonRepository,
    config: {
      ...DEFAULT_SERMON_CONFIG,
      recordingsDir: path.join(dir, 'recordings'),
      chunkDurationSeconds: 1,
      minimumRecordingSeconds: 2,
      durationTickMs: 10,
      processingTimeoutMs: 2000,
      ...config
    }
  })

  const phases: FlowPhase[] = []
  subscribeToPhase(orchestrator.store, phase => phases.push(phase))

  harness = { orchestrator, microphone, capture, storage, jobs, authProvider, phases }
  return harness
}

function sourceWav(name: string, seconds: number = 1): string {
  const file = path.join(dir, 'imports', name)
  writeWavFile(file, constantPcm(seconds))
  return file
}

function errorCode(phase: FlowPhase): string | null {
  return phase.kind === 'error' ? phase.error.code : null
}

async function importAndWait(h: Harness, file: string): Promise<Sermon> {
  await h.orchestrator.importAudio(file)
  await h.orchestrator.waitForProcessing()
  const sermon = h.orchestrator.getState().currentSermon
  if (!sermon) throw new Error('No current sermon after import')
  return sermon
}

test.beforeEach(() => {
  openMemoryDatabase()
  dir = makeTempDir('sermon-flow-')
})

test.afterEach(async () => {
  if (harness) {
    await harness.orchestrator.reset()
    harness = null
  }
  closeDatabase()
  removeDir(dir)
})

test.describe('recording', () => {
  test('stopping before the minimum raises RECORDING_TOO_SHORT and keeps recording', async () => {
    const h = setup({ durationTickMs: 60_000, minimumRecordingSeconds: 30 })

    await h.orchestrator.startRecording()
    await h.orchestrator.stopRecording()

    const state = h.orchestrator.getState()
    expect(state.phase).toEqual({ kind: 'recording' })
    expect(state.isRecording).toBe(true)
    expect(state.error?.code).toBe('RECORDING_TOO_SHORT')
    expect(state.error?.details).toEqual({ actualSeconds: 0, minimumSeconds: 30 })
    expect(h.capture.getStatus()).toBe('recording')
  })

  test('a recording past the minimum is saved, uploaded, processed and viewed', async () => {
    const h = setup()
    h.jobs.script = [
      { job: job('', 'running', 'pending'), progress: 0.3 },
      { job: job('', 'succeeded', 'succeeded'), progress: 1 }
    ]
    h.orchestrator.setDetails({ title: 'Grace Abounds', speakerName: 'Pastor Lee' })

    await h.orchestrator.startRecording()
    h.microphone.push(constantPcm(2.5))
    expect(await h.orchestrator.addBookmark({ label: 'scripture', timestampSeconds: 1.5 })).toBeNull()
    await expect.poll(() => h.orchestrator.getState().recordingDuration).toBeGreaterThanOrEqual(2)

    await h.orchestrator.stopRecording()
    await h.orchestrator.waitForProcessing()

    const state = h.orchestrator.getState()
    const sermonId = state.currentSermon?.id ?? ''
    expect(state.phase).toEqual({ kind: 'viewing' })
    expect(state.status).toBe('ready')
    expect(state.currentSermon).toMatchObject({ title: 'Grace Abounds', speaker_name: 'Pastor Lee', duration_seconds: 2.5 })

    expect(h.phases.map(phase => (phase.kind === 'processing' ? phase.step.kind : phase.kind))).toEqual([
      'recording',
      'uploading',
      'uploading',
      'uploading',
      'uploading',
      'transcribing',
      'transcribing',
      'saving',
      'viewing'
    ])

    const prefix = `user-1/${sermonId.toLowerCase()}`
    expect(h.storage.uploads).toEqual([`${prefix}/chunk_000.wav`, `${prefix}/chunk_001.wav`, `${prefix}/chunk_002.wav`])
    expect(h.jobs.enqueued).toEqual([sermonId])

    const chunks = sermonRepository.getChunks(sermonId)
    expect(chunks.map(chunk => [chunk.start_offset_seconds, chunk.duration_seconds])).toEqual([[0, 1], [1, 1], [2, 0.5]])
    expect(chunks.map(chunk => chunk.upload_status)).toEqual(['succeeded', 'succeeded', 'succeeded'])
    expect(chunks[0].waveform_samples).toHaveLength(100)

    expect(sermonRepository.getSermon(sermonId)).toMatchObject({
      transcription_status: 'succeeded',
      study_guide_status: 'succeeded',
      needs_sync: false
    })
    expect(sermonRepository.getBookmarks(sermonId).map(bookmark => [bookmark.timestamp_seconds, bookmark.label])).toEqual([
      [1.5, 'scripture']
    ])
  })

  test('cancel discards the audio and persists nothing', async () => {
    const h = setup()

    await h.orchestrator.startRecording()
    const sermonId = h.orchestrator.getState().currentSermon?.id ?? ''
    h.microphone.push(constantPcm(0.5))
    await h.orchestrator.addBookmark()
    await h.orchestrator.cancelRecording()

    const state = h.orchestrator.getState()
    expect(state.phase).toEqual({ kind: 'input' })
    expect(state.currentSermon).toBeNull()
    expect(getDatabaseService().getStats()).toMatchObject({ sermonCount: 0, bookmarkCount: 0 })
    expect(fs.existsSync(path.join(dir, 'recordings', sermonId))).toBe(false)
    expect(h.storage.uploads).toEqual([])
    expect(h.capture.getStatus()).toBe('idle')
  })

  test('pause stops the duration counter', async () => {
    const h = setup()

    await h.orchestrator.startRecording()
    h.orchestrator.pauseRecording()
    expect(h.orchestrator.getState().isPaused).toBe(true)
    expect(h.capture.getStatus()).toBe('paused')

    const paused = h.orchestrator.getState().recordingDuration
    await new Promise(resolve => setTimeout(resolve, 50))
    expect(h.orchestrator.getState().recordingDuration).toBe(paused)

    h.orchestrator.resumeRecording()
    expect(h.capture.getStatus()).toBe('recording')
    await expect.poll(() => h.orchestrator.getState().recordingDuration).toBeGreaterThan(paused)
  })

  test('without a signed-in user nothing starts', async () => {
    const h = setup({}, { userId: null })

    await h.orchestrator.startRecording()

    expect(errorCode(h.orchestrator.getState().phase)).toBe('NOT_AUTHENTICATED')
    expect(h.authProvider.refreshCount).toBe(1)
    expect(h.microphone.openCount).toBe(0)
  })

  test('denied microphone permission is an error', async () => {
    const h = setup({}, { granted: false })

    await h.orchestrator.startRecording()

    expect(errorCode(h.orchestrator.getState().phase)).toBe('MICROPHONE_PERMISSION_DENIED')
  })

  test('a capture failure while recording ends the recording with an error', async () => {
    const h = setup()

    await h.orchestrator.startRecording()
    h.microphone.stream?.end()

    await expect.poll(() => errorCode(h.orchestrator.getState().phase)).toBe('RECORDING_FAILED')
    expect(h.orchestrator.getState().isRecording).toBe(false)
    expect(h.capture.getStatus()).toBe('idle')
  })
})

test.describe('import', () => {
  test('uses the file name as the default title', async () => {
    const h = setup()
    h.jobs.script = [{ job: job('', 'succeeded', 'succeeded'), progress: 1 }]

    const sermon = await importAndWait(h, sourceWav('Easter Sunday.wav', 1.5))

    expect(h.orchestrator.getState().phase).toEqual({ kind: 'viewing' })
    expect(sermonRepository.getSermon(sermon.id)).toMatchObject({
      title: 'Easter Sunday',
      duration_seconds: 1.5,
      audio_mime_type: 'audio/wav'
    })
    expect(h.phases[0]).toEqual({ kind: 'importing' })
    expect(h.storage.uploads).toEqual([`user-1/${sermon.id.toLowerCase()}/chunk_000.wav`])
  })

  test('an explicit title wins over the file name', async () => {
    const h = setup()
    h.jobs.script = [{ job: job('', 'succeeded', 'succeeded'), progress: 1 }]
    h.orchestrator.setDetails({ title: '  He Is Risen ' })

    const sermon = await importAndWait(h, sourceWav('Easter Sunday.wav'))

    expect(sermonRepository.getSermon(sermon.id)?.title).toBe('He Is Risen')
  })

  test('an unsupported file fails before anything is saved', async () => {
    const h = setup()
    const file = path.join(dir, 'notes.txt')
    fs.writeFileSync(file, 'not audio')

    await h.orchestrator.importAudio(file)

    expect(errorCode(h.orchestrator.getState().phase)).toBe('UNSUPPORTED_AUDIO_FORMAT')
    expect(getDatabaseService().getStats().sermonCount).toBe(0)
  })
})

test.describe('processing outcomes', () => {
  test('a failed study guide still shows the transcript', async () => {
    const h = setup()
    h.jobs.script = [
      { job: job('', 'succeeded', 'running'), progress: 0.8 },
      { job: job('', 'succeeded', 'failed', { studyGuide: 'model offline' }), progress: 1 }
    ]

    const sermon = await importAndWait(h, sourceWav('talk.wav'))

    const state = h.orchestrator.getState()
    expect(state.phase).toEqual({ kind: 'viewing' })
    expect(state.status).toBe('degraded')
    expect(sermonRepository.getSermon(sermon.id)?.study_guide_error).toBe('model offline')
  })

  test('a failed transcription is an error', async () => {
    const h = setup()
    h.jobs.script = [{ job: job('', 'failed', 'pending', { transcription: 'unreadable audio' }), progress: 0.7 }]

    const sermon = await importAndWait(h, sourceWav('talk.wav'))

    const phase = h.orchestrator.getState().phase
    expect(phase.kind === 'error' && phase.error.message).toBe('Transcription failed: unreadable audio')
    expect(h.orchestrator.getState().currentSermon?.transcription_status).toBe('failed')
    expect(sermonRepository.getSermon(sermon.id)?.transcription_status).toBe('failed')
  })

  test('a timeout fails the flow and releases the progress subscription', async () => {
    const h = setup({ processingTimeoutMs: 100 })

    const sermon = await importAndWait(h, sourceWav('talk.wav'))

    expect(errorCode(h.orchestrator.getState().phase)).toBe('PROCESSING_TIMEOUT')
    await expect.poll(() => h.jobs.publisher.subscriberCount(sermon.id)).toBe(0)
  })

  test('retry after an upload failure reuses the chunk files from upload 0', async () => {
    const h = setup()
    h.storage.failuresRemaining = 1
    h.jobs.script = [{ job: job('', 'succeeded', 'succeeded'), progress: 1 }]

    const sermon = await importAndWait(h, sourceWav('talk.wav'))
    const failed = h.orchestrator.getState()
    expect(errorCode(failed.phase)).toBe('UPLOAD_FAILED')
    expect(failed.error?.isRetryable).toBe(true)
    const chunkPaths = failed.audioChunks.map(chunk => chunk.local_path)

    h.phases.length = 0
    await h.orchestrator.retry()
    await h.orchestrator.waitForProcessing()

    expect(h.phases[0]).toEqual({ kind: 'processing', step: { kind: 'uploading', progress: 0 } })
    expect(h.orchestrator.getState().phase).toEqual({ kind: 'viewing' })
    expect(h.orchestrator.getState().audioChunks.map(chunk => chunk.local_path)).toEqual(chunkPaths)
    expect(h.storage.uploads).toHaveLength(2)
    expect(new Set(h.storage.uploads).size).toBe(1)
    expect(h.jobs.enqueued).toEqual([sermon.id])
    expect(getDatabaseService().getStats().sermonCount).toBe(1)
  })

  test('entering the background stops following progress', async () => {
    const h = setup({ processingTimeoutMs: 60_000 })

    await h.orchestrator.importAudio(sourceWav('talk.wav'))
    const sermonId = h.orchestrator.getState().currentSermon?.id ?? ''
    await expect.poll(() => h.jobs.publisher.subscriberCount(sermonId)).toBe(1)

    h.orchestrator.enterBackground()

    await expect.poll(() => h.jobs.publisher.subscriberCount(sermonId)).toBe(0)
    expect(h.orchestrator.getState().phase.kind).toBe('processing')
  })

  test('backgrounding during upload still uploads and enqueues', async () => {
    const h = setup()
    h.storage.delayMs = 100
    h.jobs.script = [{ job: job('', 'succeeded', 'succeeded'), progress: 1 }]

    await h.orchestrator.importAudio(sourceWav('talk.wav'))
    const sermon = h.orchestrator.getState().currentSermon
    if (!sermon) throw new Error('No current sermon after import')
    await expect.poll(() => h.storage.uploads.length).toBe(1)

    h.orchestrator.enterBackground()
    await h.orchestrator.waitForProcessing()

    expect(h.jobs.enqueued).toEqual([sermon.id])
    expect(h.jobs.publisher.subscriberCount(sermon.id)).toBe(0)
    expect(h.orchestrator.getState().phase.kind).toBe('processing')
    expect(sermonRepository.getChunks(sermon.id).map(chunk => chunk.upload_status)).toEqual(['succeeded'])

    await expect.poll(async () => (await h.jobs.getStatus(sermon.id))?.transcriptionStatus).toBe('succeeded')
    expect(sermonRepository.getSermon(sermon.id)?.transcription_status).toBe('pending')

    await h.orchestrator.loadExistingSermon(sermon)

    expect(h.orchestrator.getState().phase).toEqual({ kind: 'viewing' })
    expect(h.orchestrator.getState().status).toBe('ready')
    expect(sermonRepository.getSermon(sermon.id)?.transcription_status).toBe('succeeded')
  })

  test('an update below the progress already shown does not move it back', async () => {
    const h = setup()
    h.jobs.script = [
      { job: job('', 'pending', 'pending'), progress: 0.1 },
      { job: job('', 'succeeded', 'succeeded'), progress: 1 }
    ]
    const progress: number[] = []
    h.orchestrator.store.subscribe(state => progress.push(state.processingProgress))

    await importAndWait(h, sourceWav('talk.wav'))

    expect(h.phases.map(phase => (phase.kind === 'processing' ? phase.step.kind : phase.kind))).toEqual([
      'importing',
      'uploading',
      'uploading',
      'transcribing',
      'saving',
      'viewing'
    ])
    expect(progress).toEqual([...progress].sort((a, b) => a - b))
  })
})

test.describe('existing sermons', () => {
  function savedSermon(overrides: Partial<Sermon>): Sermon {
    const sermon = { ...createSermonDraft({ user_id: 'user-1', title: 'Saved' }), ...overrides }
    sermonRepository.saveSermonWithChunks(sermon, [])
    return sermon
  }

  test('a finished sermon opens in viewing with its content', async () => {
    const h = setup()
    const sermon = savedSermon({ transcription_status: 'succeeded', study_guide_status: 'succeeded' })
    sermonRepository.saveTranscript({ sermon_id: sermon.id, content: 'Blessed are the meek' })

    await h.orchestrator.loadExistingSermon(sermon)

    const state = h.orchestrator.getState()
    expect(state.phase).toEqual({ kind: 'viewing' })
    expect(state.currentTranscript?.content).toBe('Blessed are the meek')
    expect(state.currentStudyGuide).toBeNull()

    const bookmark = await h.orchestrator.addBookmark({ timestampSeconds: 42, note: 'key verse' })
    expect(bookmark).toMatchObject({ sermon_id: sermon.id, timestamp_seconds: 42, label: 'key_point', note: 'key verse' })
  })

  test('a failed transcription opens as an error', async () => {
    const h = setup()
    const sermon = savedSermon({ transcription_status: 'failed', transcription_error: 'bad audio' })

    await h.orchestrator.loadExistingSermon(sermon)

    const phase = h.orchestrator.getState().phase
    expect(phase.kind === 'error' && phase.error.message).toBe('Transcription failed: bad audio')
  })

  test('a running sermon resumes following its progress', async () => {
    const h = setup()
    const sermon = savedSermon({ transcription_status: 'running' })

    await h.orchestrator.loadExistingSermon(sermon)
    expect(h.orchestrator.getState().phase).toEqual({
      kind: 'processing',
      step: { kind: 'transcribing', progress: 0.5, chunk: 1, total: 1 }
    })

    await expect.poll(() => h.jobs.publisher.subscriberCount(sermon.id)).toBe(1)
    h.jobs.publisher.publish(sermon.id, job(sermon.id, 'succeeded', 'succeeded'), 1)
    await h.orchestrator.waitForProcessing()

    expect(h.orchestrator.getState().phase).toEqual({ kind: 'viewing' })
    expect(sermonRepository.getSermon(sermon.id)?.transcription_status).toBe('succeeded')
  })

  test('a resumed sermon reports chunk progress across its saved chunks', async () => {
    const h = setup()
    const sermon: Sermon = { ...createSermonDraft({ user_id: 'user-1', title: 'Series' }), transcription_status: 'running' }
    const chunks = [0, 1, 2].map(index =>
      createAudioChunkDraft({
        sermon_id: sermon.id,
        chunk_index: index,
        start_offset_seconds: index * 600,
        duration_seconds: 600,
        local_path: `/recordings/${sermon.id}/chunk_00${index}.wav`
      })
    )
    sermonRepository.saveSermonWithChunks(sermon, chunks)

    await h.orchestrator.loadExistingSermon(sermon)
    expect(h.orchestrator.getState().audioChunks).toHaveLength(3)

    await expect.poll(() => h.jobs.publisher.subscriberCount(sermon.id)).toBe(1)
    h.jobs.publisher.publish(sermon.id, job(sermon.id, 'running', 'pending'), 0.5)
    await expect
      .poll(() => h.orchestrator.getState().phase)
      .toMatchObject({ kind: 'processing', step: { kind: 'transcribing', chunk: 2, total: 3 } })

    h.jobs.publisher.publish(sermon.id, job(sermon.id, 'succeeded', 'succeeded'), 1)
    await h.orchestrator.waitForProcessing()
    expect(h.orchestrator.getState().phase).toEqual({ kind: 'viewing' })
  })
})
