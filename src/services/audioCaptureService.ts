/**
 * Audio Capture Service
 *
 * Records the microphone into consecutive WAV chunk files:
 *   <recordingsDir>/<sermonId>/chunk_000.wav, chunk_001.wav, ...
 *
 * Chunk boundaries are measured in captured audio, so a paused recording
 * does not use up chunk time. While capturing (and not paused) the service
 * meters one level per 50 ms of audio into an AudioLevelHistory.
 *
 * Events:
 *   'chunk-completed'  a chunk reached its duration and was finalized
 *   'level'            a new meter level (0-1)
 *   'error'            the capture failed while running
 */

import { EventEmitter } from 'events'
import * as fs from 'fs'
import * as path from 'path'
import { AudioLevelHistory } from './audioLevelHistory'
import { loggerService } from './loggerService'
import type { MicrophoneSource, MicrophoneStream } from './microphoneSource'
import { RealTimeWavWriter } from './realTimeWavWriter'
import { SerialTaskQueue } from './serialTaskQueue'
import { SermonErrors, type SermonError, toSermonError } from './sermonErrors'
import { CAPTURE_FORMAT, bytesPerSecond, type WavFormat } from './wavUtils'
import type { PermissionProvider } from '../types/collaborators'

const log = loggerService.scope('AudioCapture')

export const DEFAULT_CHUNK_DURATION_SECONDS = 600
const LEVEL_WINDOW_SECONDS = 0.05

export type CaptureStatus = 'idle' | 'recording' | 'paused' | 'stopping'

export interface ChunkCompletedEvent {
  /** Path of the finalized chunk file */
  url: string
  index: number
  durationSeconds: number
}

export interface AudioCaptureOptions {
  recordingsDir: string
  microphone: MicrophoneSource
  permission: PermissionProvider
  format?: WavFormat
}

export interface StartCaptureOptions {
  chunkDurationSeconds?: number
  /** Ring buffer receiving meter levels; a new one is created when omitted */
  levels?: AudioLevelHistory
}

export interface CaptureHandle {
  sermonId: string
  directory: string
  levels: AudioLevelHistory
}

export function chunkFileName(index: number, extension: string = '.wav'): string {
  return `chunk_${String(index).padStart(3, '0')}${extension}`
}

interface ActiveCapture {
  handle: CaptureHandle
  mic: MicrophoneStream
  chunkBytes: number
  writer: RealTimeWavWriter | null
  chunkIndex: number
  chunkPaths: string[]
  totalBytes: number
  carry: Buffer | null
  meterSumSquares: number
  meterSamples: number
  onData: (data: Buffer) => void
  onError: (error: Error) => void
  onEnd: () => void
}

export declare interface AudioCaptureService {
  on(event: 'chunk-completed', listener: (event: ChunkCompletedEvent) => void): this
  on(event: 'level', listener: (level: number) => void): this
  on(event: 'error', listener: (error: SermonError) => void): this
  off(event: 'chunk-completed', listener: (event: ChunkCompletedEvent) => void): this
  off(event: 'level', listener: (level: number) => void): this
  off(event: 'error', listener: (error: SermonError) => void): this
}

export class AudioCaptureService extends EventEmitter {
  private readonly format: WavFormat
  private readonly bytesPerSecond: number
  private readonly frameSize: number
  private readonly levelWindowSamples: number
  private status: CaptureStatus = 'idle'
  private active: ActiveCapture | null = null
  private readonly queue = new SerialTaskQueue()

  constructor(private readonly options: AudioCaptureOptions) {
    super()
    this.format = options.format ?? CAPTURE_FORMAT
    this.bytesPerSecond = bytesPerSecond(this.format)
    this.frameSize = this.format.channels * (this.format.bitDepth / 8)
    this.levelWindowSamples = Math.max(1, Math.round(this.format.sampleRate * LEVEL_WINDOW_SECONDS))
  }

  getStatus(): CaptureStatus {
    return this.status
  }

  /**
   * Seconds of audio captured so far, excluding paused time
   */
  get elapsedSeconds(): number {
    return this.active ? this.active.totalBytes / this.bytesPerSecond : 0
  }

  sermonDirectory(sermonId: string): string {
    return path.join(this.options.recordingsDir, sermonId)
  }

  async start(sermonId: string, startOptions: StartCaptureOptions = {}): Promise<CaptureHandle> {
    if (this.status !== 'idle') {
      throw SermonErrors.recordingFailed('A recording is already in progress')
    }

    const chunkDurationSeconds = startOptions.chunkDurationSeconds ?? DEFAULT_CHUNK_DURATION_SECONDS
    if (!(chunkDurationSeconds > 0)) {
      throw SermonErrors.recordingFailed(`Invalid chunk duration: ${chunkDurationSeconds}`)
    }

    const granted = await this.options.permission.requestMicrophonePermission()
    if (!granted) {
      throw SermonErrors.microphonePermissionDenied()
    }

    const directory = this.sermonDirectory(sermonId)
    try {
      fs.mkdirSync(directory, { recursive: true })
    } catch (error) {
      throw toSermonError(error, SermonErrors.recordingFailed)
    }

    const firstWriter = this.openWriter(directory, 0)

    let mic: MicrophoneStream
    try {
      mic = await this.options.microphone.open(this.format)
    } catch (error) {
      await firstWriter.close()
      fs.rmSync(directory, { recursive: true, force: true })
      throw toSermonError(error, SermonErrors.recordingFailed)
    }

    const handle: CaptureHandle = {
      sermonId,
      directory,
      levels: startOptions.levels ?? new AudioLevelHistory()
    }

    const active: ActiveCapture = {
      handle,
      mic,
      // Whole frames only, so boundaries never split a sample
      chunkBytes: Math.max(this.frameSize, Math.floor((chunkDurationSeconds * this.bytesPerSecond) / this.frameSize) * this.frameSize),
      writer: firstWriter,
      chunkIndex: 0,
      chunkPaths: [],
      totalBytes: 0,
      carry: null,
      meterSumSquares: 0,
      meterSamples: 0,
      onData: (data: Buffer) => {
        if (this.status !== 'recording') return
        this.queue.run(() => this.handleData(active, data)).catch((error: unknown) => {
          this.fail(active, toSermonError(error, SermonErrors.recordingFailed))
        })
      },
      onError: (error: Error) => {
        if (this.status === 'stopping' || this.status === 'idle') return
        this.fail(active, SermonErrors.recordingFailed(error.message))
      },
      onEnd: () => {
        if (this.status === 'recording' || this.status === 'paused') {
          this.fail(active, SermonErrors.recordingFailed('Microphone stream ended unexpectedly'))
        }
      }
    }

    mic.stream.on('data', active.onData)
    mic.stream.on('error', active.onError)
    mic.stream.on('end', active.onEnd)

    this.active = active
    this.status = 'recording'

    log.info('Capture started', { sermonId, chunkDurationSeconds })
    return handle
  }

  /**
   * Stop feeding audio into the open chunk. Data arriving while paused is
   * dropped.
   */
  pause(): void {
    if (this.status !== 'recording') return
    this.status = 'paused'
    log.debug('Capture paused', { sermonId: this.active?.handle.sermonId })
  }

  resume(): void {
    if (this.status !== 'paused') return
    this.status = 'recording'
    log.debug('Capture resumed', { sermonId: this.active?.handle.sermonId })
  }

  /**
   * Finalize the open chunk and return every chunk path in index order.
   * With minimumSeconds set, a shorter capture raises RECORDING_TOO_SHORT
   * and keeps recording.
   */
  async stop(minimumSeconds?: number): Promise<string[]> {
    const active = this.active
    if (!active || (this.status !== 'recording' && this.status !== 'paused')) {
      return []
    }

    await this.queue.drain()
    if (this.active !== active) return []

    const elapsed = this.elapsedSeconds
    if (minimumSeconds !== undefined && elapsed < minimumSeconds) {
      throw SermonErrors.recordingTooShort(Math.floor(elapsed), minimumSeconds)
    }

    this.status = 'stopping'
    this.detach(active)
    await this.queue.drain()

    if (active.writer) {
      await active.writer.close()
      active.chunkPaths.push(active.writer.getFilePath())
      active.writer = null
    }

    const chunkPaths = [...active.chunkPaths]
    active.handle.levels.close()
    this.active = null
    this.status = 'idle'

    log.info('Capture stopped', {
      sermonId: active.handle.sermonId,
      chunkCount: chunkPaths.length,
      durationSeconds: elapsed
    })
    return chunkPaths
  }

  /**
   * Discard all captured audio and delete the sermon directory
   */
  async cancel(): Promise<void> {
    const active = this.active
    if (!active) return

    this.status = 'stopping'
    this.detach(active)
    await this.queue.drain()

    if (active.writer) {
      await active.writer.close()
      active.writer = null
    }
    fs.rmSync(active.handle.directory, { recursive: true, force: true })

    active.handle.levels.close()
    this.active = null
    this.status = 'idle'

    log.info('Capture cancelled', { sermonId: active.handle.sermonId })
  }

  private openWriter(directory: string, index: number): RealTimeWavWriter {
    const writer = new RealTimeWavWriter({
      filePath: path.join(directory, chunkFileName(index)),
      format: this.format
    })
    try {
      writer.open()
    } catch (error) {
      throw toSermonError(error, SermonErrors.recordingFailed)
    }
    return writer
  }

  private async handleData(active: ActiveCapture, incoming: Buffer): Promise<void> {
    let data = active.carry ? Buffer.concat([active.carry, incoming]) : incoming
    const remainder = data.length % this.frameSize
    active.carry = remainder > 0 ? Buffer.from(data.subarray(data.length - remainder)) : null
    if (remainder > 0) {
      data = data.subarray(0, data.length - remainder)
    }
    if (data.length === 0) return

    this.meter(active, data)

    let offset = 0
    while (offset < data.length) {
      if (!active.writer) {
        active.writer = this.openWriter(active.handle.directory, active.chunkIndex)
      }

      const writer = active.writer
      const room = active.chunkBytes - writer.getState().bytesWritten
      const slice = data.subarray(offset, offset + Math.min(room, data.length - offset))

      await writer.write(slice)
      active.totalBytes += slice.length
      offset += slice.length

      if (writer.getState().bytesWritten >= active.chunkBytes) {
        await this.completeChunk(active, writer)
      }
    }
  }

  private async completeChunk(active: ActiveCapture, writer: RealTimeWavWriter): Promise<void> {
    await writer.close()

    const event: ChunkCompletedEvent = {
      url: writer.getFilePath(),
      index: active.chunkIndex,
      durationSeconds: writer.getDuration()
    }
    active.chunkPaths.push(event.url)
    active.chunkIndex++
    active.writer = null

    log.info('Chunk completed', { sermonId: active.handle.sermonId, chunkIndex: event.index })
    this.emit('chunk-completed', event)
  }

  /**
   * RMS over 50 ms windows, squared so quiet passages stay visibly low
   */
  private meter(active: ActiveCapture, data: Buffer): void {
    if (this.format.bitDepth !== 16) return

    for (let i = 0; i + 1 < data.length; i += 2) {
      const sample = data.readInt16LE(i) / 32768
      active.meterSumSquares += sample * sample
      active.meterSamples++

      if (active.meterSamples >= this.levelWindowSamples) {
        const rms = Math.min(1, Math.sqrt(active.meterSumSquares / active.meterSamples))
        const level = rms * rms
        active.meterSumSquares = 0
        active.meterSamples = 0

        active.handle.levels.push(level)
        this.emit('level', level)
      }
    }
  }

  private detach(active: ActiveCapture): void {
    active.mic.stream.off('data', active.onData)
    active.mic.stream.off('end', active.onEnd)
    // Late recorder exit errors are expected once stopped
    active.mic.stream.off('error', active.onError)
    active.mic.stream.on('error', (error: Error) => {
      log.debug('Recorder stream error after stop', { error: error.message })
    })
    active.mic.stop()
  }

  private fail(active: ActiveCapture, error: SermonError): void {
    if (this.active !== active || this.status === 'stopping') return

    log.error('Capture failed', error, { sermonId: active.handle.sermonId })
    this.status = 'paused'
    if (this.listenerCount('error') > 0) {
      this.emit('error', error)
    }
  }
}
