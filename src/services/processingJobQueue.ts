/**
 * Processing Job Queue
 *
 * In-process implementation of the sermon processing job: transcription
 * followed by study-guide generation, both delegated to a SermonProcessor.
 * Jobs run FIFO with bounded concurrency; progress is pushed through a
 * ProgressPublisher and statuses are written to the repository as they
 * change.
 *
 * Composite progress published by a job:
 *   0.10 chunks ready, 0.20 transcription started, 0.20-0.70 transcribing,
 *   0.70 transcript saved, 0.75 study guide started, 1.00 complete
 */

import { loggerService } from './loggerService'
import { ProgressPublisher } from './progressPublisher'
import type { SermonRepository } from './sermonRepository'
import { isTerminalJob, jobFromSermon } from './sermonStatus'
import type { ProcessingJobQueue } from '../types/collaborators'
import type {
  AudioChunk,
  ProcessingJob,
  ProgressUpdate,
  SaveStudyGuideInput,
  Sermon,
  Transcript,
  TranscriptSegment
} from '../types/sermon'

const log = loggerService.scope('ProcessingJobQueue')

export const DEFAULT_MAX_CONCURRENT_JOBS = 2

export interface TranscriptionOutput {
  content: string
  segments?: TranscriptSegment[]
}

export type StudyGuideOutput = Omit<SaveStudyGuideInput, 'id' | 'sermon_id'>

/**
 * The opaque work behind a job
 */
export interface SermonProcessor {
  transcribe(
    sermon: Sermon,
    chunks: AudioChunk[],
    onProgress: (fraction: number) => void
  ): Promise<TranscriptionOutput>
  generateStudyGuide(sermon: Sermon, transcript: Transcript): Promise<StudyGuideOutput>
}

export interface LocalJobQueueOptions {
  repository: SermonRepository
  processor: SermonProcessor
  publisher?: ProgressPublisher
  maxConcurrentJobs?: number
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class LocalProcessingJobQueue implements ProcessingJobQueue {
  readonly publisher: ProgressPublisher
  private readonly repository: SermonRepository
  private readonly processor: SermonProcessor
  private readonly maxConcurrentJobs: number
  private readonly pending: string[] = []
  private readonly running = new Map<string, Promise<void>>()

  constructor(options: LocalJobQueueOptions) {
    this.repository = options.repository
    this.processor = options.processor
    this.publisher = options.publisher ?? new ProgressPublisher()
    this.maxConcurrentJobs = options.maxConcurrentJobs ?? DEFAULT_MAX_CONCURRENT_JOBS
  }

  async enqueue(sermonId: string): Promise<void> {
    if (this.pending.includes(sermonId) || this.running.has(sermonId)) {
      log.debug('Sermon already queued', { sermonId })
      return
    }

    this.publisher.resetSermon(sermonId)
    this.pending.push(sermonId)
    log.info('Sermon enqueued', { sermonId, queued: this.pending.length })
    this.startNext()
  }

  progressStream(sermonId: string, signal?: AbortSignal): AsyncIterable<ProgressUpdate> {
    return this.publisher.subscribe(sermonId, signal)
  }

  async getStatus(sermonId: string): Promise<ProcessingJob | null> {
    const sermon = this.repository.getSermon(sermonId)
    return sermon ? jobFromSermon(sermon) : null
  }

  isQueued(sermonId: string): boolean {
    return this.pending.includes(sermonId) || this.running.has(sermonId)
  }

  /**
   * Resolves when every queued and running job finished
   */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values())
    }
  }

  /**
   * Re-queue sermons left pending or running by an earlier process
   */
  async resumePendingJobs(userId: string): Promise<number> {
    let resumed = 0
    for (const sermon of this.repository.listSermons(userId)) {
      if (!isTerminalJob(jobFromSermon(sermon)) && !this.isQueued(sermon.id)) {
        await this.enqueue(sermon.id)
        resumed++
      }
    }
    log.info('Resumed pending jobs', { userId, resumed })
    return resumed
  }

  private startNext(): void {
    while (this.running.size < this.maxConcurrentJobs && this.pending.length > 0) {
      const sermonId = this.pending.shift()
      if (sermonId === undefined) return

      const run = this.process(sermonId)
        .catch((error: unknown) => {
          log.error('Processing failed', error instanceof Error ? error : { error: String(error) }, { sermonId })
        })
        .finally(() => {
          this.running.delete(sermonId)
          this.publisher.complete(sermonId)
          this.startNext()
        })
      this.running.set(sermonId, run)
    }
  }

  private publish(job: ProcessingJob, progress: number): void {
    this.publisher.publish(job.sermonId, { ...job }, progress)
  }

  private async process(sermonId: string): Promise<void> {
    const sermon = this.repository.getSermon(sermonId)
    if (!sermon) {
      log.warn('Sermon not found, skipping job', { sermonId })
      return
    }

    const job = jobFromSermon(sermon)
    let transcript = this.repository.fetchTranscript(sermonId)
    const transcribe = job.transcriptionStatus !== 'succeeded' || !transcript
    const guide = job.studyGuideStatus !== 'succeeded'

    if (!transcribe && !guide) {
      this.publish(job, 1)
      return
    }

    const startTime = Date.now()
    log.startOperation('Process sermon', { sermonId })

    // Statuses left by an earlier run would read as terminal
    if (transcribe) {
      job.transcriptionStatus = 'pending'
      job.transcriptionError = null
    }
    if (guide) {
      job.studyGuideStatus = 'pending'
      job.studyGuideError = null
    }
    this.repository.applyJobStatus(job)
    this.publish(job, 0.1)

    if (transcribe || !transcript) {
      transcript = await this.runTranscription(sermon, job)
      if (!transcript) return
    }

    if (guide) {
      await this.runStudyGuide(sermon, transcript, job)
    } else {
      this.publish(job, 1)
    }

    log.endOperation('Process sermon', startTime, { sermonId })
  }

  private async runTranscription(sermon: Sermon, job: ProcessingJob): Promise<Transcript | null> {
    job.transcriptionStatus = 'running'
    job.transcriptionError = null
    this.repository.applyJobStatus(job)
    this.publish(job, 0.2)

    try {
      const chunks = this.repository.getChunks(sermon.id)
      if (chunks.length === 0) {
        throw new Error('No audio chunks to transcribe')
      }

      const output = await this.processor.transcribe(sermon, chunks, fraction => {
        const clamped = Math.min(Math.max(fraction, 0), 1)
        this.publish(job, 0.2 + clamped * 0.5)
      })

      const transcript = this.repository.saveTranscript({
        sermon_id: sermon.id,
        content: output.content,
        segments: output.segments
      })

      job.transcriptionStatus = 'succeeded'
      this.repository.applyJobStatus(job)
      this.publish(job, 0.7)
      return transcript
    } catch (error) {
      job.transcriptionStatus = 'failed'
      job.transcriptionError = errorMessage(error)
      this.repository.applyJobStatus(job)
      this.publish(job, 0.7)
      log.error('Transcription failed', error instanceof Error ? error : { error: String(error) }, {
        sermonId: sermon.id
      })
      return null
    }
  }

  private async runStudyGuide(sermon: Sermon, transcript: Transcript, job: ProcessingJob): Promise<void> {
    job.studyGuideStatus = 'running'
    job.studyGuideError = null
    this.repository.applyJobStatus(job)
    this.publish(job, 0.75)

    try {
      const output = await this.processor.generateStudyGuide(sermon, transcript)
      this.repository.saveStudyGuide({ ...output, sermon_id: sermon.id })

      job.studyGuideStatus = 'succeeded'
      this.repository.applyJobStatus(job)
      this.publish(job, 1)
    } catch (error) {
      job.studyGuideStatus = 'failed'
      job.studyGuideError = errorMessage(error)
      this.repository.applyJobStatus(job)
      this.publish(job, 1)
      log.error('Study guide generation failed', error instanceof Error ? error : { error: String(error) }, {
        sermonId: sermon.id
      })
    }
  }
}
