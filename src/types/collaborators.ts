/**
 * Collaborator contracts consumed by the sermon flow orchestrator.
 * Each one is injected at construction time so tests can swap in fakes.
 */

import type {
  AudioChunk,
  ProcessingJob,
  ProgressUpdate,
  Sermon,
  StudyGuide,
  Transcript
} from './sermon'

export interface AuthProvider {
  currentUserId(): string | null
  /** Best-effort; callers ignore failures */
  refreshSession(): Promise<void>
}

export interface PermissionProvider {
  requestMicrophonePermission(): Promise<boolean>
}

export interface SermonContentReader {
  fetchTranscript(sermonId: string): Transcript | null
  fetchStudyGuide(sermonId: string): StudyGuide | null
}

export interface SermonSync {
  createSermon(sermon: Sermon, chunks: AudioChunk[]): Promise<void>
  uploadChunk(chunk: AudioChunk, data: Buffer): Promise<string>
  loadSermon(sermonId: string): Promise<Sermon | null>
}

export interface ProcessingJobQueue {
  /** Idempotent: enqueueing an already queued sermon is a no-op */
  enqueue(sermonId: string): Promise<void>
  /**
   * Ordered, non-decreasing progress updates. Ends when the job reaches a
   * terminal state or the signal aborts.
   */
  progressStream(sermonId: string, signal?: AbortSignal): AsyncIterable<ProgressUpdate>
  getStatus(sermonId: string): Promise<ProcessingJob | null>
}

export interface RemoteStorage {
  /** Returns the stored object's remote path */
  upload(remotePath: string, data: Buffer, contentType: string): Promise<string>
}

/**
 * Optional access hook around reading an externally supplied file, acquired
 * for the duration of the copy only.
 */
export interface SourceAccess {
  acquire(sourcePath: string): Promise<boolean>
  release(sourcePath: string): void
}
