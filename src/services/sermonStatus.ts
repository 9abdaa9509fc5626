/**
 * Sermon status derivation
 *
 * Collapses the two per-sermon processing statuses into the single status a
 * library list or viewer renders.
 */

import type { ProcessingJob, ProcessingStatus, Sermon } from '../types/sermon'

export type SermonStatus = 'pending' | 'processing' | 'ready' | 'degraded' | 'error'

export interface StatusPair {
  transcription_status: ProcessingStatus
  study_guide_status: ProcessingStatus
}

const STATUS_LABELS: Record<SermonStatus, string> = {
  pending: 'Pending',
  processing: 'Processing',
  ready: 'Ready',
  degraded: 'Transcript only',
  error: 'Failed'
}

/**
 * Order matters: a failed transcription wins over everything, and a running
 * step wins over a failed study guide.
 */
export function deriveSermonStatus(
  transcription: ProcessingStatus,
  studyGuide: ProcessingStatus
): SermonStatus {
  if (transcription === 'failed') return 'error'
  if (transcription === 'running' || studyGuide === 'running') return 'processing'
  if (transcription === 'pending' && studyGuide === 'pending') return 'pending'
  if (transcription === 'succeeded' && studyGuide === 'failed') return 'degraded'
  if (transcription === 'succeeded' && studyGuide === 'succeeded') return 'ready'
  if (transcription === 'succeeded') return 'processing'
  return 'pending'
}

export function sermonStatusOf(sermon: StatusPair): SermonStatus {
  return deriveSermonStatus(sermon.transcription_status, sermon.study_guide_status)
}

export function isViewable(status: SermonStatus): boolean {
  return status === 'ready' || status === 'degraded'
}

export function isProcessingStatus(status: SermonStatus): boolean {
  return status === 'processing'
}

export function canRetryStudyGuide(status: SermonStatus): boolean {
  return status === 'degraded'
}

export function statusLabel(status: SermonStatus): string {
  return STATUS_LABELS[status]
}

// ============================================================================
// Processing job predicates
// ============================================================================

/**
 * The job record mirrored on a sermon row
 */
export function jobFromSermon(sermon: Sermon): ProcessingJob {
  return {
    sermonId: sermon.id,
    transcriptionStatus: sermon.transcription_status,
    studyGuideStatus: sermon.study_guide_status,
    transcriptionError: sermon.transcription_error,
    studyGuideError: sermon.study_guide_error
  }
}

export function isJobComplete(job: ProcessingJob): boolean {
  return job.transcriptionStatus === 'succeeded' && job.studyGuideStatus === 'succeeded'
}

/**
 * Single terminal test shared by every progress delivery mechanism
 */
export function isTerminalJob(job: ProcessingJob): boolean {
  return (
    isJobComplete(job) ||
    job.transcriptionStatus === 'failed' ||
    job.studyGuideStatus === 'failed'
  )
}
