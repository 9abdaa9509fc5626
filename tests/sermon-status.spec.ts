/**
 * Sermon status derivation and error model
 */

import { test, expect } from '@playwright/test'
import {
  canRetryStudyGuide,
  deriveSermonStatus,
  isJobComplete,
  isProcessingStatus,
  isTerminalJob,
  isViewable,
  statusLabel
} from '../src/services/sermonStatus'
import {
  SermonError,
  SermonErrorCodes,
  SermonErrors,
  isSermonError,
  toSermonError
} from '../src/services/sermonErrors'
import { job } from './test-utils'

test.describe('deriveSermonStatus', () => {
  test('failed transcription is an error whatever the study guide says', () => {
    expect(deriveSermonStatus('failed', 'pending')).toBe('error')
    expect(deriveSermonStatus('failed', 'running')).toBe('error')
    expect(deriveSermonStatus('failed', 'succeeded')).toBe('error')
  })

  test('a running step means processing', () => {
    expect(deriveSermonStatus('running', 'pending')).toBe('processing')
    expect(deriveSermonStatus('succeeded', 'running')).toBe('processing')
    expect(deriveSermonStatus('pending', 'running')).toBe('processing')
  })

  test('both pending is pending', () => {
    expect(deriveSermonStatus('pending', 'pending')).toBe('pending')
  })

  test('transcript without study guide is degraded', () => {
    expect(deriveSermonStatus('succeeded', 'failed')).toBe('degraded')
  })

  test('both succeeded is ready', () => {
    expect(deriveSermonStatus('succeeded', 'succeeded')).toBe('ready')
  })

  test('transcript done with study guide pending is still processing', () => {
    expect(deriveSermonStatus('succeeded', 'pending')).toBe('processing')
  })

  test('anything else falls back to pending', () => {
    expect(deriveSermonStatus('pending', 'failed')).toBe('pending')
    expect(deriveSermonStatus('pending', 'succeeded')).toBe('pending')
  })

  test('status helpers', () => {
    expect(isViewable('ready')).toBe(true)
    expect(isViewable('degraded')).toBe(true)
    expect(isViewable('processing')).toBe(false)
    expect(isProcessingStatus('processing')).toBe(true)
    expect(canRetryStudyGuide('degraded')).toBe(true)
    expect(canRetryStudyGuide('error')).toBe(false)
    expect(statusLabel('degraded')).toBe('Transcript only')
    expect(statusLabel('error')).toBe('Failed')
  })
})

test.describe('job predicates', () => {
  test('complete only when both steps succeeded', () => {
    expect(isJobComplete(job('s1', 'succeeded', 'succeeded'))).toBe(true)
    expect(isJobComplete(job('s1', 'succeeded', 'running'))).toBe(false)
  })

  test('terminal on completion or on any failure', () => {
    expect(isTerminalJob(job('s1', 'succeeded', 'succeeded'))).toBe(true)
    expect(isTerminalJob(job('s1', 'failed', 'pending'))).toBe(true)
    expect(isTerminalJob(job('s1', 'succeeded', 'failed'))).toBe(true)
    expect(isTerminalJob(job('s1', 'running', 'pending'))).toBe(false)
    expect(isTerminalJob(job('s1', 'succeeded', 'running'))).toBe(false)
  })
})

test.describe('SermonError', () => {
  test('recordingTooShort carries both durations', () => {
    const error = SermonErrors.recordingTooShort(12, 30)

    expect(error.code).toBe(SermonErrorCodes.RECORDING_TOO_SHORT)
    expect(error.details).toEqual({ actualSeconds: 12, minimumSeconds: 30 })
    expect(error.message).toBe('Recording is too short (12s, minimum 30s)')
    expect(error.userMessage).toBe('Recordings must be at least 30 seconds long.')
    expect(error.isRetryable).toBe(false)
  })

  test('retryable codes', () => {
    expect(SermonErrors.uploadFailed('x').isRetryable).toBe(true)
    expect(SermonErrors.processingTimeout().isRetryable).toBe(true)
    expect(SermonErrors.studyGuideGenerationFailed('x').isRetryable).toBe(true)
    expect(SermonErrors.recordingFailed('x').isRetryable).toBe(true)
    expect(SermonErrors.transcriptionFailed('x').isRetryable).toBe(false)
    expect(SermonErrors.fileTooLarge(500).isRetryable).toBe(false)
  })

  test('toJSON exposes code, message and details', () => {
    expect(SermonErrors.fileTooLarge(500).toJSON()).toEqual({
      code: 'FILE_TOO_LARGE',
      message: 'File exceeds 500 MB',
      details: { maxMB: 500 }
    })
  })

  test('toSermonError keeps SermonErrors and wraps everything else', () => {
    const original = SermonErrors.chunkNotFound(2)
    expect(toSermonError(original, SermonErrors.uploadFailed)).toBe(original)

    const wrapped = toSermonError(new Error('socket hang up'), SermonErrors.uploadFailed)
    expect(wrapped).toBeInstanceOf(SermonError)
    expect(wrapped.code).toBe('UPLOAD_FAILED')
    expect(wrapped.message).toBe('Upload failed: socket hang up')
    expect(isSermonError(wrapped)).toBe(true)
    expect(isSermonError(new Error('plain'))).toBe(false)
  })
})
