/**
 * Flow state for sermon capture
 *
 * The observable state of one capture/processing cycle: a tagged-union phase
 * plus the records and read-outs that accompany it. All transitions go
 * through flowReducer.
 */

import { ProcessingSteps, stepProgress, type ProcessingStep } from './progressMapping'
import type { SermonError } from './sermonErrors'
import { sermonStatusOf, type SermonStatus } from './sermonStatus'
import type { AudioChunk, Sermon, StudyGuide, Transcript } from '../types/sermon'

// ============================================================================
// Phase
// ============================================================================

export type FlowPhase =
  | { kind: 'input' }
  | { kind: 'recording' }
  | { kind: 'importing' }
  | { kind: 'processing'; step: ProcessingStep }
  | { kind: 'viewing' }
  | { kind: 'error'; error: SermonError }

export const FlowPhases = {
  input: (): FlowPhase => ({ kind: 'input' }),
  recording: (): FlowPhase => ({ kind: 'recording' }),
  importing: (): FlowPhase => ({ kind: 'importing' }),
  processing: (step: ProcessingStep): FlowPhase => ({ kind: 'processing', step }),
  viewing: (): FlowPhase => ({ kind: 'viewing' }),
  error: (error: SermonError): FlowPhase => ({ kind: 'error', error })
}

// ============================================================================
// State
// ============================================================================

export interface FlowState {
  phase: FlowPhase
  title: string
  speakerName: string
  isRecording: boolean
  isPaused: boolean
  /** Unpaused seconds since recording started */
  recordingDuration: number
  audioLevels: number[]
  currentAudioLevel: number
  currentSermon: Sermon | null
  audioChunks: AudioChunk[]
  /** Chunk files finalized so far during recording */
  completedChunkCount: number
  currentTranscript: Transcript | null
  currentStudyGuide: StudyGuide | null
  processingProgress: number
  processingStartedAt: number | null
  /** Last error raised, also set when the phase did not change */
  error: SermonError | null
  status: SermonStatus | null
}

export const initialFlowState: FlowState = {
  phase: FlowPhases.input(),
  title: '',
  speakerName: '',
  isRecording: false,
  isPaused: false,
  recordingDuration: 0,
  audioLevels: [],
  currentAudioLevel: 0,
  currentSermon: null,
  audioChunks: [],
  completedChunkCount: 0,
  currentTranscript: null,
  currentStudyGuide: null,
  processingProgress: 0,
  processingStartedAt: null,
  error: null,
  status: null
}

// ============================================================================
// Actions
// ============================================================================

export type FlowAction =
  | { type: 'details/set'; title?: string; speakerName?: string }
  | { type: 'recording/started'; sermon: Sermon }
  | { type: 'recording/paused' }
  | { type: 'recording/resumed' }
  | { type: 'recording/tick'; seconds: number }
  | { type: 'recording/levels'; levels: number[] }
  | { type: 'recording/chunkCompleted'; index: number }
  | { type: 'recording/stopped' }
  | { type: 'recording/cancelled' }
  | { type: 'import/started' }
  | { type: 'processing/started'; sermon: Sermon; startedAt: number }
  | { type: 'processing/chunks'; sermon: Sermon; chunks: AudioChunk[] }
  | { type: 'processing/step'; step: ProcessingStep }
  | { type: 'processing/entered'; step: ProcessingStep }
  | { type: 'processing/sermon'; sermon: Sermon }
  | { type: 'viewing/entered'; sermon: Sermon; transcript: Transcript | null; studyGuide: StudyGuide | null }
  | { type: 'error/raised'; error: SermonError }
  | { type: 'error/failed'; error: SermonError }
  | { type: 'error/dismissed' }
  | { type: 'flow/reset' }

function withSermon(state: FlowState, sermon: Sermon): FlowState {
  return { ...state, currentSermon: sermon, status: sermonStatusOf(sermon) }
}

function toStep(state: FlowState, step: ProcessingStep): FlowState {
  return {
    ...state,
    phase: FlowPhases.processing(step),
    processingProgress: stepProgress(step)
  }
}

export function flowReducer(state: FlowState, action: FlowAction): FlowState {
  switch (action.type) {
    case 'details/set':
      return {
        ...state,
        title: action.title ?? state.title,
        speakerName: action.speakerName ?? state.speakerName
      }

    case 'recording/started':
      return {
        ...withSermon(state, action.sermon),
        phase: FlowPhases.recording(),
        isRecording: true,
        isPaused: false,
        recordingDuration: 0,
        audioLevels: [],
        currentAudioLevel: 0,
        audioChunks: [],
        completedChunkCount: 0,
        error: null
      }

    case 'recording/paused':
      return state.isRecording ? { ...state, isPaused: true } : state

    case 'recording/resumed':
      return state.isRecording ? { ...state, isPaused: false } : state

    case 'recording/tick':
      return { ...state, recordingDuration: action.seconds }

    case 'recording/levels':
      return {
        ...state,
        audioLevels: action.levels,
        currentAudioLevel: action.levels.length > 0 ? action.levels[action.levels.length - 1] : 0
      }

    case 'recording/chunkCompleted':
      return { ...state, completedChunkCount: Math.max(state.completedChunkCount, action.index + 1) }

    case 'recording/stopped':
      return { ...state, isRecording: false, isPaused: false, currentAudioLevel: 0 }

    case 'recording/cancelled':
      return {
        ...state,
        phase: FlowPhases.input(),
        isRecording: false,
        isPaused: false,
        recordingDuration: 0,
        audioLevels: [],
        currentAudioLevel: 0,
        currentSermon: null,
        audioChunks: [],
        completedChunkCount: 0,
        status: null,
        error: null
      }

    case 'import/started':
      return { ...state, phase: FlowPhases.importing(), error: null }

    case 'processing/started':
      return {
        ...toStep(withSermon(state, action.sermon), ProcessingSteps.uploading(0)),
        processingStartedAt: action.startedAt,
        error: null
      }

    case 'processing/chunks':
      return { ...withSermon(state, action.sermon), audioChunks: action.chunks }

    case 'processing/step':
      if (state.phase.kind !== 'processing') return state
      return toStep(state, action.step)

    case 'processing/entered':
      return toStep(state, action.step)

    case 'processing/sermon':
      return withSermon(state, action.sermon)

    case 'viewing/entered':
      return {
        ...withSermon(state, action.sermon),
        phase: FlowPhases.viewing(),
        currentTranscript: action.transcript,
        currentStudyGuide: action.studyGuide,
        processingProgress: 1
      }

    case 'error/raised':
      return { ...state, error: action.error }

    case 'error/failed':
      return { ...state, phase: FlowPhases.error(action.error), error: action.error }

    case 'error/dismissed':
      return {
        ...state,
        phase: state.phase.kind === 'error' ? FlowPhases.input() : state.phase,
        error: null
      }

    case 'flow/reset':
      return initialFlowState
  }
}

// ============================================================================
// Read-outs
// ============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * MM:SS of the recording duration
 */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds))
  return `${pad(Math.floor(whole / 60))}:${pad(whole % 60)}`
}

export function meetsMinimumDuration(state: FlowState, minimumSeconds: number): boolean {
  return state.recordingDuration >= minimumSeconds
}

export function remainingTimeToMinimum(state: FlowState, minimumSeconds: number): number {
  return Math.max(0, minimumSeconds - state.recordingDuration)
}

export function formatRemainingTime(state: FlowState, minimumSeconds: number): string {
  return `${Math.ceil(remainingTimeToMinimum(state, minimumSeconds))}s`
}

export function canStartRecording(state: FlowState): boolean {
  return state.phase.kind === 'input'
}

export function canStopRecording(state: FlowState, minimumSeconds: number): boolean {
  return (
    state.phase.kind === 'recording' &&
    state.isRecording &&
    meetsMinimumDuration(state, minimumSeconds)
  )
}

export function isProcessingPhase(state: FlowState): boolean {
  return state.phase.kind === 'processing'
}

export function chunkProgressText(state: FlowState): string {
  return state.completedChunkCount > 0 ? `Chunk ${state.completedChunkCount} saved` : ''
}

/**
 * Roughly three minutes of processing per ten minutes of audio
 */
export function estimatedProcessingSeconds(state: FlowState): number {
  if (!state.currentSermon) return 0
  return (state.currentSermon.duration_seconds / 600) * 180
}

export function estimatedRemainingSeconds(state: FlowState, now: number = Date.now()): number {
  const elapsed = state.processingStartedAt === null ? 0 : (now - state.processingStartedAt) / 1000
  return Math.max(0, estimatedProcessingSeconds(state) - elapsed)
}

export function formatEstimatedTime(state: FlowState, now: number = Date.now()): string {
  const minutes = Math.floor(estimatedRemainingSeconds(state, now) / 60)
  return minutes < 2 ? 'About 1 minute' : `About ${minutes} minutes`
}
