/**
 * Sermon type definitions
 * These interfaces define the structure of the sermon tables and the
 * records exchanged with the sync and job-queue collaborators
 */

// ============================================================================
// Processing Status
// ============================================================================

export type ProcessingStatus = 'pending' | 'running' | 'succeeded' | 'failed'

export type ChunkUploadStatus = 'pending' | 'uploading' | 'succeeded' | 'failed'

// ============================================================================
// Sermon Types
// ============================================================================

export interface Sermon {
  id: string
  user_id: string
  title: string
  speaker_name: string | null
  recorded_at: string  // ISO 8601 datetime string
  duration_seconds: number
  audio_file_size: number | null
  audio_mime_type: string | null
  transcription_status: ProcessingStatus
  transcription_error: string | null
  study_guide_status: ProcessingStatus
  study_guide_error: string | null
  needs_sync: boolean
  created_at: string  // ISO 8601 datetime string
  updated_at: string  // ISO 8601 datetime string
}

export interface CreateSermonInput {
  id?: string
  user_id: string
  title?: string | null
  speaker_name?: string | null
  recorded_at?: string
  duration_seconds?: number
  audio_file_size?: number | null
  audio_mime_type?: string | null
}

export interface UpdateSermonInput {
  title?: string
  speaker_name?: string | null
  duration_seconds?: number
  transcription_status?: ProcessingStatus
  transcription_error?: string | null
  study_guide_status?: ProcessingStatus
  study_guide_error?: string | null
  needs_sync?: boolean
}

export const DEFAULT_SERMON_TITLE = 'Untitled Sermon'

// ============================================================================
// Audio Chunk Types
// ============================================================================

export interface AudioChunk {
  id: string
  sermon_id: string
  chunk_index: number
  start_offset_seconds: number
  duration_seconds: number
  local_path: string | null
  remote_path: string | null
  file_size: number | null
  waveform_samples: number[] | null
  upload_status: ChunkUploadStatus
  upload_error: string | null
  needs_upload: boolean
  created_at: string
  updated_at: string
}

export interface CreateAudioChunkInput {
  id?: string
  sermon_id: string
  chunk_index: number
  start_offset_seconds: number
  duration_seconds: number
  local_path: string | null
  file_size?: number | null
  waveform_samples?: number[] | null
}

export interface UpdateAudioChunkInput {
  local_path?: string | null
  remote_path?: string | null
  file_size?: number | null
  upload_status?: ChunkUploadStatus
  upload_error?: string | null
  needs_upload?: boolean
}

// ============================================================================
// Transcript & Study Guide Types
// ============================================================================

export interface TranscriptSegment {
  start_seconds: number
  end_seconds: number
  text: string
}

export interface Transcript {
  id: string
  sermon_id: string
  content: string
  segments: TranscriptSegment[]
  word_count: number
  created_at: string
}

export interface SaveTranscriptInput {
  id?: string
  sermon_id: string
  content: string
  segments?: TranscriptSegment[]
}

export interface StudyGuide {
  id: string
  sermon_id: string
  title: string
  summary: string
  key_themes: string[]
  discussion_questions: string[]
  scripture_references: string[]
  created_at: string
}

export interface SaveStudyGuideInput {
  id?: string
  sermon_id: string
  title: string
  summary: string
  key_themes?: string[]
  discussion_questions?: string[]
  scripture_references?: string[]
}

// ============================================================================
// Bookmark Types
// ============================================================================

export type BookmarkLabel = 'key_point' | 'question' | 'application' | 'scripture' | 'other'

export interface SermonBookmark {
  id: string
  sermon_id: string
  user_id: string
  timestamp_seconds: number
  label: BookmarkLabel
  note: string | null
  created_at: string
}

export interface CreateBookmarkInput {
  id?: string
  sermon_id: string
  user_id: string
  timestamp_seconds: number
  label?: BookmarkLabel
  note?: string | null
}

// ============================================================================
// Processing Job Types
// ============================================================================

/**
 * Remote-side job record keyed by sermon id. Read-only from this core.
 */
export interface ProcessingJob {
  sermonId: string
  transcriptionStatus: ProcessingStatus
  studyGuideStatus: ProcessingStatus
  transcriptionError: string | null
  studyGuideError: string | null
}

export interface ProgressUpdate {
  job: ProcessingJob
  /** Composite 0.0 - 1.0 progress fraction */
  progress: number
}

// ============================================================================
// Migration Types
// ============================================================================

export interface Migration {
  version: number
  name: string
  up: string  // SQL to apply migration
}

export interface MigrationRecord {
  version: number
  name: string
  applied_at: string
}

// ============================================================================
// Settings Types
// ============================================================================

export type SettingCategory = 'general' | 'recording' | 'storage' | 'processing' | 'auth'

export interface Setting {
  key: string
  value: string  // JSON-encoded value
  category: SettingCategory
  created_at: string
  updated_at: string
}

export interface CreateSettingInput {
  key: string
  value: unknown
  category: SettingCategory
}
