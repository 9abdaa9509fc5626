/**
 * Sermon Service
 *
 * Handles CRUD operations for sermons with prepared statements
 */

import { randomUUID } from 'crypto'
import type Database from 'better-sqlite3'
import { getDatabaseService, type DatabaseInstance } from './database'
import {
  DEFAULT_SERMON_TITLE,
  type CreateSermonInput,
  type ProcessingStatus,
  type Sermon,
  type UpdateSermonInput
} from '../types/sermon'

// SQLite stores booleans as 0/1
type SermonRow = Omit<Sermon, 'needs_sync'> & { needs_sync: number }

interface SermonParams {
  id: string
  user_id: string
  title: string
  speaker_name: string | null
  recorded_at: string
  duration_seconds: number
  audio_file_size: number | null
  audio_mime_type: string | null
  transcription_status: ProcessingStatus
  transcription_error: string | null
  study_guide_status: ProcessingStatus
  study_guide_error: string | null
  needs_sync: number
}

interface UpdateParams {
  id: string
  title: string | null
  speaker_name: string | null
  speaker_name_set: number
  duration_seconds: number | null
  transcription_status: ProcessingStatus | null
  transcription_error: string | null
  transcription_error_set: number
  study_guide_status: ProcessingStatus | null
  study_guide_error: string | null
  study_guide_error_set: number
  needs_sync: number | null
}

// ============================================================================
// Prepared Statements Cache
// ============================================================================

interface SermonStatements {
  insert: Database.Statement<[SermonParams]>
  getById: Database.Statement<[string], SermonRow>
  getByUserId: Database.Statement<[string], SermonRow>
  getNeedingSync: Database.Statement<[], SermonRow>
  update: Database.Statement<[UpdateParams]>
}

let cache: { db: DatabaseInstance; statements: SermonStatements } | null = null

function getStatements(): SermonStatements {
  const db = getDatabaseService().getDatabase()
  if (cache && cache.db === db) return cache.statements

  const statements: SermonStatements = {
    insert: db.prepare<SermonParams>(`
      INSERT INTO sermons (
        id, user_id, title, speaker_name, recorded_at, duration_seconds,
        audio_file_size, audio_mime_type,
        transcription_status, transcription_error,
        study_guide_status, study_guide_error,
        needs_sync, created_at, updated_at
      )
      VALUES (
        @id, @user_id, @title, @speaker_name, @recorded_at, @duration_seconds,
        @audio_file_size, @audio_mime_type,
        @transcription_status, @transcription_error,
        @study_guide_status, @study_guide_error,
        @needs_sync, datetime('now'), datetime('now')
      )
    `),

    getById: db.prepare<[string], SermonRow>(`
      SELECT * FROM sermons WHERE id = ?
    `),

    getByUserId: db.prepare<[string], SermonRow>(`
      SELECT * FROM sermons WHERE user_id = ? ORDER BY recorded_at DESC
    `),

    getNeedingSync: db.prepare<[], SermonRow>(`
      SELECT * FROM sermons WHERE needs_sync = 1 ORDER BY recorded_at ASC
    `),

    // Nullable columns carry a *_set flag so an explicit null can clear them
    update: db.prepare<UpdateParams>(`
      UPDATE sermons
      SET title = COALESCE(@title, title),
          speaker_name = CASE WHEN @speaker_name_set = 1 THEN @speaker_name ELSE speaker_name END,
          duration_seconds = COALESCE(@duration_seconds, duration_seconds),
          transcription_status = COALESCE(@transcription_status, transcription_status),
          transcription_error = CASE WHEN @transcription_error_set = 1 THEN @transcription_error ELSE transcription_error END,
          study_guide_status = COALESCE(@study_guide_status, study_guide_status),
          study_guide_error = CASE WHEN @study_guide_error_set = 1 THEN @study_guide_error ELSE study_guide_error END,
          needs_sync = COALESCE(@needs_sync, needs_sync),
          updated_at = datetime('now')
      WHERE id = @id
    `)
  }

  cache = { db, statements }
  return statements
}

function toSermon(row: SermonRow): Sermon {
  return { ...row, needs_sync: row.needs_sync === 1 }
}

function toParams(sermon: Sermon): SermonParams {
  return {
    id: sermon.id,
    user_id: sermon.user_id,
    title: sermon.title,
    speaker_name: sermon.speaker_name,
    recorded_at: sermon.recorded_at,
    duration_seconds: sermon.duration_seconds,
    audio_file_size: sermon.audio_file_size,
    audio_mime_type: sermon.audio_mime_type,
    transcription_status: sermon.transcription_status,
    transcription_error: sermon.transcription_error,
    study_guide_status: sermon.study_guide_status,
    study_guide_error: sermon.study_guide_error,
    needs_sync: sermon.needs_sync ? 1 : 0
  }
}

/**
 * Build an unsaved sermon with pending statuses. Persisted later through
 * sermonService.insert once capture or import has produced its chunks.
 */
export function createSermonDraft(input: CreateSermonInput): Sermon {
  const now = new Date().toISOString()
  const title = input.title?.trim()

  return {
    id: input.id || randomUUID(),
    user_id: input.user_id,
    title: title ? title : DEFAULT_SERMON_TITLE,
    speaker_name: input.speaker_name ?? null,
    recorded_at: input.recorded_at ?? now,
    duration_seconds: input.duration_seconds ?? 0,
    audio_file_size: input.audio_file_size ?? null,
    audio_mime_type: input.audio_mime_type ?? null,
    transcription_status: 'pending',
    transcription_error: null,
    study_guide_status: 'pending',
    study_guide_error: null,
    needs_sync: true,
    created_at: now,
    updated_at: now
  }
}

// ============================================================================
// Sermon Service Functions
// ============================================================================

export const sermonService = {
  /**
   * Create and persist a new sermon
   */
  create(input: CreateSermonInput): Sermon {
    return sermonService.insert(createSermonDraft(input))
  },

  /**
   * Persist a sermon built in memory, keeping its id
   */
  insert(sermon: Sermon): Sermon {
    const stmts = getStatements()
    stmts.insert.run(toParams(sermon))
    const row = stmts.getById.get(sermon.id)
    if (!row) {
      throw new Error(`Sermon ${sermon.id} was not persisted`)
    }
    return toSermon(row)
  },

  getById(id: string): Sermon | null {
    const row = getStatements().getById.get(id)
    return row ? toSermon(row) : null
  },

  /**
   * Get all sermons of a user, newest first
   */
  getByUserId(userId: string): Sermon[] {
    return getStatements().getByUserId.all(userId).map(toSermon)
  },

  getNeedingSync(): Sermon[] {
    return getStatements().getNeedingSync.all().map(toSermon)
  },

  /**
   * Update a sermon. Returns null when it does not exist
   */
  update(id: string, input: UpdateSermonInput): Sermon | null {
    const stmts = getStatements()

    const result = stmts.update.run({
      id,
      title: input.title ?? null,
      speaker_name: input.speaker_name ?? null,
      speaker_name_set: input.speaker_name !== undefined ? 1 : 0,
      duration_seconds: input.duration_seconds ?? null,
      transcription_status: input.transcription_status ?? null,
      transcription_error: input.transcription_error ?? null,
      transcription_error_set: input.transcription_error !== undefined ? 1 : 0,
      study_guide_status: input.study_guide_status ?? null,
      study_guide_error: input.study_guide_error ?? null,
      study_guide_error_set: input.study_guide_error !== undefined ? 1 : 0,
      needs_sync: input.needs_sync === undefined ? null : input.needs_sync ? 1 : 0
    })

    if (result.changes === 0) {
      return null
    }

    const row = stmts.getById.get(id)
    return row ? toSermon(row) : null
  }
}

export default sermonService
