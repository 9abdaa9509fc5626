/**
 * Audio Chunk Service
 *
 * Handles CRUD operations for sermon audio chunks with prepared statements
 */

import { randomUUID } from 'crypto'
import type Database from 'better-sqlite3'
import { getDatabaseService, type DatabaseInstance } from './database'
import type {
  AudioChunk,
  ChunkUploadStatus,
  CreateAudioChunkInput,
  UpdateAudioChunkInput
} from '../types/sermon'

type AudioChunkRow = Omit<AudioChunk, 'waveform_samples' | 'needs_upload'> & {
  waveform_samples: string | null
  needs_upload: number
}

interface ChunkParams {
  id: string
  sermon_id: string
  chunk_index: number
  start_offset_seconds: number
  duration_seconds: number
  local_path: string | null
  remote_path: string | null
  file_size: number | null
  waveform_samples: string | null
  upload_status: ChunkUploadStatus
  upload_error: string | null
  needs_upload: number
}

interface UpdateParams {
  id: string
  local_path: string | null
  local_path_set: number
  remote_path: string | null
  remote_path_set: number
  file_size: number | null
  upload_status: ChunkUploadStatus | null
  upload_error: string | null
  upload_error_set: number
  needs_upload: number | null
}

// ============================================================================
// Prepared Statements Cache
// ============================================================================

interface ChunkStatements {
  insert: Database.Statement<[ChunkParams]>
  getById: Database.Statement<[string], AudioChunkRow>
  getBySermonId: Database.Statement<[string], AudioChunkRow>
  getPendingUpload: Database.Statement<[string], AudioChunkRow>
  update: Database.Statement<[UpdateParams]>
}

let cache: { db: DatabaseInstance; statements: ChunkStatements } | null = null

function getStatements(): ChunkStatements {
  const db = getDatabaseService().getDatabase()
  if (cache && cache.db === db) return cache.statements

  const statements: ChunkStatements = {
    insert: db.prepare<ChunkParams>(`
      INSERT INTO sermon_audio_chunks (
        id, sermon_id, chunk_index, start_offset_seconds, duration_seconds,
        local_path, remote_path, file_size, waveform_samples,
        upload_status, upload_error, needs_upload, created_at, updated_at
      )
      VALUES (
        @id, @sermon_id, @chunk_index, @start_offset_seconds, @duration_seconds,
        @local_path, @remote_path, @file_size, @waveform_samples,
        @upload_status, @upload_error, @needs_upload, datetime('now'), datetime('now')
      )
    `),

    getById: db.prepare<[string], AudioChunkRow>(`
      SELECT * FROM sermon_audio_chunks WHERE id = ?
    `),

    getBySermonId: db.prepare<[string], AudioChunkRow>(`
      SELECT * FROM sermon_audio_chunks WHERE sermon_id = ? ORDER BY chunk_index ASC
    `),

    getPendingUpload: db.prepare<[string], AudioChunkRow>(`
      SELECT * FROM sermon_audio_chunks
      WHERE sermon_id = ? AND needs_upload = 1
      ORDER BY chunk_index ASC
    `),

    update: db.prepare<UpdateParams>(`
      UPDATE sermon_audio_chunks
      SET local_path = CASE WHEN @local_path_set = 1 THEN @local_path ELSE local_path END,
          remote_path = CASE WHEN @remote_path_set = 1 THEN @remote_path ELSE remote_path END,
          file_size = COALESCE(@file_size, file_size),
          upload_status = COALESCE(@upload_status, upload_status),
          upload_error = CASE WHEN @upload_error_set = 1 THEN @upload_error ELSE upload_error END,
          needs_upload = COALESCE(@needs_upload, needs_upload),
          updated_at = datetime('now')
      WHERE id = @id
    `)
  }

  cache = { db, statements }
  return statements
}

function parseWaveform(value: string | null): number[] | null {
  if (value === null) return null
  try {
    const parsed: unknown = JSON.parse(value)
    return Array.isArray(parsed) && parsed.every((v): v is number => typeof v === 'number')
      ? parsed
      : null
  } catch {
    return null
  }
}

function toAudioChunk(row: AudioChunkRow): AudioChunk {
  return {
    ...row,
    waveform_samples: parseWaveform(row.waveform_samples),
    needs_upload: row.needs_upload === 1
  }
}

function toParams(chunk: AudioChunk): ChunkParams {
  return {
    id: chunk.id,
    sermon_id: chunk.sermon_id,
    chunk_index: chunk.chunk_index,
    start_offset_seconds: chunk.start_offset_seconds,
    duration_seconds: chunk.duration_seconds,
    local_path: chunk.local_path,
    remote_path: chunk.remote_path,
    file_size: chunk.file_size,
    waveform_samples: chunk.waveform_samples ? JSON.stringify(chunk.waveform_samples) : null,
    upload_status: chunk.upload_status,
    upload_error: chunk.upload_error,
    needs_upload: chunk.needs_upload ? 1 : 0
  }
}

/**
 * Build an unsaved chunk record
 */
export function createAudioChunkDraft(input: CreateAudioChunkInput): AudioChunk {
  const now = new Date().toISOString()
  return {
    id: input.id || randomUUID(),
    sermon_id: input.sermon_id,
    chunk_index: input.chunk_index,
    start_offset_seconds: input.start_offset_seconds,
    duration_seconds: input.duration_seconds,
    local_path: input.local_path,
    remote_path: null,
    file_size: input.file_size ?? null,
    waveform_samples: input.waveform_samples ?? null,
    upload_status: 'pending',
    upload_error: null,
    needs_upload: true,
    created_at: now,
    updated_at: now
  }
}

// ============================================================================
// Audio Chunk Service Functions
// ============================================================================

export const audioChunkService = {
  create(input: CreateAudioChunkInput): AudioChunk {
    return audioChunkService.insert(createAudioChunkDraft(input))
  },

  /**
   * Persist a chunk built in memory, keeping its id
   */
  insert(chunk: AudioChunk): AudioChunk {
    const stmts = getStatements()
    stmts.insert.run(toParams(chunk))
    const row = stmts.getById.get(chunk.id)
    if (!row) {
      throw new Error(`Audio chunk ${chunk.id} was not persisted`)
    }
    return toAudioChunk(row)
  },

  /**
   * Insert several chunks in a single transaction
   */
  insertMany(chunks: AudioChunk[]): AudioChunk[] {
    return getDatabaseService().transaction(() => chunks.map(chunk => audioChunkService.insert(chunk)))
  },

  getById(id: string): AudioChunk | null {
    const row = getStatements().getById.get(id)
    return row ? toAudioChunk(row) : null
  },

  /**
   * Get all chunks of a sermon in index order
   */
  getBySermonId(sermonId: string): AudioChunk[] {
    return getStatements().getBySermonId.all(sermonId).map(toAudioChunk)
  },

  getPendingUpload(sermonId: string): AudioChunk[] {
    return getStatements().getPendingUpload.all(sermonId).map(toAudioChunk)
  },

  update(id: string, input: UpdateAudioChunkInput): AudioChunk | null {
    const stmts = getStatements()

    const result = stmts.update.run({
      id,
      local_path: input.local_path ?? null,
      local_path_set: input.local_path !== undefined ? 1 : 0,
      remote_path: input.remote_path ?? null,
      remote_path_set: input.remote_path !== undefined ? 1 : 0,
      file_size: input.file_size ?? null,
      upload_status: input.upload_status ?? null,
      upload_error: input.upload_error ?? null,
      upload_error_set: input.upload_error !== undefined ? 1 : 0,
      needs_upload: input.needs_upload === undefined ? null : input.needs_upload ? 1 : 0
    })

    if (result.changes === 0) {
      return null
    }

    const row = stmts.getById.get(id)
    return row ? toAudioChunk(row) : null
  },

  /**
   * Record a successful upload
   */
  markUploaded(id: string, remotePath: string): AudioChunk | null {
    return audioChunkService.update(id, {
      remote_path: remotePath,
      upload_status: 'succeeded',
      upload_error: null,
      needs_upload: false
    })
  },

  markUploadFailed(id: string, error: string): AudioChunk | null {
    return audioChunkService.update(id, {
      upload_status: 'failed',
      upload_error: error,
      needs_upload: true
    })
  }
}

export default audioChunkService
