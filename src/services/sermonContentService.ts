/**
 * Sermon Content Service
 *
 * Stores the transcript and study guide produced by the processing job.
 * One of each per sermon; saving again replaces the previous one.
 */

import { randomUUID } from 'crypto'
import type Database from 'better-sqlite3'
import { getDatabaseService, type DatabaseInstance } from './database'
import type {
  SaveStudyGuideInput,
  SaveTranscriptInput,
  StudyGuide,
  Transcript,
  TranscriptSegment
} from '../types/sermon'

interface TranscriptRow {
  id: string
  sermon_id: string
  content: string
  segments: string
  word_count: number
  created_at: string
}

interface StudyGuideRow {
  id: string
  sermon_id: string
  title: string
  summary: string
  key_themes: string
  discussion_questions: string
  scripture_references: string
  created_at: string
}

type TranscriptParams = Omit<TranscriptRow, 'created_at'>
type StudyGuideParams = Omit<StudyGuideRow, 'created_at'>

// ============================================================================
// Prepared Statements Cache
// ============================================================================

interface ContentStatements {
  upsertTranscript: Database.Statement<[TranscriptParams]>
  getTranscript: Database.Statement<[string], TranscriptRow>
  upsertStudyGuide: Database.Statement<[StudyGuideParams]>
  getStudyGuide: Database.Statement<[string], StudyGuideRow>
}

let cache: { db: DatabaseInstance; statements: ContentStatements } | null = null

function getStatements(): ContentStatements {
  const db = getDatabaseService().getDatabase()
  if (cache && cache.db === db) return cache.statements

  const statements: ContentStatements = {
    upsertTranscript: db.prepare<TranscriptParams>(`
      INSERT INTO sermon_transcripts (id, sermon_id, content, segments, word_count, created_at)
      VALUES (@id, @sermon_id, @content, @segments, @word_count, datetime('now'))
      ON CONFLICT(sermon_id) DO UPDATE SET
        content = excluded.content,
        segments = excluded.segments,
        word_count = excluded.word_count
    `),

    getTranscript: db.prepare<[string], TranscriptRow>(`
      SELECT * FROM sermon_transcripts WHERE sermon_id = ?
    `),

    upsertStudyGuide: db.prepare<StudyGuideParams>(`
      INSERT INTO sermon_study_guides (
        id, sermon_id, title, summary, key_themes, discussion_questions, scripture_references, created_at
      )
      VALUES (
        @id, @sermon_id, @title, @summary, @key_themes, @discussion_questions, @scripture_references, datetime('now')
      )
      ON CONFLICT(sermon_id) DO UPDATE SET
        title = excluded.title,
        summary = excluded.summary,
        key_themes = excluded.key_themes,
        discussion_questions = excluded.discussion_questions,
        scripture_references = excluded.scripture_references
    `),

    getStudyGuide: db.prepare<[string], StudyGuideRow>(`
      SELECT * FROM sermon_study_guides WHERE sermon_id = ?
    `)
  }

  cache = { db, statements }
  return statements
}

function parseJsonArray(value: string): unknown[] {
  try {
    const parsed: unknown = JSON.parse(value)
    return Array.isArray(parsed) ? parsed : []
  } catch {
    return []
  }
}

function parseStrings(value: string): string[] {
  return parseJsonArray(value).filter((v): v is string => typeof v === 'string')
}

function isSegment(value: unknown): value is TranscriptSegment {
  if (typeof value !== 'object' || value === null) return false
  return (
    'start_seconds' in value && typeof value.start_seconds === 'number' &&
    'end_seconds' in value && typeof value.end_seconds === 'number' &&
    'text' in value && typeof value.text === 'string'
  )
}

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length
}

// ============================================================================
// Sermon Content Service Functions
// ============================================================================

export const sermonContentService = {
  saveTranscript(input: SaveTranscriptInput): Transcript {
    const stmts = getStatements()
    stmts.upsertTranscript.run({
      id: input.id || randomUUID(),
      sermon_id: input.sermon_id,
      content: input.content,
      segments: JSON.stringify(input.segments ?? []),
      word_count: countWords(input.content)
    })

    const transcript = sermonContentService.fetchTranscript(input.sermon_id)
    if (!transcript) {
      throw new Error(`Transcript for sermon ${input.sermon_id} was not persisted`)
    }
    return transcript
  },

  fetchTranscript(sermonId: string): Transcript | null {
    const row = getStatements().getTranscript.get(sermonId)
    if (!row) return null
    return {
      ...row,
      segments: parseJsonArray(row.segments).filter(isSegment)
    }
  },

  saveStudyGuide(input: SaveStudyGuideInput): StudyGuide {
    const stmts = getStatements()
    stmts.upsertStudyGuide.run({
      id: input.id || randomUUID(),
      sermon_id: input.sermon_id,
      title: input.title,
      summary: input.summary,
      key_themes: JSON.stringify(input.key_themes ?? []),
      discussion_questions: JSON.stringify(input.discussion_questions ?? []),
      scripture_references: JSON.stringify(input.scripture_references ?? [])
    })

    const guide = sermonContentService.fetchStudyGuide(input.sermon_id)
    if (!guide) {
      throw new Error(`Study guide for sermon ${input.sermon_id} was not persisted`)
    }
    return guide
  },

  fetchStudyGuide(sermonId: string): StudyGuide | null {
    const row = getStatements().getStudyGuide.get(sermonId)
    if (!row) return null
    return {
      ...row,
      key_themes: parseStrings(row.key_themes),
      discussion_questions: parseStrings(row.discussion_questions),
      scripture_references: parseStrings(row.scripture_references)
    }
  }
}

export default sermonContentService
