/**
 * Bookmark Service
 *
 * Handles CRUD operations for sermon bookmarks with prepared statements
 */

import { randomUUID } from 'crypto'
import type Database from 'better-sqlite3'
import { getDatabaseService, type DatabaseInstance } from './database'
import type { BookmarkLabel, CreateBookmarkInput, SermonBookmark } from '../types/sermon'

type BookmarkParams = Omit<SermonBookmark, 'created_at'>

interface BookmarkStatements {
  insert: Database.Statement<[BookmarkParams]>
  getById: Database.Statement<[string], SermonBookmark>
  getBySermonId: Database.Statement<[string], SermonBookmark>
  delete: Database.Statement<[string]>
}

let cache: { db: DatabaseInstance; statements: BookmarkStatements } | null = null

function getStatements(): BookmarkStatements {
  const db = getDatabaseService().getDatabase()
  if (cache && cache.db === db) return cache.statements

  const statements: BookmarkStatements = {
    insert: db.prepare<BookmarkParams>(`
      INSERT INTO sermon_bookmarks (id, sermon_id, user_id, timestamp_seconds, label, note, created_at)
      VALUES (@id, @sermon_id, @user_id, @timestamp_seconds, @label, @note, datetime('now'))
    `),
    getById: db.prepare<[string], SermonBookmark>(`
      SELECT * FROM sermon_bookmarks WHERE id = ?
    `),
    getBySermonId: db.prepare<[string], SermonBookmark>(`
      SELECT * FROM sermon_bookmarks WHERE sermon_id = ? ORDER BY timestamp_seconds ASC
    `),
    delete: db.prepare<[string]>(`
      DELETE FROM sermon_bookmarks WHERE id = ?
    `)
  }

  cache = { db, statements }
  return statements
}

export const DEFAULT_BOOKMARK_LABEL: BookmarkLabel = 'key_point'

export const bookmarkService = {
  create(input: CreateBookmarkInput): SermonBookmark {
    const stmts = getStatements()
    const id = input.id || randomUUID()

    stmts.insert.run({
      id,
      sermon_id: input.sermon_id,
      user_id: input.user_id,
      timestamp_seconds: input.timestamp_seconds,
      label: input.label ?? DEFAULT_BOOKMARK_LABEL,
      note: input.note ?? null
    })

    const bookmark = stmts.getById.get(id)
    if (!bookmark) {
      throw new Error(`Bookmark ${id} was not persisted`)
    }
    return bookmark
  },

  getBySermonId(sermonId: string): SermonBookmark[] {
    return getStatements().getBySermonId.all(sermonId)
  },

  delete(id: string): boolean {
    return getStatements().delete.run(id).changes > 0
  }
}

export default bookmarkService
