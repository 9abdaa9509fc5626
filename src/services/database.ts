/**
 * Database Service for Sermon Capture
 *
 * This module handles SQLite database initialization, connection management,
 * schema migrations, and provides the core database instance.
 *
 * Pass ':memory:' to initialize() for an in-process database (tests).
 */

import * as fs from 'fs'
import * as path from 'path'
import Database from 'better-sqlite3'
import type { Migration, MigrationRecord } from '../types/sermon'
import { getDefaultDatabasePath } from './dataPaths'
import { loggerService } from './loggerService'

type DatabaseInstance = Database.Database

const log = loggerService.scope('Database')

const IN_MEMORY_PATH = ':memory:'
const CURRENT_SCHEMA_VERSION = 3

// ============================================================================
// Schema Migrations
// ============================================================================

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      -- ========================================
      -- Sermons table
      -- ========================================
      CREATE TABLE IF NOT EXISTS sermons (
        id TEXT PRIMARY KEY NOT NULL,
        user_id TEXT NOT NULL,
        title TEXT NOT NULL,
        speaker_name TEXT,
        recorded_at TEXT NOT NULL,
        duration_seconds INTEGER NOT NULL DEFAULT 0,
        audio_file_size INTEGER,
        audio_mime_type TEXT,
        transcription_status TEXT NOT NULL DEFAULT 'pending' CHECK(transcription_status IN ('pending', 'running', 'succeeded', 'failed')),
        transcription_error TEXT,
        study_guide_status TEXT NOT NULL DEFAULT 'pending' CHECK(study_guide_status IN ('pending', 'running', 'succeeded', 'failed')),
        study_guide_error TEXT,
        needs_sync INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_sermons_user_id ON sermons(user_id);
      CREATE INDEX IF NOT EXISTS idx_sermons_recorded_at ON sermons(recorded_at);

      -- ========================================
      -- Audio chunks table
      -- ========================================
      CREATE TABLE IF NOT EXISTS sermon_audio_chunks (
        id TEXT PRIMARY KEY NOT NULL,
        sermon_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        start_offset_seconds REAL NOT NULL,
        duration_seconds REAL NOT NULL DEFAULT 0,
        local_path TEXT,
        remote_path TEXT,
        file_size INTEGER,
        waveform_samples TEXT,
        upload_status TEXT NOT NULL DEFAULT 'pending' CHECK(upload_status IN ('pending', 'uploading', 'succeeded', 'failed')),
        upload_error TEXT,
        needs_upload INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (sermon_id) REFERENCES sermons(id) ON DELETE CASCADE,
        UNIQUE (sermon_id, chunk_index)
      );

      CREATE INDEX IF NOT EXISTS idx_chunks_sermon_id ON sermon_audio_chunks(sermon_id);

      -- ========================================
      -- Settings table
      -- ========================================
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY NOT NULL,
        value TEXT NOT NULL,
        category TEXT NOT NULL DEFAULT 'general' CHECK(category IN ('general', 'recording', 'storage', 'processing', 'auth')),
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_settings_category ON settings(category);

      CREATE TRIGGER IF NOT EXISTS update_settings_timestamp
      AFTER UPDATE ON settings
      BEGIN
        UPDATE settings SET updated_at = datetime('now') WHERE key = NEW.key;
      END;
    `
  },
  {
    version: 2,
    name: 'transcripts_and_study_guides',
    up: `
      CREATE TABLE IF NOT EXISTS sermon_transcripts (
        id TEXT PRIMARY KEY NOT NULL,
        sermon_id TEXT NOT NULL UNIQUE,
        content TEXT NOT NULL,
        segments TEXT NOT NULL DEFAULT '[]',
        word_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (sermon_id) REFERENCES sermons(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS sermon_study_guides (
        id TEXT PRIMARY KEY NOT NULL,
        sermon_id TEXT NOT NULL UNIQUE,
        title TEXT NOT NULL,
        summary TEXT NOT NULL,
        key_themes TEXT NOT NULL DEFAULT '[]',
        discussion_questions TEXT NOT NULL DEFAULT '[]',
        scripture_references TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (sermon_id) REFERENCES sermons(id) ON DELETE CASCADE
      );
    `
  },
  {
    version: 3,
    name: 'sermon_bookmarks',
    up: `
      CREATE TABLE IF NOT EXISTS sermon_bookmarks (
        id TEXT PRIMARY KEY NOT NULL,
        sermon_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        timestamp_seconds REAL NOT NULL,
        label TEXT NOT NULL DEFAULT 'key_point' CHECK(label IN ('key_point', 'question', 'application', 'scripture', 'other')),
        note TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (sermon_id) REFERENCES sermons(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_bookmarks_sermon_id ON sermon_bookmarks(sermon_id);
    `
  }
]

// ============================================================================
// Database Service Class
// ============================================================================

class DatabaseService {
  private static instance: DatabaseService | null = null
  private db: DatabaseInstance | null = null
  private dbPath: string = ''

  private constructor() {}

  /**
   * Get the singleton database service instance
   */
  static getInstance(): DatabaseService {
    if (!DatabaseService.instance) {
      DatabaseService.instance = new DatabaseService()
    }
    return DatabaseService.instance
  }

  getDbPath(): string {
    return this.dbPath
  }

  /**
   * Initialize the database connection and run migrations
   */
  initialize(customPath?: string): DatabaseInstance {
    if (this.db) {
      return this.db
    }

    this.dbPath = customPath ?? getDefaultDatabasePath()

    if (this.dbPath !== IN_MEMORY_PATH) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true })
    }

    this.db = new Database(this.dbPath)

    // WAL lets progress reads proceed while chunk rows are being written
    if (this.dbPath !== IN_MEMORY_PATH) {
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('synchronous = NORMAL')
    }
    this.db.pragma('busy_timeout = 5000')
    this.db.pragma('foreign_keys = ON')

    this.runMigrations(this.db)

    log.info('Database initialized', { path: this.dbPath, schemaVersion: this.getSchemaVersion() })

    return this.db
  }

  /**
   * Get the database instance
   */
  getDatabase(): DatabaseInstance {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.')
    }
    return this.db
  }

  private runMigrations(db: DatabaseInstance): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY NOT NULL,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `)

    const appliedVersions = new Set(
      db.prepare<[], { version: number }>('SELECT version FROM _migrations ORDER BY version')
        .all()
        .map(m => m.version)
    )

    const recordMigration = db.prepare<[number, string]>(
      'INSERT INTO _migrations (version, name) VALUES (?, ?)'
    )

    for (const migration of migrations) {
      if (appliedVersions.has(migration.version)) continue

      log.info(`Running migration ${migration.version}: ${migration.name}`)
      const runMigration = db.transaction(() => {
        db.exec(migration.up)
        recordMigration.run(migration.version, migration.name)
      })
      runMigration()
    }
  }

  getSchemaVersion(): number {
    if (!this.db) {
      return 0
    }

    const result = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM _migrations')
      .get()

    return result?.version ?? 0
  }

  getMigrationHistory(): MigrationRecord[] {
    if (!this.db) {
      return []
    }

    return this.db
      .prepare<[], MigrationRecord>('SELECT version, name, applied_at FROM _migrations ORDER BY version')
      .all()
  }

  /**
   * Get database statistics
   */
  getStats(): {
    sermonCount: number
    chunkCount: number
    transcriptCount: number
    studyGuideCount: number
    bookmarkCount: number
  } {
    const db = this.getDatabase()
    const count = (table: string): number =>
      db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0

    return {
      sermonCount: count('sermons'),
      chunkCount: count('sermon_audio_chunks'),
      transcriptCount: count('sermon_transcripts'),
      studyGuideCount: count('sermon_study_guides'),
      bookmarkCount: count('sermon_bookmarks')
    }
  }

  /**
   * Run a function inside a transaction
   */
  transaction<T>(fn: () => T): T {
    return this.getDatabase().transaction(fn)()
  }

  close(): void {
    if (this.db) {
      this.db.close()
      this.db = null
      log.info('Database connection closed')
    }
  }

  isInitialized(): boolean {
    return this.db !== null
  }
}

export const getDatabaseService = (): DatabaseService => {
  return DatabaseService.getInstance()
}

export type { DatabaseInstance }
export { DatabaseService, CURRENT_SCHEMA_VERSION, migrations }
